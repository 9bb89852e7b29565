import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { AuthorizationModule } from '../authorization/authorization.module';
import { IdentityModule } from '../identity/identity.module';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { LegacyOAuthController } from './legacy-oauth.controller';
import { JwtStrategy } from './strategies/jwt.strategy';
import { ServiceJwtStrategy } from './strategies/service-jwt.strategy';
import { TokenService } from './token.service';

@Module({
  imports: [
    PassportModule,
    JwtModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        secret: configService.getOrThrow<string>('jwt.secret'),
        signOptions: { algorithm: 'HS256' },
        verifyOptions: { algorithms: ['HS256'] },
      }),
    }),
    IdentityModule,
    AuthorizationModule,
  ],
  controllers: [AuthController, LegacyOAuthController],
  providers: [TokenService, AuthService, JwtStrategy, ServiceJwtStrategy],
  exports: [TokenService],
})
export class AuthModule {}
