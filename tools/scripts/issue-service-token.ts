import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import configuration from '../../apps/backend/src/common/config/configuration';
import { TokenService } from '../../apps/backend/src/modules/auth/token.service';

/**
 * Prints a bearer token for the internal endpoints, signed with the
 * JWT_SECRET of the current environment.
 *
 *   JWT_SECRET=... node dist/tools/scripts/issue-service-token.js scheduler
 */
async function issueServiceToken() {
  const serviceName = process.argv[2];
  if (!serviceName) {
    console.error('❌ Usage: issue-service-token <service-name>');
    process.exit(1);
  }

  const configService = new ConfigService(configuration());
  const jwtService = new JwtService({
    secret: configService.get<string>('jwt.secret'),
    signOptions: { algorithm: 'HS256' },
  });
  const tokens = new TokenService(jwtService, configService);

  const issued = tokens.issueServiceToken(serviceName);
  console.log(`✅ Service token for '${serviceName}'`);
  console.log(`⏱️  Expires in ${issued.expiresIn}s (jti ${issued.claims.jti})`);
  console.log(issued.token);
}

issueServiceToken().catch((error: unknown) => {
  console.error(
    `❌ Failed to issue token: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
