import { Module } from '@nestjs/common';
import { AuthorizationModule } from '../authorization/authorization.module';
import { InternalController } from './internal.controller';

@Module({
  imports: [AuthorizationModule],
  controllers: [InternalController],
})
export class InternalModule {}
