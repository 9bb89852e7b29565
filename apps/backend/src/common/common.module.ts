import { Global, Module } from '@nestjs/common';
import { KEY_VALUE_STORE } from './cache/key-value-store';
import { CONNECTION_SOURCE } from './database/connection-source';
import { DataAccessRouter } from './database/data-access-router.service';
import { DatabaseService } from './database/database.service';
import { AppLoggerService } from './services/app-logger.service';
import { RedisService } from './services/redis.service';
import { RequestContextService } from './services/request-context.service';
import { TokenRevocationService } from './services/token-revocation.service';

@Global()
@Module({
  providers: [
    RedisService,
    { provide: KEY_VALUE_STORE, useExisting: RedisService },
    DatabaseService,
    { provide: CONNECTION_SOURCE, useExisting: DatabaseService },
    DataAccessRouter,
    AppLoggerService,
    RequestContextService,
    TokenRevocationService,
  ],
  exports: [
    KEY_VALUE_STORE,
    CONNECTION_SOURCE,
    DataAccessRouter,
    AppLoggerService,
    RequestContextService,
    TokenRevocationService,
  ],
})
export class CommonModule {}
