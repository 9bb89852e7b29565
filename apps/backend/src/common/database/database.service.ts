import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource, DataSourceOptions } from 'typeorm';
import type {
  ConnectionSource,
  ConnectionTarget,
  RoutedConnection,
} from './connection-source';

/**
 * Owns the TypeORM data source. With DATABASE_REPLICA_URL set it is a
 * master/slave replication source; otherwise every connection is primary.
 */
@Injectable()
export class DatabaseService
  implements ConnectionSource, OnModuleInit, OnModuleDestroy
{
  private readonly logger = new Logger(DatabaseService.name);
  private readonly dataSource: DataSource;
  private readonly replicated: boolean;

  constructor(private readonly configService: ConfigService) {
    const primaryUrl = this.configService.getOrThrow<string>('database.url');
    const replicaUrl = this.configService.get<string>('database.replicaUrl');
    this.replicated = typeof replicaUrl === 'string' && replicaUrl.length > 0;

    const options: DataSourceOptions = this.replicated
      ? {
          type: 'postgres',
          replication: {
            master: { url: primaryUrl },
            slaves: [{ url: replicaUrl }],
          },
          logging: ['error'],
        }
      : { type: 'postgres', url: primaryUrl, logging: ['error'] };
    this.dataSource = new DataSource(options);
  }

  async onModuleInit(): Promise<void> {
    await this.dataSource.initialize();
    this.logger.log(
      this.replicated
        ? 'Connected to primary and replica databases'
        : 'Connected to database (no replica configured, reads use primary)',
    );
  }

  async onModuleDestroy(): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
      this.logger.log('Disconnected from database');
    }
  }

  async acquire(target: ConnectionTarget): Promise<RoutedConnection> {
    const runner = this.dataSource.createQueryRunner(
      target === 'replica' ? 'slave' : 'master',
    );
    await runner.connect();
    return {
      target,
      query: async (sql, parameters) => {
        const rows: unknown = await runner.query(
          sql,
          parameters ? [...parameters] : undefined,
        );
        return Array.isArray(rows) ? rows : [];
      },
      startTransaction: () => runner.startTransaction(),
      commitTransaction: () => runner.commitTransaction(),
      rollbackTransaction: () => runner.rollbackTransaction(),
      release: () => runner.release(),
    };
  }
}
