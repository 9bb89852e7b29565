import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CONNECTION_SOURCE,
  ConnectionSource,
  ConnectionTarget,
  DataAccessIntent,
  Queryable,
} from './connection-source';

/**
 * Routes one logical operation to the replica (read intent) or the primary
 * (write intent, or no intent at all). The connection lives exactly as long
 * as the callback; nothing about the intent outlives the call.
 */
@Injectable()
export class DataAccessRouter {
  private readonly logger = new Logger(DataAccessRouter.name);

  constructor(
    @Inject(CONNECTION_SOURCE) private readonly source: ConnectionSource,
  ) {}

  resolveTarget(intent?: DataAccessIntent): ConnectionTarget {
    return intent === 'read' ? 'replica' : 'primary';
  }

  async run<T>(
    intent: DataAccessIntent | undefined,
    work: (db: Queryable) => Promise<T>,
  ): Promise<T> {
    const target = this.resolveTarget(intent);
    const connection = await this.source.acquire(target);
    try {
      return await work(connection);
    } finally {
      await connection.release();
    }
  }

  read<T>(work: (db: Queryable) => Promise<T>): Promise<T> {
    return this.run('read', work);
  }

  write<T>(work: (db: Queryable) => Promise<T>): Promise<T> {
    return this.run('write', work);
  }

  /** Reads that must observe the latest committed write; never sent to the replica. */
  readFromPrimary<T>(work: (db: Queryable) => Promise<T>): Promise<T> {
    return this.run('write', work);
  }

  async transaction<T>(work: (db: Queryable) => Promise<T>): Promise<T> {
    const connection = await this.source.acquire('primary');
    try {
      await connection.startTransaction();
      try {
        const result = await work(connection);
        await connection.commitTransaction();
        return result;
      } catch (err) {
        this.logger.warn(
          `Rolling back transaction: ${err instanceof Error ? err.message : String(err)}`,
        );
        await connection.rollbackTransaction();
        throw err;
      }
    } finally {
      await connection.release();
    }
  }
}
