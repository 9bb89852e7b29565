export const CONNECTION_SOURCE = Symbol('CONNECTION_SOURCE');

export type ConnectionTarget = 'primary' | 'replica';

export type DataAccessIntent = 'read' | 'write';

export interface Queryable {
  query(sql: string, parameters?: readonly unknown[]): Promise<unknown[]>;
}

/** One pooled connection, held for a single logical operation. */
export interface RoutedConnection extends Queryable {
  readonly target: ConnectionTarget;
  startTransaction(): Promise<void>;
  commitTransaction(): Promise<void>;
  rollbackTransaction(): Promise<void>;
  release(): Promise<void>;
}

export interface ConnectionSource {
  acquire(target: ConnectionTarget): Promise<RoutedConnection>;
}
