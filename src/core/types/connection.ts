import { ObjectLiteral } from 'typeorm';

/**
 * Transaction isolation level, passed through to the driver untouched
 */
export type IsolationLevel = 'READ UNCOMMITTED' | 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

/**
 * How a scope's transaction was resolved
 */
export type TransactionOutcome = 'commit' | 'rollback';

/**
 * A transaction opened on a {@link DbConnection}
 */
export interface DbTransaction {
  readonly connection: DbConnection;
  readonly isolationLevel?: IsolationLevel;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  /**
   * Releases the transaction. An unresolved transaction is rolled back.
   */
  dispose(): Promise<void>;
}

/**
 * One database session
 */
export interface DbConnection {
  readonly database: string;
  readonly isOpen: boolean;
  open(): Promise<void>;
  close(): Promise<void>;
  /**
   * Runs a statement and returns its rows
   */
  query<T extends ObjectLiteral = ObjectLiteral>(sql: string, parameters?: unknown[]): Promise<T[]>;
  /**
   * Runs a statement for its side effects
   */
  execute(sql: string, parameters?: unknown[]): Promise<void>;
  beginTransaction(isolationLevel?: IsolationLevel): Promise<DbTransaction>;
  dispose(): Promise<void>;
}
