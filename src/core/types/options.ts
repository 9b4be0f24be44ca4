import { IsolationLevel } from './connection';
import { EntityType } from './entity';

/**
 * Options for configuring the DbContext
 */
export interface DbContextOptions {
  type: 'better-sqlite3';
  /**
   * Database file, or `:memory:`
   */
  database: string;
  entities?: EntityType<object>[];
  synchronize?: boolean;
  enableLogging?: boolean;
}

/**
 * Options for configuring transactions
 */
export interface TransactionOptions {
  /**
   * Isolation level requested when the scope's transaction is opened
   */
  isolationLevel?: IsolationLevel;
}
