import { MutexInterface } from 'async-mutex';
import { ObjectLiteral, QueryRunner } from 'typeorm';

import { ResourceError } from '../errors';
import { DbConnection, DbTransaction, IsolationLevel } from '../types/connection';

/**
 * A transaction started on a TypeORM QueryRunner
 */
export class QueryRunnerTransaction implements DbTransaction {
  constructor(
    readonly connection: QueryRunnerConnection,
    private readonly queryRunner: QueryRunner,
    readonly isolationLevel?: IsolationLevel
  ) {}

  async commit(): Promise<void> {
    await this.queryRunner.commitTransaction();
  }

  async rollback(): Promise<void> {
    await this.queryRunner.rollbackTransaction();
  }

  async dispose(): Promise<void> {
    if (this.queryRunner.isTransactionActive) {
      await this.queryRunner.rollbackTransaction();
    }
  }
}

/**
 * DbConnection backed by a single TypeORM QueryRunner. The connection holds
 * `lock` from open until close, so only one connection of a context uses
 * the database at a time.
 */
export class QueryRunnerConnection implements DbConnection {
  private opened = false;
  private opening: Promise<void> | null = null;
  private releaseLock?: MutexInterface.Releaser;

  constructor(
    private readonly queryRunner: QueryRunner,
    readonly database: string,
    private readonly lock: MutexInterface
  ) {}

  get isOpen(): boolean {
    return this.opened;
  }

  /**
   * Waits for the context's lock, then connects the underlying query runner
   */
  async open(): Promise<void> {
    if (this.opened) return;
    const opening = this.opening ?? (this.opening = this.connect());
    try {
      await opening;
    } finally {
      if (this.opening === opening) this.opening = null;
    }
  }

  private async connect(): Promise<void> {
    const release = await this.lock.acquire();
    try {
      await this.queryRunner.connect();
    } catch (error) {
      release();
      throw new ResourceError(`Failed to open connection to '${this.database}'`, { cause: error });
    }
    this.releaseLock = release;
    this.opened = true;
  }

  /**
   * Releases the underlying query runner and the context's lock
   */
  async close(): Promise<void> {
    if (!this.opened) return;
    this.opened = false;
    const release = this.releaseLock;
    this.releaseLock = undefined;
    try {
      await this.queryRunner.release();
    } catch (error) {
      throw new ResourceError(`Failed to close connection to '${this.database}'`, { cause: error });
    } finally {
      release?.();
    }
  }

  async query<T extends ObjectLiteral = ObjectLiteral>(sql: string, parameters?: unknown[]): Promise<T[]> {
    await this.open();
    return this.queryRunner.query(sql, parameters);
  }

  async execute(sql: string, parameters?: unknown[]): Promise<void> {
    await this.open();
    await this.queryRunner.query(sql, parameters);
  }

  /**
   * Starts a transaction on the query runner
   */
  async beginTransaction(isolationLevel?: IsolationLevel): Promise<DbTransaction> {
    await this.open();
    try {
      await this.queryRunner.startTransaction(isolationLevel);
    } catch (error) {
      throw new ResourceError(`Failed to begin a transaction on '${this.database}'`, { cause: error });
    }
    return new QueryRunnerTransaction(this, this.queryRunner, isolationLevel);
  }

  async dispose(): Promise<void> {
    await this.close();
  }
}
