import { Logger } from '@nestjs/common';
import { ObjectLiteral } from 'typeorm';

import { TransactionStateError } from '../../core/errors';
import { DbConnection, IsolationLevel } from '../../core/types/connection';
import { TransactionCounter } from '../counter';

/**
 * Connection shared by everything that runs within one scope.
 *
 * The first `beginTransaction()` opens the one real transaction of the
 * scope; every call, first or not, returns the same
 * {@link TransactionCounter} with its begin count raised. The outcome is
 * decided when the scope disposes the connection.
 */
export class ScopedConnection implements DbConnection {
  private readonly logger = new Logger(ScopedConnection.name);
  private pending: Promise<TransactionCounter> | null = null;
  private counter?: TransactionCounter;
  private disposed = false;

  constructor(private readonly connection: DbConnection) {}

  get database(): string {
    return this.connection.database;
  }

  get isOpen(): boolean {
    return this.connection.isOpen;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * The scope's transaction, once one has been requested
   */
  get transaction(): TransactionCounter | undefined {
    return this.counter;
  }

  open(): Promise<void> {
    return this.connection.open();
  }

  close(): Promise<void> {
    return this.connection.close();
  }

  query<T extends ObjectLiteral = ObjectLiteral>(sql: string, parameters?: unknown[]): Promise<T[]> {
    return this.connection.query<T>(sql, parameters);
  }

  execute(sql: string, parameters?: unknown[]): Promise<void> {
    return this.connection.execute(sql, parameters);
  }

  /**
   * Joins the scope's transaction, opening it on first use. The isolation
   * level only applies to the call that opens it.
   */
  async beginTransaction(isolationLevel?: IsolationLevel): Promise<TransactionCounter> {
    if (this.disposed) {
      throw new TransactionStateError(`Connection to '${this.database}' has already been disposed`);
    }

    const pending = this.pending ?? (this.pending = this.openTransaction(isolationLevel));

    let counter: TransactionCounter;
    try {
      counter = await pending;
    } catch (error) {
      // nothing was opened, so a later call may try again
      if (this.pending === pending) {
        this.pending = null;
      }
      throw error;
    }

    counter.requestBegin();
    return counter;
  }

  private async openTransaction(isolationLevel?: IsolationLevel): Promise<TransactionCounter> {
    if (!this.connection.isOpen) {
      await this.connection.open();
    }
    const transaction = await this.connection.beginTransaction(isolationLevel);
    this.counter = new TransactionCounter(this, transaction);
    this.logger.debug(`Opened scope transaction on '${this.database}'`);
    return this.counter;
  }

  /**
   * Resolves the scope's transaction, if one was opened, then disposes the
   * real connection. The connection is disposed even when resolving the
   * transaction fails; that failure is rethrown afterwards.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    try {
      if (this.pending) {
        const counter = await this.pending;
        await counter.finalize();
      }
    } finally {
      await this.connection.dispose();
      this.logger.debug(`Disposed connection to '${this.database}'`);
    }
  }
}
