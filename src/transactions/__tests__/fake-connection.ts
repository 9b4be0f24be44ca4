import { ObjectLiteral } from 'typeorm';

import { DbConnection, DbTransaction, IsolationLevel } from '../../core/types/connection';

export interface FakeConnectionFailures {
  open?: Error;
  begin?: Error;
  commit?: Error;
  rollback?: Error;
  dispose?: Error;
}

export class FakeTransaction implements DbTransaction {
  state: 'active' | 'committed' | 'rolledBack' = 'active';
  disposed = false;

  constructor(
    readonly connection: FakeConnection,
    readonly isolationLevel?: IsolationLevel
  ) {}

  async commit(): Promise<void> {
    this.connection.events.push('commit');
    if (this.connection.failures.commit) throw this.connection.failures.commit;
    this.state = 'committed';
  }

  async rollback(): Promise<void> {
    this.connection.events.push('rollback');
    if (this.connection.failures.rollback) throw this.connection.failures.rollback;
    this.state = 'rolledBack';
  }

  async dispose(): Promise<void> {
    this.connection.events.push('transaction.dispose');
    this.disposed = true;
    if (this.connection.failures.dispose) throw this.connection.failures.dispose;
  }
}

/**
 * In-memory DbConnection that records every call made on it
 */
export class FakeConnection implements DbConnection {
  readonly database = 'fake';
  readonly events: string[] = [];
  readonly transactions: FakeTransaction[] = [];
  readonly statements: { sql: string; parameters?: unknown[] }[] = [];
  isOpen = false;

  constructor(readonly failures: FakeConnectionFailures = {}) {}

  async open(): Promise<void> {
    this.events.push('open');
    if (this.failures.open) throw this.failures.open;
    this.isOpen = true;
  }

  async close(): Promise<void> {
    this.events.push('close');
    this.isOpen = false;
  }

  async query<T extends ObjectLiteral = ObjectLiteral>(sql: string, parameters?: unknown[]): Promise<T[]> {
    this.statements.push({ sql, parameters });
    return [];
  }

  async execute(sql: string, parameters?: unknown[]): Promise<void> {
    this.statements.push({ sql, parameters });
  }

  async beginTransaction(isolationLevel?: IsolationLevel): Promise<FakeTransaction> {
    this.events.push('begin');
    if (this.failures.begin) throw this.failures.begin;
    const transaction = new FakeTransaction(this, isolationLevel);
    this.transactions.push(transaction);
    return transaction;
  }

  async dispose(): Promise<void> {
    this.events.push('dispose');
    await this.close();
  }
}
