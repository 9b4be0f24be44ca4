import { Logger } from '@nestjs/common';

import { FinalizeError, TransactionStateError } from '../../core/errors';
import { DbConnection, DbTransaction, IsolationLevel, TransactionOutcome } from '../../core/types/connection';

/**
 * Wraps the one real transaction of a scope and counts how many
 * participants began it against how many committed.
 *
 * Handlers see it as an ordinary {@link DbTransaction}: `commit()` only
 * records a vote, `rollback()` and `dispose()` do nothing. The real
 * transaction is resolved once, by {@link finalize}, when the scope ends.
 */
export class TransactionCounter implements DbTransaction {
  private readonly logger = new Logger(TransactionCounter.name);
  private begins = 0;
  private commits = 0;
  private resolvedOutcome?: TransactionOutcome;

  constructor(
    readonly connection: DbConnection,
    private readonly transaction: DbTransaction
  ) {}

  get isolationLevel(): IsolationLevel | undefined {
    return this.transaction.isolationLevel;
  }

  get beginCount(): number {
    return this.begins;
  }

  get commitCount(): number {
    return this.commits;
  }

  get isFinalized(): boolean {
    return this.resolvedOutcome !== undefined;
  }

  /**
   * Outcome decided by {@link finalize}, undefined until then
   */
  get outcome(): TransactionOutcome | undefined {
    return this.resolvedOutcome;
  }

  requestBegin(): void {
    this.assertPending('begin');
    this.begins++;
  }

  signalCommit(): void {
    this.assertPending('commit');
    if (this.commits >= this.begins) {
      throw new TransactionStateError(`Cannot commit more often than begun (${this.commits}/${this.begins})`);
    }
    this.commits++;
  }

  async commit(): Promise<void> {
    this.signalCommit();
  }

  async rollback(): Promise<void> {}

  async dispose(): Promise<void> {}

  /**
   * Commits the real transaction if every begin was committed, otherwise
   * rolls it back, then disposes it. Later calls return the first outcome
   * without touching the real transaction.
   */
  async finalize(): Promise<TransactionOutcome> {
    if (this.resolvedOutcome) {
      this.logger.warn(`Transaction already finalized with ${this.resolvedOutcome}`);
      return this.resolvedOutcome;
    }

    const outcome: TransactionOutcome = this.commits === this.begins ? 'commit' : 'rollback';
    this.resolvedOutcome = outcome;

    let failure: { error: unknown } | undefined;
    try {
      if (outcome === 'commit') {
        await this.transaction.commit();
      } else {
        await this.transaction.rollback();
      }
    } catch (error) {
      failure = { error };
    }

    try {
      await this.transaction.dispose();
    } catch (error) {
      failure ??= { error };
    }

    if (failure) {
      const error = new FinalizeError(outcome, failure.error);
      this.logger.error(`${error.message} (${this.commits}/${this.begins} committed)`, error.stack);
      throw error;
    }

    this.logger.debug(`Transaction ${outcome === 'commit' ? 'committed' : 'rolled back'} (${this.commits}/${this.begins} committed)`);
    return outcome;
  }

  private assertPending(operation: string): void {
    if (this.resolvedOutcome) {
      throw new TransactionStateError(`Cannot ${operation} a transaction already finalized with ${this.resolvedOutcome}`);
    }
  }
}
