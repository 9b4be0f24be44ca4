import { TransactionOutcome } from '../types/connection';

/**
 * Base class for every error raised by this package
 */
export abstract class AppError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A connection or transaction could not be opened, started or released
 */
export class ResourceError extends AppError {}

/**
 * The commit or rollback decided at scope end failed. The persisted state
 * may not match what the scope's handlers observed.
 */
export class FinalizeError extends AppError {
  constructor(
    readonly outcome: TransactionOutcome,
    cause: unknown
  ) {
    super(`Failed to ${outcome} the scope transaction`, { cause });
  }
}

/**
 * A transaction or connection was used in a way its lifecycle does not allow
 */
export class TransactionStateError extends AppError {}

export class HandlerNotRegisteredError extends AppError {
  constructor(readonly typeName: string) {
    super(`No handler registered for '${typeName}'`);
  }
}

export class NotFoundError extends AppError {}

export class InvalidArgumentError extends AppError {}
