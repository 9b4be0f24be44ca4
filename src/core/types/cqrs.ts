/**
 * Base class for all queries. `TResult` is the type the query resolves to.
 */
export abstract class Query<TResult> {
  declare readonly resultType?: TResult;
}

/**
 * Handles a query of type `TQuery` and returns its result
 */
export interface QueryHandler<TQuery extends Query<TResult>, TResult> {
  handle(query: TQuery): Promise<TResult>;
}

/**
 * Handles a command of type `TCommand`
 */
export interface CommandHandler<TCommand> {
  handle(command: TCommand): Promise<void>;
}

/**
 * Constructor of a query or command, used as the dispatch key
 */
export type MessageType<T> = { new (...args: any[]): T };
