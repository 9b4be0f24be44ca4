import { HandlerNotRegisteredError } from '../../core/errors';
import { MessageType, Query, QueryHandler } from '../../core/types/cqrs';

/**
 * Dispatches queries to the handler registered for their class
 */
export class QueryExecutor {
  private readonly handlers = new Map<Function, QueryHandler<any, any>>();

  register<TQuery extends Query<TResult>, TResult>(
    queryType: MessageType<TQuery>,
    handler: QueryHandler<TQuery, TResult>
  ): this {
    this.handlers.set(queryType, handler);
    return this;
  }

  /**
   * Executes the given query and returns its result
   */
  async execute<TResult>(query: Query<TResult>): Promise<TResult> {
    const handler = this.handlers.get(query.constructor);
    if (!handler) {
      throw new HandlerNotRegisteredError(query.constructor.name);
    }
    return handler.handle(query);
  }
}
