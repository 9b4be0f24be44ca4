import { CommandHandler } from '../../core/types/cqrs';
import { DbConnection } from '../../core/types/connection';
import { TransactionOptions } from '../../core/types/options';

/**
 * Wraps a command handler when the object graph of a scope is built
 */
export type CommandHandlerDecorator = <TCommand>(
  handler: CommandHandler<TCommand>,
  connection: DbConnection
) => CommandHandler<TCommand>;

/**
 * Runs the inner handler inside the connection's transaction and votes to
 * commit it when the handler succeeds. Failures propagate untouched and
 * leave the vote out, which rolls back the scope.
 */
export class TransactionalCommandHandler<TCommand> implements CommandHandler<TCommand> {
  constructor(
    private readonly connection: DbConnection,
    private readonly handler: CommandHandler<TCommand>,
    private readonly options: TransactionOptions = {}
  ) {}

  async handle(command: TCommand): Promise<void> {
    const transaction = await this.connection.beginTransaction(this.options.isolationLevel);
    try {
      await this.handler.handle(command);
      await transaction.commit();
    } finally {
      await transaction.dispose();
    }
  }
}

/**
 * Decorator factory for {@link TransactionalCommandHandler}
 */
export function transactional(options: TransactionOptions = {}): CommandHandlerDecorator {
  return (handler, connection) => new TransactionalCommandHandler(connection, handler, options);
}
