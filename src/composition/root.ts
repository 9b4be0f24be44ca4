import { Logger } from '@nestjs/common';

import { CommandExecutor } from '../command/executor';
import { DbContext } from '../core/base/context';
import { CommandHandler } from '../core/types/cqrs';
import { TransactionOptions } from '../core/types/options';
import {
  AddCustomerCommand,
  AddCustomerCommandHandler,
  CustomerQuery,
  CustomerQueryHandler,
  CustomerService,
  CustomersQuery,
  CustomersQueryHandler,
  seedCustomers
} from '../customers';
import { QueryExecutor } from '../query/executor';
import { ScopedConnection } from '../transactions/connection';
import { CommandHandlerDecorator, transactional } from '../transactions/handlers';
import { RequestScope } from './scope';

export interface CompositionRootOptions {
  transaction?: TransactionOptions;
  /**
   * Applied on top of the transactional decorator, innermost first
   */
  decorators?: CommandHandlerDecorator[];
  /**
   * JSON file of customers inserted on initialize when the table is empty
   */
  seedFile?: string;
}

/**
 * Builds the object graph of each scope. Every scope gets its own
 * connection; every command handler in it is wrapped so it joins the
 * scope's transaction.
 */
export class CompositionRoot {
  private readonly logger = new Logger(CompositionRoot.name);
  private readonly decorators: CommandHandlerDecorator[];

  constructor(
    readonly context: DbContext,
    private readonly options: CompositionRootOptions = {}
  ) {
    this.decorators = [transactional(options.transaction), ...(options.decorators ?? [])];
  }

  async initialize(): Promise<void> {
    await this.context.initialize();
    if (this.options.seedFile) {
      await seedCustomers(this.context, this.options.seedFile);
    }
  }

  createScope(): RequestScope {
    const connection = new ScopedConnection(this.context.createConnection());

    const queries = new QueryExecutor()
      .register(CustomersQuery, new CustomersQueryHandler(connection))
      .register(CustomerQuery, new CustomerQueryHandler(connection));

    const commands = new CommandExecutor().register(
      AddCustomerCommand,
      this.decorate(new AddCustomerCommandHandler(connection), connection)
    );

    return new RequestScope(connection, queries, commands, new CustomerService(queries, commands));
  }

  /**
   * Runs `action` in a new scope and disposes the scope on every exit path.
   * When `action` fails, its error is the one rethrown; a disposal failure
   * on that path is logged.
   */
  async runInScope<T>(action: (scope: RequestScope) => Promise<T>): Promise<T> {
    const scope = this.createScope();
    let result: T;
    try {
      result = await action(scope);
    } catch (error) {
      try {
        await scope.dispose();
      } catch (disposeError) {
        this.logger.error('Failed to dispose scope after a failed action', disposeError instanceof Error ? disposeError.stack : String(disposeError));
      }
      throw error;
    }
    await scope.dispose();
    return result;
  }

  async dispose(): Promise<void> {
    await this.context.dispose();
    this.logger.debug('Disposed composition root');
  }

  private decorate<TCommand>(handler: CommandHandler<TCommand>, connection: ScopedConnection): CommandHandler<TCommand> {
    return this.decorators.reduce((inner, decorator) => decorator(inner, connection), handler);
  }
}
