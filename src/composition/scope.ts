import { CommandExecutor } from '../command/executor';
import { CustomerService } from '../customers/service';
import { QueryExecutor } from '../query/executor';
import { ScopedConnection } from '../transactions/connection';

/**
 * The object graph of one scope: a web request or a test case
 */
export class RequestScope {
  constructor(
    readonly connection: ScopedConnection,
    readonly queries: QueryExecutor,
    readonly commands: CommandExecutor,
    readonly customers: CustomerService
  ) {}

  /**
   * Resolves the scope's transaction and releases its connection
   */
  dispose(): Promise<void> {
    return this.connection.dispose();
  }
}
