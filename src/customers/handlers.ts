import { NotFoundError } from '../core/errors';
import { DbConnection } from '../core/types/connection';
import { CommandHandler, QueryHandler } from '../core/types/cqrs';
import { AddCustomerCommand } from './commands';
import { CustomerQuery, CustomersQuery } from './queries';
import { SQL } from './sql';
import { Customer } from './types';

export class CustomersQueryHandler implements QueryHandler<CustomersQuery, Customer[]> {
  constructor(private readonly connection: DbConnection) {}

  async handle(query: CustomersQuery): Promise<Customer[]> {
    const rows = await this.connection.query<Customer>(SQL.customersByCountry, [query.country]);
    return rows.map(row => ({ customerId: row.customerId, companyName: row.companyName }));
  }
}

export class CustomerQueryHandler implements QueryHandler<CustomerQuery, Customer> {
  constructor(private readonly connection: DbConnection) {}

  /**
   * Fails with {@link NotFoundError} unless exactly one customer matches
   */
  async handle(query: CustomerQuery): Promise<Customer> {
    const rows = await this.connection.query<Customer>(SQL.customer, [query.customerId]);
    if (rows.length !== 1) {
      throw new NotFoundError(`Customer '${query.customerId}' not found`);
    }
    const [row] = rows;
    return { customerId: row.customerId, companyName: row.companyName };
  }
}

export class AddCustomerCommandHandler implements CommandHandler<AddCustomerCommand> {
  constructor(private readonly connection: DbConnection) {}

  async handle(command: AddCustomerCommand): Promise<void> {
    await this.connection.execute(SQL.insertCustomer, [command.customerId, command.companyName, command.country]);
  }
}
