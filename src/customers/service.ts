import { CommandExecutor } from '../command/executor';
import { InvalidArgumentError } from '../core/errors';
import { QueryExecutor } from '../query/executor';
import { AddCustomerCommand } from './commands';
import { CustomerQuery, CustomersQuery } from './queries';
import { Customer } from './types';

export class CustomerService {
  constructor(
    private readonly queries: QueryExecutor,
    private readonly commands: CommandExecutor
  ) {}

  async getCustomers(country: string): Promise<Customer[]> {
    if (!country) {
      throw new InvalidArgumentError('country is required');
    }
    return this.queries.execute(new CustomersQuery(country));
  }

  async getCustomer(customerId: string): Promise<Customer> {
    return this.queries.execute(new CustomerQuery(customerId));
  }

  async save(customer: Customer, country: string | null = null): Promise<void> {
    await this.commands.execute(new AddCustomerCommand(customer.customerId, customer.companyName, country));
  }
}
