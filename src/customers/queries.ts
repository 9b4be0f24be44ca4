import { Query } from '../core/types/cqrs';
import { Customer } from './types';

export class CustomersQuery extends Query<Customer[]> {
  constructor(readonly country: string) {
    super();
  }
}

export class CustomerQuery extends Query<Customer> {
  constructor(readonly customerId: string) {
    super();
  }
}
