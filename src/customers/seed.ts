import { Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import { z } from 'zod';

import { DbContext } from '../core/base/context';
import { SQL } from './sql';

const logger = new Logger('CustomerSeed');

export const customerSeedSchema = z.array(
  z.object({
    customerId: z.string().min(1),
    companyName: z.string().min(1),
    country: z.string().min(1).nullable().default(null)
  })
);

export type CustomerSeed = z.infer<typeof customerSeedSchema>;

const countSchema = z.array(z.object({ count: z.coerce.number() })).length(1);

/**
 * Reads and validates a JSON file of customers
 */
export async function loadCustomerSeed(file: string): Promise<CustomerSeed> {
  const content = await fs.readFile(file, 'utf8');
  return customerSeedSchema.parse(JSON.parse(content));
}

/**
 * Inserts the customers from `file` in one transaction, unless the table
 * already holds rows. Returns the number of customers inserted.
 */
export async function seedCustomers(context: DbContext, file: string): Promise<number> {
  const connection = context.createConnection();
  await connection.open();
  try {
    const [{ count }] = countSchema.parse(await connection.query(SQL.customerCount));
    if (count > 0) {
      logger.debug(`Skipping seed, customers table already holds ${count} rows`);
      return 0;
    }

    const customers = await loadCustomerSeed(file);
    const transaction = await connection.beginTransaction();
    try {
      for (const customer of customers) {
        await connection.execute(SQL.insertCustomer, [customer.customerId, customer.companyName, customer.country]);
      }
      await transaction.commit();
    } finally {
      await transaction.dispose();
    }

    logger.log(`Seeded ${customers.length} customers from ${file}`);
    return customers.length;
  } finally {
    await connection.dispose();
  }
}
