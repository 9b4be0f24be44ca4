export const SQL = {
  customersByCountry: 'SELECT customerId, companyName FROM customers WHERE country = ? ORDER BY customerId',
  customer: 'SELECT customerId, companyName FROM customers WHERE customerId = ?',
  insertCustomer: 'INSERT INTO customers (customerId, companyName, country) VALUES (?, ?, ?)',
  customerCount: 'SELECT COUNT(*) AS count FROM customers'
} as const;
