import { FinalizeError, TransactionStateError } from '../../core/errors';
import { ScopedConnection } from '../connection';
import { FakeConnection } from './fake-connection';

describe('ScopedConnection', () => {
  let connection: FakeConnection;
  let scoped: ScopedConnection;

  beforeEach(() => {
    connection = new FakeConnection();
    scoped = new ScopedConnection(connection);
  });

  describe('beginTransaction', () => {
    it('should not open anything until a transaction is requested', () => {
      expect(scoped.transaction).toBeUndefined();
      expect(connection.events).toEqual([]);
    });

    it('should open the connection and one real transaction on first use', async () => {
      const transaction = await scoped.beginTransaction();

      expect(transaction.beginCount).toBe(1);
      expect(scoped.transaction).toBe(transaction);
      expect(connection.events).toEqual(['open', 'begin']);
    });

    it('should return the same transaction with its begin count raised', async () => {
      const first = await scoped.beginTransaction();
      const second = await scoped.beginTransaction();

      expect(second).toBe(first);
      expect(second.beginCount).toBe(2);
      expect(connection.transactions).toHaveLength(1);
      expect(connection.events).toEqual(['open', 'begin']);
    });

    it('should share one real transaction between concurrent first requests', async () => {
      const [first, second] = await Promise.all([scoped.beginTransaction(), scoped.beginTransaction()]);

      expect(second).toBe(first);
      expect(first.beginCount).toBe(2);
      expect(connection.transactions).toHaveLength(1);
    });

    it('should not reopen a connection that is already open', async () => {
      await scoped.open();

      await scoped.beginTransaction();

      expect(connection.events).toEqual(['open', 'begin']);
    });

    it('should apply the isolation level of the request that opens the transaction', async () => {
      await scoped.beginTransaction('SERIALIZABLE');
      const transaction = await scoped.beginTransaction('READ UNCOMMITTED');

      expect(transaction.isolationLevel).toBe('SERIALIZABLE');
      expect(connection.transactions).toHaveLength(1);
    });

    it('should propagate a failure to open and create no transaction', async () => {
      // Arrange
      const openError = new Error('unable to open database file');
      connection.failures.open = openError;

      // Act & Assert
      await expect(scoped.beginTransaction()).rejects.toBe(openError);
      expect(scoped.transaction).toBeUndefined();
      expect(connection.transactions).toHaveLength(0);
    });

    it('should try again after a failed attempt', async () => {
      // Arrange
      connection.failures.begin = new Error('database is locked');
      await expect(scoped.beginTransaction()).rejects.toThrow('database is locked');
      delete connection.failures.begin;

      // Act
      const transaction = await scoped.beginTransaction();

      // Assert
      expect(transaction.beginCount).toBe(1);
      expect(connection.transactions).toHaveLength(1);
      expect(connection.events).toEqual(['open', 'begin', 'begin']);
    });

    it('should reject requests once disposed', async () => {
      await scoped.dispose();

      await expect(scoped.beginTransaction()).rejects.toThrow(TransactionStateError);
    });
  });

  describe('pass-through', () => {
    it('should forward statements to the wrapped connection', async () => {
      await scoped.query('SELECT * FROM customers WHERE country = ?', ['Norway']);
      await scoped.execute('DELETE FROM customers');

      expect(connection.statements).toEqual([
        { sql: 'SELECT * FROM customers WHERE country = ?', parameters: ['Norway'] },
        { sql: 'DELETE FROM customers', parameters: undefined }
      ]);
      expect(scoped.database).toBe('fake');
    });

    it('should forward open and close', async () => {
      await scoped.open();
      expect(scoped.isOpen).toBe(true);

      await scoped.close();
      expect(scoped.isOpen).toBe(false);
      expect(connection.events).toEqual(['open', 'close']);
    });
  });

  describe('dispose', () => {
    it('should only dispose the connection when no transaction was requested', async () => {
      await scoped.dispose();

      expect(scoped.isDisposed).toBe(true);
      expect(connection.events).toEqual(['dispose', 'close']);
    });

    it('should resolve the transaction before disposing the connection', async () => {
      // Arrange
      const transaction = await scoped.beginTransaction();
      transaction.signalCommit();

      // Act
      await scoped.dispose();

      // Assert
      expect(transaction.outcome).toBe('commit');
      expect(connection.events).toEqual(['open', 'begin', 'commit', 'transaction.dispose', 'dispose', 'close']);
    });

    it('should roll back when a begin was never committed', async () => {
      await scoped.beginTransaction();
      (await scoped.beginTransaction()).signalCommit();

      await scoped.dispose();

      expect(scoped.transaction?.outcome).toBe('rollback');
      expect(connection.transactions[0].state).toBe('rolledBack');
    });

    it('should dispose the connection even when resolving the transaction fails', async () => {
      // Arrange
      connection.failures.commit = new Error('disk I/O error');
      (await scoped.beginTransaction()).signalCommit();

      // Act & Assert
      await expect(scoped.dispose()).rejects.toBeInstanceOf(FinalizeError);
      expect(connection.isOpen).toBe(false);
      expect(connection.events.slice(-2)).toEqual(['dispose', 'close']);
    });

    it('should run only once', async () => {
      await scoped.beginTransaction();

      await scoped.dispose();
      await scoped.dispose();

      expect(connection.events.filter(event => event === 'dispose')).toHaveLength(1);
      expect(connection.events.filter(event => event === 'rollback')).toHaveLength(1);
    });
  });
});
