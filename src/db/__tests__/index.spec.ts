/**
 * Tests for the database layer: pool queries, transactions and health check
 */

import { closePool, healthCheck, query, transaction } from '../index';
import { PgRecordStore, SELECT_APP_EVENTS, SELECT_TRANSACTIONS, SELECT_USERS } from '../raw-records';
import { resetConfig } from '../../config';

const mockClient = {
  query: jest.fn(),
  release: jest.fn(),
};

const mockPool = {
  connect: jest.fn(async () => mockClient),
  query: jest.fn(),
  on: jest.fn(),
  end: jest.fn(async () => undefined),
};

jest.mock('pg', () => ({
  Pool: jest.fn(() => mockPool),
}));

describe('Database Layer', () => {
  const originalUrl = process.env.DATABASE_URL;
  const consoleSpies = [
    jest.spyOn(console, 'log').mockImplementation(() => undefined),
    jest.spyOn(console, 'warn').mockImplementation(() => undefined),
    jest.spyOn(console, 'error').mockImplementation(() => undefined),
  ];

  beforeAll(() => {
    process.env.DATABASE_URL = 'postgres://localhost:5432/payments';
    resetConfig();
  });

  afterAll(() => {
    consoleSpies.forEach((spy) => spy.mockRestore());
    if (originalUrl === undefined) {
      delete process.env.DATABASE_URL;
    } else {
      process.env.DATABASE_URL = originalUrl;
    }
    resetConfig();
  });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  afterEach(async () => {
    await closePool();
  });

  describe('transaction', () => {
    it('should open a repeatable read, read only transaction and commit', async () => {
      const result = await transaction(async () => 'done', {
        isolationLevel: 'REPEATABLE READ',
        readOnly: true,
      });

      expect(result).toBe('done');
      expect(mockClient.query.mock.calls).toEqual([
        ['BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY'],
        ['COMMIT'],
      ]);
      expect(mockClient.release).toHaveBeenCalledTimes(1);
    });

    it('should issue a plain BEGIN without options', async () => {
      await transaction(async () => undefined);

      expect(mockClient.query.mock.calls[0]).toEqual(['BEGIN']);
    });

    it('should roll back and release the client when the callback rejects', async () => {
      const failure = new Error('read failed');

      await expect(
        transaction(async () => {
          throw failure;
        }, { isolationLevel: 'REPEATABLE READ', readOnly: true }),
      ).rejects.toBe(failure);

      expect(mockClient.query.mock.calls).toEqual([
        ['BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY'],
        ['ROLLBACK'],
      ]);
      expect(mockClient.release).toHaveBeenCalledTimes(1);
    });
  });

  describe('PgRecordStore', () => {
    it('should run the three selects between BEGIN and COMMIT on one client', async () => {
      mockClient.query.mockResolvedValue({ rows: [] });

      const snapshot = await new PgRecordStore().loadSnapshot();

      expect(snapshot).toEqual({ users: [], transactions: [], appEvents: [] });
      expect(mockPool.connect).toHaveBeenCalledTimes(1);
      expect(mockClient.query.mock.calls).toEqual([
        ['BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY'],
        [SELECT_USERS, []],
        [SELECT_TRANSACTIONS, []],
        [SELECT_APP_EVENTS, []],
        ['COMMIT'],
      ]);
      expect(mockPool.query).not.toHaveBeenCalled();
    });
  });

  describe('query', () => {
    it('should use the pool when no client is given', async () => {
      mockPool.query.mockResolvedValueOnce({ rows: [{ ok: 1 }] });

      const result = await query<{ ok: number }>('SELECT 1 as ok');

      expect(result.rows).toEqual([{ ok: 1 }]);
      expect(mockPool.query).toHaveBeenCalledWith('SELECT 1 as ok', []);
    });

    it('should rethrow query errors', async () => {
      const failure = new Error('syntax error');
      mockPool.query.mockRejectedValueOnce(failure);

      await expect(query('SELEC 1')).rejects.toBe(failure);
    });
  });

  describe('healthCheck', () => {
    it('should return true when the database answers', async () => {
      mockPool.query.mockResolvedValueOnce({ rows: [{ ok: 1 }] });

      await expect(healthCheck()).resolves.toBe(true);
    });

    it('should return false when the query fails', async () => {
      mockPool.query.mockRejectedValueOnce(new Error('connection refused'));

      await expect(healthCheck()).resolves.toBe(false);
    });
  });
});
