/**
 * Database Configuration Unit Tests
 */

const mockMongooseConnect = jest.fn().mockResolvedValue({ connection: { host: 'localhost' } });
const mockMongooseDisconnect = jest.fn().mockResolvedValue(undefined);
const mockConnectionListeners = new Map<string, (err?: Error) => void>();

jest.mock('mongoose', () => ({
  connect: mockMongooseConnect,
  disconnect: mockMongooseDisconnect,
  connection: {
    readyState: 1,
    on: (event: string, listener: (err?: Error) => void) => {
      mockConnectionListeners.set(event, listener);
    },
  },
}));

jest.mock('../../../src/config/index', () => ({
  config: {
    mongodb: {
      uri: 'mongodb://localhost:27017/test',
      maxPoolSize: 10,
      minPoolSize: 2,
      maxIdleTimeMS: 30000,
      serverSelectionTimeoutMS: 5000,
    },
  },
}));

const mockLogger = {
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};
jest.mock('../../../src/observability/logger', () => ({
  createServiceLogger: () => mockLogger,
}));

describe('Database Configuration', () => {
  let database: typeof import('../../../src/config/database');

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.resetModules();
    mockConnectionListeners.clear();
    database = await import('../../../src/config/database');
  });

  it('should connect with the pool settings', async () => {
    await database.connectDatabase();

    expect(mockMongooseConnect).toHaveBeenCalledWith('mongodb://localhost:27017/test', {
      maxPoolSize: 10,
      minPoolSize: 2,
      maxIdleTimeMS: 30000,
      serverSelectionTimeoutMS: 5000,
    });
    expect(database.getDatabaseStatus()).toEqual({ connected: true, readyState: 1 });
  });

  it('should connect only once', async () => {
    await database.connectDatabase();
    await database.connectDatabase();

    expect(mockMongooseConnect).toHaveBeenCalledTimes(1);
  });

  it('should rethrow connection failures', async () => {
    mockMongooseConnect.mockRejectedValueOnce(new Error('ECONNREFUSED'));

    await expect(database.connectDatabase()).rejects.toThrow('ECONNREFUSED');
    expect(database.getDatabaseStatus().connected).toBe(false);
  });

  it('should skip disconnect when never connected', async () => {
    await database.disconnectDatabase();
    expect(mockMongooseDisconnect).not.toHaveBeenCalled();
  });

  it('should disconnect an open connection', async () => {
    await database.connectDatabase();
    await database.disconnectDatabase();

    expect(mockMongooseDisconnect).toHaveBeenCalledTimes(1);
    expect(database.getDatabaseStatus().connected).toBe(false);
  });

  it('should mark the connection lost on a driver disconnect', async () => {
    await database.connectDatabase();

    mockConnectionListeners.get('disconnected')?.();

    expect(database.getDatabaseStatus().connected).toBe(false);
    expect(mockLogger.warn).toHaveBeenCalledWith('MongoDB disconnected');
  });
});
