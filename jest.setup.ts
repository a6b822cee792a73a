// Jest setup file for test configuration
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.EVENT_PUBLISHER = 'memory';

// Set test timeout
jest.setTimeout(10000);
