/**
 * Jest setup file for the reference loader tests
 */

process.env.NODE_ENV = 'test';
// Loggers read LOG_LEVEL when their module loads
process.env.LOG_LEVEL = 'silent';

jest.setTimeout(10000);

// Mock console methods to reduce noise in tests
global.console = {
  ...console,
  log: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: console.error, // Keep error logging for debugging
};
