// Test setup file for Vitest
import { afterEach } from 'vitest';
import { Logger, LogLevel, LoggerConfig, initializeLogger } from '../shared/logger';

// Keep test output quiet unless explicitly asked for
const testLoggerConfig: LoggerConfig = {
  level: process.env.VERBOSE_TESTS ? LogLevel.DEBUG : LogLevel.ERROR,
  enableConsole: Boolean(process.env.VERBOSE_TESTS)
};

initializeLogger(testLoggerConfig);

// Tests that reconfigure the logger must not leak it into the next test
afterEach(() => {
  Logger.reset();
  initializeLogger(testLoggerConfig);
});
