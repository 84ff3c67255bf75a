/**
 * Logging Module Index
 */

export {
  RelayLogger,
  createSilentLogger,
  type RelayLogLevel,
  type RelayLogCategory,
  type RelayLogEntry,
  type RelayLogSubscriber,
  type RelayLoggerOptions,
} from './relay-logger';
