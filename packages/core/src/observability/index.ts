export {
  BenchLogger,
  createLogger,
  isDebugMode,
  isLogLevel,
  setDebugMode,
  silentLogger,
  type BenchLoggerConfig,
  type LogEntry,
  type LogLevel,
} from './logger.js';
