export {
  QueryListLogger,
  createLogger,
  isDebugMode,
  setDebugMode,
  type LogEntry,
  type QueryListLoggerConfig,
} from './logger.js';
