export {
  Logger,
  createLogger,
  configure as configureLogging,
  getLoggingConfig,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LoggerConfig,
} from './logger.js';

export {
  StreamError,
  ConnectionError,
  AuthenticationError,
  TimeoutError,
  NotConnectedError,
  ClientClosedError,
  ConfigError,
  ValidationError,
  ReconnectExhaustedError,
  toError,
  toErrorMessage,
  type StreamErrorCode,
} from './errors.js';
