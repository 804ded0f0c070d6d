export {
  logger,
  LogLevel,
  PlatformLoggingClient,
  type LoggingClient,
  type LogContext,
  type LogEntry,
  type LogThreshold,
} from './client';
