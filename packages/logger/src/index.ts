export { createLogger } from './logger';
export { createFileSink, createMemorySink, type MemorySink } from './sinks';
export type {
  ConsoleTarget,
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types';
