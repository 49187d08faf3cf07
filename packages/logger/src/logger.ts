/** Unified logger with optional sink persistence */

import type {
  ConsoleTarget,
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types';

/** Environment-specific configurations */
const ENVIRONMENT_CONFIGS: Record<Environment, EnvironmentConfig> = {
  test: {
    minLevel: 'debug', // Log everything in tests
    includeStackTraces: true,
    bufferSize: 1000, // Large buffer, flush less often
  },
  development: {
    minLevel: 'info', // Skip debug logs
    includeStackTraces: true,
    bufferSize: 50,
  },
  production: {
    minLevel: 'warn', // Only warnings and errors
    includeStackTraces: false,
    bufferSize: 50,
  },
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

class LoggerImpl implements Logger {
  protected metadata: Record<string, unknown>;
  private buffer: LogEntry[] = [];
  private sink?: LogSink;
  private bufferSize: number;
  private consoleOnly: boolean;
  private consoleTarget: ConsoleTarget;
  private environment: Environment;
  private envConfig: EnvironmentConfig;

  constructor(config: LoggerConfig, parentMetadata: Record<string, unknown> = {}) {
    this.metadata = parentMetadata;
    this.sink = config.sink;
    this.consoleOnly = config.consoleOnly ?? false;
    this.consoleTarget = config.console ?? 'stdout';
    this.environment = config.environment ?? 'development';
    this.envConfig = ENVIRONMENT_CONFIGS[this.environment];
    this.bufferSize = config.bufferSize ?? this.envConfig.bufferSize;

    // Validate: if not console-only, a sink is required
    if (!this.consoleOnly && !this.sink) {
      throw new Error('LoggerConfig.sink is required when consoleOnly is false');
    }
  }

  child(metadata: Record<string, unknown>): Logger {
    return new LoggerImpl(
      {
        sink: this.sink,
        bufferSize: this.bufferSize,
        consoleOnly: this.consoleOnly,
        console: this.consoleTarget,
        environment: this.environment,
      },
      { ...this.metadata, ...metadata },
    );
  }

  debug(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('debug', event_type, metadata);
  }

  info(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('info', event_type, metadata);
  }

  warn(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('warn', event_type, metadata);
  }

  error(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('error', event_type, metadata);
  }

  fatal(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('fatal', event_type, metadata);
    // Fatal logs flush immediately (don't wait for batch)
    this.flush().catch((err: unknown) => {
      console.error('Failed to flush fatal log:', err);
    });
  }

  private log(level: LogLevel, event_type: string, metadata?: Record<string, unknown>): void {
    // Check if this log level should be emitted based on environment config
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.envConfig.minLevel]) {
      return; // Skip logs below minimum level
    }

    const entry: LogEntry = {
      id: this.generateId(),
      level,
      event_type,
      metadata: this.serializeMetadata({ ...this.metadata, ...metadata }),
      timestamp: Date.now(),
    };

    this.logToConsole(entry);

    // Buffer for the sink only if not console-only mode (skip debug level)
    if (!this.consoleOnly && level !== 'debug') {
      this.buffer.push(entry);

      // Auto-flush on buffer threshold
      if (this.buffer.length >= this.bufferSize) {
        this.flush().catch((err: unknown) => {
          console.error('Failed to auto-flush logs:', err);
        });
      }
    }
  }

  async flush(): Promise<void> {
    // No-op for console-only mode or if no buffer
    if (this.consoleOnly || !this.sink || this.buffer.length === 0) {
      return;
    }

    const toFlush = [...this.buffer];
    this.buffer = [];

    try {
      await this.sink.write(toFlush);
    } catch (err) {
      // On failure, log to console but don't re-throw
      console.error('Failed to flush logs to sink:', err, {
        entries: toFlush.length,
      });
    }
  }

  /** Errors in metadata become plain objects so they survive JSON */
  private serializeMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
      result[key] =
        value instanceof Error
          ? {
              name: value.name,
              message: value.message,
              ...(this.envConfig.includeStackTraces ? { stack: value.stack } : {}),
            }
          : value;
    }
    return result;
  }

  protected logToConsole(entry: LogEntry): void {
    if (this.consoleTarget === 'none') {
      return;
    }
    const logData = {
      level: entry.level,
      event_type: entry.event_type,
      metadata: entry.metadata,
      timestamp: new Date(entry.timestamp).toISOString(),
    };
    if (this.consoleTarget === 'stderr') {
      console.error(JSON.stringify(logData));
    } else {
      console.log(JSON.stringify(logData));
    }
  }

  protected generateId(): string {
    // Simple ID generation: timestamp + random suffix
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 9);
    return `log_${timestamp}_${random}`;
  }
}

export function createLogger(config: LoggerConfig): Logger {
  return new LoggerImpl(config);
}
