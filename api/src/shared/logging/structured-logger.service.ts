import { Inject, Injectable, LoggerService, Optional } from '@nestjs/common';

export type LogLevel = 'error' | 'warn' | 'log' | 'debug' | 'verbose';

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  log: 2,
  debug: 3,
  verbose: 4
};

type LogSink = (line: string) => void;

export type LoggerSinks = {
  stdout: LogSink;
  stderr: LogSink;
};

export const LOGGER_SINKS = 'LOGGER_SINKS';
export const LOG_LEVEL = 'LOG_LEVEL';

const consoleSinks: LoggerSinks = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line)
};

export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }

  return env.NODE_ENV === 'production' ? 'log' : 'debug';
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

@Injectable()
export class StructuredLoggerService implements LoggerService {
  private readonly threshold: number;
  private readonly sinks: LoggerSinks;

  constructor(
    @Optional() @Inject(LOGGER_SINKS) sinks?: LoggerSinks,
    @Optional() @Inject(LOG_LEVEL) level?: LogLevel
  ) {
    this.sinks = sinks ?? consoleSinks;
    this.threshold = LEVEL_ORDER[level ?? resolveLogLevel()];
  }

  log(message: unknown, context?: string): void {
    this.write('log', message, context);
  }

  error(message: unknown, trace?: string, context?: string): void {
    this.write('error', message, context, trace);
  }

  warn(message: unknown, context?: string): void {
    this.write('warn', message, context);
  }

  debug(message: unknown, context?: string): void {
    this.write('debug', message, context);
  }

  verbose(message: unknown, context?: string): void {
    this.write('verbose', message, context);
  }

  private write(level: LogLevel, message: unknown, context?: string, trace?: string): void {
    if (LEVEL_ORDER[level] > this.threshold) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      context: context ?? 'app',
      message,
      trace
    };

    if (level === 'error') {
      this.sinks.stderr(JSON.stringify(payload));
      return;
    }

    this.sinks.stdout(JSON.stringify(payload));
  }
}
