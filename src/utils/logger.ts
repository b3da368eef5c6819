import { Logger, LogLevel } from '../types/index.js';
import { ENV_VARS } from '../constants/index.js';
import type { Environment } from './env-expansion.js';

/**
 * Diagnostics logger. Everything goes to stderr so that log lines never mix
 * with the plan and diff output written to stdout.
 */

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * DOTKEEPER_VERBOSE=1 turns on debug output; NODE_ENV=development shows info.
 * Otherwise only warnings (such as undefined variables) and errors appear.
 */
export function resolveLogLevel(env: Environment): LogLevel {
  if (env[ENV_VARS.VERBOSE] === '1') {
    return LogLevel.DEBUG;
  }
  if (env.NODE_ENV === 'development') {
    return LogLevel.INFO;
  }
  return LogLevel.WARN;
}

export class DiagnosticLogger implements Logger {
  constructor(
    private readonly level: LogLevel,
    private readonly sink: LogSink = stderrSink,
    private readonly clock: () => Date = () => new Date()
  ) {}

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) {
      return;
    }
    const line = `${this.clock().toISOString()} dotkeeper ${level.toUpperCase()} ${message}`;
    this.sink(meta === undefined ? line : `${line} ${formatMeta(meta)}`);
  }
}

function formatMeta(meta: unknown): string {
  if (meta instanceof Error) {
    // JSON.stringify(new Error()) is {}
    return JSON.stringify({ name: meta.name, message: meta.message, stack: meta.stack });
  }
  if (meta !== null && typeof meta === 'object') {
    return JSON.stringify(meta, errorReplacer);
  }
  return String(meta);
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export const logger = new DiagnosticLogger(resolveLogLevel(process.env));
