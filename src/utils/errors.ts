import { DotkeeperError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failure modes of a reconciliation run
 */

export class UnknownCategoryError extends DotkeeperError {
  constructor(name: string, known: readonly string[]) {
    super(
      `Unknown category '${name}'. Known categories: ${known.map((k) => k.toLowerCase()).join(', ')}`,
      ErrorCodes.UNKNOWN_CATEGORY,
      { name, known: [...known] }
    );
    this.name = 'UnknownCategoryError';
  }
}

export class CyclicDependencyError extends DotkeeperError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Circular prerequisite detected: ${cycle.join(' -> ')}`, ErrorCodes.CYCLIC_DEPENDENCY, { cycle });
    this.name = 'CyclicDependencyError';
    this.cycle = cycle;
  }
}

export class HookExecutionError extends DotkeeperError {
  readonly args: string[];
  /** null when the process never started (unresolved executable, spawn failure) */
  readonly exitCode: number | null;
  readonly output: string;

  constructor(args: readonly string[], exitCode: number | null, output: string, reason?: string) {
    const summary = reason ?? `exited with code ${exitCode}`;
    super(`Hook '${args.join(' ')}' ${summary}`, ErrorCodes.HOOK_FAILED, { args: [...args], exitCode });
    this.name = 'HookExecutionError';
    this.args = [...args];
    this.exitCode = exitCode;
    this.output = output;
  }
}

export class FileSystemError extends DotkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends DotkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends DotkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof HookExecutionError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    const output = error.output.trim();
    return {
      success: false,
      error: output ? `${error.message}\n${output}` : error.message
    };
  }
  if (error instanceof DotkeeperError) {
    // Details only surface in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  }
  if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  }
  logger.debug('Unknown error occurred', { error });
  return {
    success: false,
    error: 'An unknown error occurred'
  };
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
