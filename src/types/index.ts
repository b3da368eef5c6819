/**
 * Shared types for the dotkeeper CLI
 */

export type OperatingSystem = 'linux' | 'darwin' | 'windows';

export const OPERATING_SYSTEMS: readonly OperatingSystem[] = ['linux', 'darwin', 'windows'];

/**
 * How an undefined environment variable inside a path template is treated.
 * - empty: expands to '' (shell semantics)
 * - error: resolution fails
 */
export type UndefinedVariablePolicy = 'empty' | 'error';

export interface DotkeeperConfig {
  /** Absolute path to the dotfiles repository root */
  repository: string;
  /** Policy for undefined variables in OS-side path templates */
  undefinedVariables: UndefinedVariablePolicy;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class DotkeeperError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DotkeeperError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  UNKNOWN_CATEGORY = 'UNKNOWN_CATEGORY',
  CYCLIC_DEPENDENCY = 'CYCLIC_DEPENDENCY',
  HOOK_FAILED = 'HOOK_FAILED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
