/**
 * Shared constants for the dotkeeper CLI
 */

export const DIR_PATTERNS = {
  /** Default repository location, relative to the home directory */
  REPOSITORY: '.dotfiles',
  /** Per-user configuration directory, relative to the home directory */
  CONFIG: '.dotkeeper',
  /** Staging area for atomic replaces, relative to the repository root */
  SCRATCH: 'tmp'
} as const;

export const FILE_PATTERNS = {
  CONFIG_JSONC: 'config.jsonc',
  CONFIG_JSON: 'config.json'
} as const;

export const ENV_VARS = {
  REPOSITORY: 'DOTKEEPER_REPOSITORY',
  VERBOSE: 'DOTKEEPER_VERBOSE',
  STRICT_ENV: 'DOTKEEPER_STRICT_ENV'
} as const;

/** Owner-only permissions for directories created on the OS side */
export const PRIVATE_DIR_MODE = 0o700;
