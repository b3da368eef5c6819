import type { UndefinedVariablePolicy } from '../types/index.js';
import { ValidationError } from './errors.js';
import { logger } from './logger.js';

/**
 * Environment variable expansion for path templates.
 *
 * Recognized forms: `${NAME}` and `$NAME` everywhere, plus `%NAME%` when
 * percent references are enabled (Windows templates). Anything else, including
 * a lone `$` or `%`, is kept literally.
 */

const DOLLAR_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;
const DOLLAR_OR_PERCENT_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)|%([A-Za-z_][A-Za-z0-9_]*)%/g;

export type Environment = Readonly<Record<string, string | undefined>>;

export interface ExpansionOptions {
  /** Defaults to 'empty' */
  undefinedVariables?: UndefinedVariablePolicy;
  /** Also expand `%NAME%`; defaults to false */
  percentVariables?: boolean;
}

export function expandEnvironmentVariables(
  template: string,
  env: Environment,
  options: ExpansionOptions = {}
): string {
  const policy = options.undefinedVariables ?? 'empty';
  const pattern = options.percentVariables ? DOLLAR_OR_PERCENT_PATTERN : DOLLAR_PATTERN;

  return template.replace(
    pattern,
    (_match: string, braced?: string, bare?: string, percent?: string): string => {
      const name = braced ?? bare ?? percent ?? '';
      const value = env[name];
      if (value !== undefined) {
        return value;
      }
      if (policy === 'error') {
        throw new ValidationError(`environment variable '${name}' is not defined`, { name, template });
      }
      logger.warn(`Environment variable '${name}' is not defined; expanding to an empty string`, { template });
      return '';
    }
  );
}
