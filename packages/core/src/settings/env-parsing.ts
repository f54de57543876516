/**
 * @fileoverview Environment parsing helpers
 *
 * Strict parsing for environment-driven settings overrides. Invalid values
 * are reported through the logger and the previous value is kept.
 */

export interface EnvParseLogger {
  warn: (message: string, context?: Record<string, unknown>) => void;
}

export interface ParseEnvIntegerOptions {
  name: string;
  fallback: number;
  min?: number;
  max?: number;
  logger?: EnvParseLogger;
}

export interface ParseEnvChoiceOptions<T extends string> {
  name: string;
  fallback: T;
  choices: readonly T[];
  logger?: EnvParseLogger;
}

const INTEGER_PATTERN = /^-?\d+$/;

function logInvalid(
  logger: EnvParseLogger | undefined,
  name: string,
  raw: string,
  reason: string,
  fallback: number | string
): void {
  logger?.warn('Invalid environment value, using fallback', {
    variable: name,
    value: raw,
    reason,
    fallback,
  });
}

function integerRejection(
  value: number,
  options: { min?: number; max?: number }
): string | undefined {
  if (!Number.isSafeInteger(value)) {
    return 'not_a_safe_integer';
  }
  if (options.min !== undefined && value < options.min) {
    return `below_min_${options.min}`;
  }
  if (options.max !== undefined && value > options.max) {
    return `above_max_${options.max}`;
  }
  return undefined;
}

/**
 * Parse an integer environment value with fallback.
 */
export function parseEnvInteger(
  raw: string | undefined,
  options: ParseEnvIntegerOptions
): number {
  if (raw === undefined) {
    return options.fallback;
  }

  const normalized = raw.trim();
  if (!INTEGER_PATTERN.test(normalized)) {
    logInvalid(options.logger, options.name, raw, 'not_an_integer', options.fallback);
    return options.fallback;
  }

  const value = Number(normalized);
  const reason = integerRejection(value, options);
  if (reason !== undefined) {
    logInvalid(options.logger, options.name, raw, reason, options.fallback);
    return options.fallback;
  }

  return value;
}

/**
 * Parse an environment value that must be one of a fixed set of strings.
 * Matching is case-insensitive.
 */
export function parseEnvChoice<T extends string>(
  raw: string | undefined,
  options: ParseEnvChoiceOptions<T>
): T {
  if (raw === undefined) {
    return options.fallback;
  }

  const normalized = raw.trim().toLowerCase();
  const match = options.choices.find((choice) => choice.toLowerCase() === normalized);
  if (match === undefined) {
    logInvalid(options.logger, options.name, raw, 'not_a_choice', options.fallback);
    return options.fallback;
  }
  return match;
}

/**
 * Read a non-empty string environment value.
 */
export function parseEnvString(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}
