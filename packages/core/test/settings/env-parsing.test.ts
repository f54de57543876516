/**
 * @fileoverview Tests for environment parsing helpers
 */
import { describe, it, expect, vi } from 'vitest';
import { parseEnvChoice, parseEnvInteger, parseEnvString } from '../../src/settings/env-parsing.js';

describe('parseEnvInteger', () => {
  it('should return the fallback when unset', () => {
    expect(parseEnvInteger(undefined, { name: 'X', fallback: 5 })).toBe(5);
  });

  it('should parse trimmed integers', () => {
    expect(parseEnvInteger(' 2500 ', { name: 'X', fallback: 5 })).toBe(2500);
  });

  it.each([
    ['1.5', 'not_an_integer'],
    ['10ms', 'not_an_integer'],
    ['99999999999999999999', 'not_a_safe_integer'],
    ['0', 'below_min_1'],
    ['100', 'above_max_50'],
  ])('should reject %s as %s and warn', (raw, reason) => {
    const warn = vi.fn();

    expect(parseEnvInteger(raw, { name: 'PAPERKIT_POLL_INTERVAL_MS', fallback: 5, min: 1, max: 50, logger: { warn } })).toBe(5);
    expect(warn).toHaveBeenCalledWith('Invalid environment value, using fallback', {
      variable: 'PAPERKIT_POLL_INTERVAL_MS',
      value: raw,
      reason,
      fallback: 5,
    });
  });
});

describe('parseEnvChoice', () => {
  const choices = ['debug', 'info', 'warn'] as const;

  it('should match case-insensitively', () => {
    expect(parseEnvChoice('DEBUG', { name: 'L', fallback: 'info', choices })).toBe('debug');
  });

  it('should fall back on an unknown value', () => {
    const warn = vi.fn();
    expect(parseEnvChoice('loud', { name: 'L', fallback: 'info', choices, logger: { warn } })).toBe('info');
    expect(warn).toHaveBeenCalledWith('Invalid environment value, using fallback', {
      variable: 'L',
      value: 'loud',
      reason: 'not_a_choice',
      fallback: 'info',
    });
  });
});

describe('parseEnvString', () => {
  it('should treat blank values as unset', () => {
    expect(parseEnvString('   ')).toBeUndefined();
    expect(parseEnvString(undefined)).toBeUndefined();
    expect(parseEnvString(' Spooler ')).toBe('Spooler');
  });
});
