/**
 * @file args.test.ts
 * @description Unit tests for the demo's command-line parsing.
 */

import { describe, test, expect } from 'vitest';
import { parseDemoArgs, DEFAULT_TIME_LIMIT_S } from '../src/args.js';

describe('parseDemoArgs', () =>
{
  test('no arguments: unseeded, default time limit', () =>
  {
    expect(parseDemoArgs([])).toEqual({ ok: true, args: { seed: null, timeLimitS: DEFAULT_TIME_LIMIT_S } });
  });

  test('reads a seed and a time limit', () =>
  {
    expect(parseDemoArgs(['42', '30'])).toEqual({ ok: true, args: { seed: 42, timeLimitS: 30 } });
  });

  /** A bad seed is reported, not thrown. */
  test('rejects a non-numeric seed', () =>
  {
    expect(parseDemoArgs(['abc'])).toEqual({ ok: false, error: 'seed must be a finite number, got abc' });
  });

  test('rejects a non-positive time limit', () =>
  {
    expect(parseDemoArgs(['1', '0'])).toEqual({
      ok:    false,
      error: 'time limit must be a positive number of seconds, got 0',
    });
  });
});
