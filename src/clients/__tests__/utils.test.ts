import { describe, it, expect } from 'vitest';
import { buildQueryString, parseDurationToMs, parseResetToMs } from '../utils.js';

describe('parseDurationToMs', () => {
  it.each([
    ['6m23.456s', 383_456],
    ['1.5s', 1_500],
    ['2m0s', 120_000],
    ['0s', 0],
    ['500ms', 500],
    ['2h30m0s', 9_000_000],
  ])('parses %s', (input, expected) => {
    expect(parseDurationToMs(input)).toBe(expected);
  });
});

describe('parseResetToMs', () => {
  it('treats small numbers as seconds', () => {
    expect(parseResetToMs('30')).toBe(30_000);
    expect(parseResetToMs('0.5')).toBe(500);
  });

  it('treats large numbers as epoch seconds relative to now', () => {
    expect(parseResetToMs('1700000060', 1_700_000_000_000)).toBe(60_000);
  });

  it('clamps past epoch timestamps to zero', () => {
    expect(parseResetToMs('1700000000', 1_700_000_100_000)).toBe(0);
  });

  it('accepts duration strings', () => {
    expect(parseResetToMs('1m')).toBe(60_000);
    expect(parseResetToMs(' 45s ')).toBe(45_000);
  });

  it('returns undefined for anything else', () => {
    expect(parseResetToMs('tomorrow')).toBeUndefined();
    expect(parseResetToMs('')).toBeUndefined();
  });
});

describe('buildQueryString', () => {
  it('returns an empty string without params', () => {
    expect(buildQueryString(undefined)).toBe('');
    expect(buildQueryString({ skip: undefined })).toBe('');
  });

  it('encodes values, repeats array keys and maps null to empty', () => {
    expect(buildQueryString({ q: 'a b', ids: [1, 2], flag: true, none: null })).toBe(
      '?q=a+b&ids=1&ids=2&flag=true&none=',
    );
  });
});
