import { describe, expect, it } from 'vitest';
import { formatDuration, parseDuration, parseOptionalDuration } from './duration.ts';

describe('parseDuration', () => {
  it('should parse unit suffixes', () => {
    expect(parseDuration('1ms')).toBe(1);
    expect(parseDuration('30s')).toBe(30_000);
    expect(parseDuration('5m')).toBe(300_000);
    expect(parseDuration('24h')).toBe(86_400_000);
  });

  it('should parse combined segments', () => {
    expect(parseDuration('1h30m')).toBe(5_400_000);
    expect(parseDuration('1.5s')).toBe(1500);
  });

  it('should treat numbers as seconds', () => {
    expect(parseDuration(2)).toBe(2000);
    expect(parseDuration('10')).toBe(10_000);
  });

  it('should reject unknown units', () => {
    expect(() => parseDuration('10d')).toThrow('invalid duration "10d"');
    expect(() => parseDuration(-1)).toThrow('non-negative');
  });

  it('should fall back when the value is absent', () => {
    expect(parseOptionalDuration(undefined, 42)).toBe(42);
    expect(parseOptionalDuration('2s', 42)).toBe(2000);
  });
});

describe('formatDuration', () => {
  it('should format short and long durations', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(2000)).toBe('2s');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(90_000)).toBe('1m30s');
    expect(formatDuration(120_000)).toBe('2m');
  });
});
