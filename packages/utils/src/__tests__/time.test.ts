import { describe, it, expect } from 'vitest';
import { formatDuration, parseTimestamp } from '../time.js';

describe('parseTimestamp', () => {
  it('should convert hours, minutes and fractional seconds', () => {
    expect(parseTimestamp('01:02:03.50')).toBe(3723.5);
  });

  it('should accept whole seconds', () => {
    expect(parseTimestamp('00:00:42')).toBe(42);
  });

  it('should reject malformed input', () => {
    expect(parseTimestamp('N/A')).toBeNull();
    expect(parseTimestamp('00:42')).toBeNull();
  });
});

describe('formatDuration', () => {
  it('should format sub-second values in milliseconds', () => {
    expect(formatDuration(250)).toBe('250ms');
  });

  it('should format seconds, minutes and hours', () => {
    expect(formatDuration(5_000)).toBe('5s');
    expect(formatDuration(125_000)).toBe('2m 5s');
    expect(formatDuration(3_725_000)).toBe('1h 2m 5s');
  });
});
