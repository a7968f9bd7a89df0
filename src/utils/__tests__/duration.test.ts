import { describe, it, expect } from 'vitest';
import { formatDuration, parseDuration, HOUR, MAX_DURATION, MINUTE, SECOND } from '../duration.js';
import { InvalidDurationError } from '../errors.js';

describe('parseDuration', () => {
  it('should parse single units', () => {
    expect(parseDuration('30s')).toBe(30 * SECOND);
    expect(parseDuration('2m')).toBe(2 * MINUTE);
    expect(parseDuration('1h')).toBe(HOUR);
    expect(parseDuration('250ms')).toBe(250);
  });

  it('should parse combined units', () => {
    expect(parseDuration('1h30m')).toBe(90 * MINUTE);
    expect(parseDuration('2h45m10s')).toBe(2 * HOUR + 45 * MINUTE + 10 * SECOND);
    expect(parseDuration('1m500ms')).toBe(60500);
  });

  it('should parse fractional values', () => {
    expect(parseDuration('1.5h')).toBe(90 * MINUTE);
    expect(parseDuration('.5s')).toBe(500);
    expect(parseDuration('2.s')).toBe(2000);
  });

  it('should parse sub-millisecond units', () => {
    expect(parseDuration('1500us')).toBeCloseTo(1.5);
    expect(parseDuration('1500µs')).toBeCloseTo(1.5);
    expect(parseDuration('2000000ns')).toBeCloseTo(2);
  });

  it('should accept a sign', () => {
    expect(parseDuration('-1m')).toBe(-MINUTE);
    expect(parseDuration('+10s')).toBe(10 * SECOND);
  });

  it('should accept a bare zero', () => {
    expect(parseDuration('0')).toBe(0);
    expect(parseDuration('-0')).toBe(0);
  });

  it('should reject malformed input', () => {
    for (const input of ['', '-', 'notaduration', '10', 's', '1d', '1h30', '1m x', ' 1m', '1..5s']) {
      expect(() => parseDuration(input), input).toThrow(InvalidDurationError);
    }
  });

  it('should reject values beyond the int64 nanosecond range', () => {
    expect(parseDuration('2562047h')).toBe(2562047 * HOUR);
    expect(() => parseDuration('2562048h')).toThrow(InvalidDurationError);
    expect(() => parseDuration('3000000h')).toThrow("'3000000h' is not a valid duration");
    expect(() => parseDuration('2562047h48m')).toThrow(InvalidDurationError);
    expect(2562047 * HOUR).toBeLessThan(MAX_DURATION);
  });

  it('should quote the input in the error message', () => {
    expect(() => parseDuration('soon')).toThrow("'soon' is not a valid duration");
  });
});

describe('formatDuration', () => {
  it('should print zero as 0s', () => {
    expect(formatDuration(0)).toBe('0s');
  });

  it('should print seconds, minutes and hours', () => {
    expect(formatDuration(30 * SECOND)).toBe('30s');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(2 * MINUTE)).toBe('2m0s');
    expect(formatDuration(90 * SECOND)).toBe('1m30s');
    expect(formatDuration(90 * MINUTE)).toBe('1h30m0s');
    expect(formatDuration(HOUR + 5 * SECOND)).toBe('1h0m5s');
  });

  it('should print sub-second values in smaller units', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(1.5)).toBe('1.5ms');
    expect(formatDuration(0.25)).toBe('250µs');
    expect(formatDuration(0.0001)).toBe('100ns');
  });

  it('should carry rounded seconds into the next minute', () => {
    expect(formatDuration(59999.9999999)).toBe('1m0s');
    expect(formatDuration(HOUR - 0.0000001)).toBe('1h0m0s');
  });

  it('should keep the sign', () => {
    expect(formatDuration(-MINUTE)).toBe('-1m0s');
  });

  it('should print what parseDuration reads back', () => {
    for (const input of ['45s', '2m0s', '1h30m0s', '300ms']) {
      expect(formatDuration(parseDuration(input))).toBe(input);
    }
  });
});
