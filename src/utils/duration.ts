/**
 * Duration string utilities
 *
 * Parses and formats the compact duration notation accepted by OKTETO_TIMEOUT,
 * e.g. "30s", "2m", "1h30m", "1.5h", "300ms".
 */

import { InvalidDurationError } from './errors.js';

/**
 * Duration in milliseconds. Sub-millisecond units are kept as fractions.
 */
export type Duration = number;

export const SECOND: Duration = 1000;
export const MINUTE: Duration = 60 * SECOND;
export const HOUR: Duration = 60 * MINUTE;

/** Largest duration representable as int64 nanoseconds (about 2562047h) */
export const MAX_DURATION: Duration = 9223372036854.775807;

const NS_PER_MS = 1e6;
const NS_PER_SECOND = 1e9;
const NS_PER_MINUTE = 60 * NS_PER_SECOND;
const NS_PER_HOUR = 60 * NS_PER_MINUTE;

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3, // U+00B5 micro sign
  'μs': 1e-3, // U+03BC greek mu
  ms: 1,
  s: SECOND,
  m: MINUTE,
  h: HOUR
};

// Longer units first so "ms" wins over "m"
const SEGMENT = /^(\d+\.?\d*|\.\d+)(ns|us|µs|μs|ms|s|m|h)/;

/**
 * Parse a duration string
 *
 * A duration is an optional sign followed by one or more decimal numbers,
 * each with a unit suffix. The bare string "0" is also accepted.
 *
 * @throws InvalidDurationError when the input does not follow the grammar
 * or exceeds MAX_DURATION
 *
 * @example
 * parseDuration('2m')     // => 120000
 * parseDuration('1h30m')  // => 5400000
 * parseDuration('250ms')  // => 250
 */
export function parseDuration(input: string): Duration {
  let rest = input;
  let sign = 1;

  if (rest.startsWith('-') || rest.startsWith('+')) {
    sign = rest[0] === '-' ? -1 : 1;
    rest = rest.slice(1);
  }

  if (rest === '0') {
    return 0;
  }
  if (rest === '') {
    throw new InvalidDurationError(input);
  }

  let total = 0;
  while (rest.length > 0) {
    const match = SEGMENT.exec(rest);
    if (!match) {
      throw new InvalidDurationError(input);
    }

    const [segment, value, unit] = match;
    total += parseFloat(value) * UNIT_MS[unit];
    if (total > MAX_DURATION) {
      throw new InvalidDurationError(input);
    }
    rest = rest.slice(segment.length);
  }

  return sign * total;
}

function formatNumber(value: number): string {
  return String(Number(value.toFixed(9)));
}

/**
 * Format a duration the way it is printed back to users:
 * "0s", "500ms", "1.5s", "2m0s", "1h30m0s".
 */
export function formatDuration(duration: Duration): string {
  // Round to whole nanoseconds before splitting so 59.9999999999s carries into 1m0s
  let remaining = Math.round(Math.abs(duration) * NS_PER_MS);
  if (remaining === 0) {
    return '0s';
  }

  const sign = duration < 0 ? '-' : '';

  if (remaining < NS_PER_SECOND) {
    if (remaining < 1e3) {
      return `${sign}${remaining}ns`;
    }
    if (remaining < NS_PER_MS) {
      return `${sign}${formatNumber(remaining / 1e3)}µs`;
    }
    return `${sign}${formatNumber(remaining / NS_PER_MS)}ms`;
  }

  const hours = Math.floor(remaining / NS_PER_HOUR);
  remaining -= hours * NS_PER_HOUR;
  const minutes = Math.floor(remaining / NS_PER_MINUTE);
  remaining -= minutes * NS_PER_MINUTE;

  let out = `${formatNumber(remaining / NS_PER_SECOND)}s`;
  if (hours > 0 || minutes > 0) {
    out = `${minutes}m${out}`;
  }
  if (hours > 0) {
    out = `${hours}h${out}`;
  }

  return `${sign}${out}`;
}
