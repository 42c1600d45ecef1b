import { Duration, NANOSECOND, SECOND } from '../types/report';

const DECIMAL = /^([-+]?)(\d*)(?:\.(\d*))?$/;

/**
 * Read a decimal literal as a count of `unit`. The fraction is truncated to
 * whole nanoseconds. Returns null for anything that is not a decimal literal.
 */
function parseDecimal(text: string, unit: Duration): Duration | null {
  const match = text.match(DECIMAL);
  if (!match) return null;

  const [, sign, whole, fraction = ''] = match;
  if (whole === '' && fraction === '') return null;

  let value = (whole === '' ? 0 : Number(whole)) * unit;
  if (fraction !== '') {
    const scale = Math.pow(10, fraction.length);
    value += Math.trunc(Number(fraction) * (unit / scale));
  }
  if (!Number.isSafeInteger(value)) return null;

  return sign === '-' && value !== 0 ? -value : value;
}

/**
 * Parse a seconds value such as "0.010". Empty or malformed input is 0.
 */
export function parseSeconds(text: string): Duration {
  if (text === '') return 0;
  return parseDecimal(text, SECOND) ?? 0;
}

/**
 * Parse a nanoseconds value such as "1523" or "0.52". Precision below one
 * nanosecond is dropped, so "0.52" is 0.
 */
export function parseNanoseconds(text: string): Duration {
  if (text === '') return 0;
  return parseDecimal(text, NANOSECOND) ?? 0;
}
