import { MAX_PORT } from '../specs.js';

export function parseInteger(string_: string | number): number | null {
  const value = typeof string_ === 'string' ? parseInt(string_, 10) : string_;

  if (
    !Number.isInteger(value) ||
    value < 0 ||
    Number.isNaN(value) ||
    !Number.isSafeInteger(value) ||
    `${string_}` !== `${value}`
  ) {
    return null;
  }
  return value;
}

/** `1*DIGIT` as written on the wire; leading zeros are allowed. */
export function parseDigits(digits: string): number | null {
  if (!/^[0-9]+$/.test(digits)) {
    return null;
  }
  const value = Number(digits);
  return Number.isSafeInteger(value) ? value : null;
}

export function isValidPort(port: string | number): boolean {
  const value = typeof port === 'string' ? parseDigits(port) : parseInteger(port);

  return (
    value !== null &&
    value >= 1 &&
    value <= MAX_PORT
  );
}
