import fs from 'node:fs';
import { fileURLToPath } from 'node:url';

import { DigitTableError, OutOfRangeError } from './errors';

/** Number of decimals shipped in data/pi-digits.txt. */
export const MAX_DIGITS = 5001;

export const DEFAULT_DISPLAY_DIGITS = 15;

const TABLE_URL = new URL('../../data/pi-digits.txt', import.meta.url);

// First 50 decimals, checked against the loaded table.
const KNOWN_PREFIX = '14159265358979323846264338327950288419716939937510';

let table: string | null = null;

function loadTable(): string {
  let raw: string;
  try {
    raw = fs.readFileSync(fileURLToPath(TABLE_URL), 'utf8');
  } catch (error) {
    throw new DigitTableError(`Cannot read the π digit table at ${fileURLToPath(TABLE_URL)}.`, error);
  }

  const digitsOnly = raw.trim();
  if (!/^[0-9]+$/.test(digitsOnly)) {
    throw new DigitTableError('The π digit table contains characters other than digits.');
  }
  if (digitsOnly.length < MAX_DIGITS) {
    throw new DigitTableError(`The π digit table holds ${digitsOnly.length} digits, expected ${MAX_DIGITS}.`);
  }
  if (!digitsOnly.startsWith(KNOWN_PREFIX)) {
    throw new DigitTableError('The π digit table does not start with the known digits of π.');
  }

  return digitsOnly.slice(0, MAX_DIGITS);
}

function getTable(): string {
  if (!table) {
    table = loadTable();
  }
  return table;
}

/** First `length` decimal digits of π, without the leading "3.". */
export function digits(length: number): string {
  if (!Number.isInteger(length) || length < 1 || length > MAX_DIGITS) {
    throw new OutOfRangeError(length, MAX_DIGITS);
  }
  return getTable().slice(0, length);
}

/** `-p 0` and negative lengths fall back to the default display length. */
export function displayDecimals(length: number): number {
  return length <= 0 ? DEFAULT_DISPLAY_DIGITS : length;
}

export function piWithDecimals(length: number): string {
  return `3.${digits(displayDecimals(length))}`;
}
