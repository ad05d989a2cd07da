import type { CompareResult, DigitMatch } from './types';

export function compareDigits(reference: string, user: string): CompareResult {
  const positions: DigitMatch[] = [];
  const mismatches: number[] = [];

  for (let index = 0; index < user.length; index += 1) {
    const expected = index < reference.length ? reference[index] : null;
    const actual = user[index];
    const match = expected === actual;
    positions.push({ index, expected, actual, match });
    if (!match) mismatches.push(index);
  }

  return {
    positions,
    mismatches,
    errorCount: mismatches.length,
    allMatch: reference === user,
  };
}

export type StreamResult =
  | { kind: 'match'; index: number }
  | { kind: 'mismatch'; index: number; expected: string | null; actual: string };

/**
 * Compares keystrokes one at a time against a reference. Only digit identity
 * counts: a wrong digit is a mismatch however close it is.
 */
export class DigitStream {
  private readonly reference: string;

  private cursor = 0;

  private errors = 0;

  constructor(reference: string) {
    this.reference = reference;
  }

  next(actual: string): StreamResult {
    const index = this.cursor;
    const expected = index < this.reference.length ? this.reference[index] : null;
    if (expected !== null && expected === actual) {
      this.cursor += 1;
      return { kind: 'match', index };
    }
    this.errors += 1;
    return { kind: 'mismatch', index, expected, actual };
  }

  get position(): number {
    return this.cursor;
  }

  get errorCount(): number {
    return this.errors;
  }
}
