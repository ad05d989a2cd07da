import { describe, expect, it } from 'vitest';

import { DigitStream, compareDigits } from '../diff';

function naiveMismatches(reference: string, user: string): number[] {
  const result: number[] = [];
  const limit = Math.min(reference.length, user.length);
  for (let i = 0; i < limit; i += 1) {
    if (reference[i] !== user[i]) result.push(i);
  }
  return result;
}

describe('compareDigits', () => {
  it('flags the single wrong digit', () => {
    const result = compareDigits('14159', '14158');
    expect(result.mismatches).toEqual([4]);
    expect(result.errorCount).toBe(1);
    expect(result.allMatch).toBe(false);
    expect(result.positions[4]).toEqual({ index: 4, expected: '9', actual: '8', match: false });
  });

  it('finds no mismatches when a sequence is compared with itself', () => {
    for (const value of ['1', '14159', '3.14159265', '000000']) {
      const result = compareDigits(value, value);
      expect(result.mismatches).toEqual([]);
      expect(result.allMatch).toBe(true);
    }
  });

  it('reports exactly the differing indices within the common length', () => {
    const pairs: [string, string][] = [
      ['14159265', '14259266'],
      ['14159', '41951'],
      ['1415926535', '1415'],
      ['999999', '989898'],
    ];
    for (const [reference, user] of pairs) {
      expect(compareDigits(reference, user).mismatches).toEqual(naiveMismatches(reference, user));
    }
  });

  it('counts digits typed past the end of the reference as errors', () => {
    const result = compareDigits('141', '14159');
    expect(result.mismatches).toEqual([3, 4]);
    expect(result.positions[3]).toEqual({ index: 3, expected: null, actual: '5', match: false });
  });

  it('does not call a short prefix a full match', () => {
    const result = compareDigits('14159', '141');
    expect(result.errorCount).toBe(0);
    expect(result.allMatch).toBe(false);
  });
});

describe('DigitStream', () => {
  it('advances on matches and reports the expected digit on a mismatch', () => {
    const stream = new DigitStream('14159');
    expect(stream.next('1')).toEqual({ kind: 'match', index: 0 });
    expect(stream.next('4')).toEqual({ kind: 'match', index: 1 });
    expect(stream.next('2')).toEqual({ kind: 'mismatch', index: 2, expected: '1', actual: '2' });
    expect(stream.position).toBe(2);
    expect(stream.errorCount).toBe(1);
  });

  it('treats a near miss as a plain mismatch', () => {
    const stream = new DigitStream('9');
    expect(stream.next('8').kind).toBe('mismatch');
  });

  it('reports every key past the end as a mismatch', () => {
    const stream = new DigitStream('1');
    stream.next('1');
    expect(stream.next('4')).toEqual({ kind: 'mismatch', index: 1, expected: null, actual: '4' });
  });
});
