import { describe, expect, it } from 'vitest';

import { InvalidInputError } from '../errors';
import { evaluate, evaluateGuess, impliedDecimals, isEasterEgg } from '../evaluate';

describe('evaluate', () => {
  it('compares a digit string against the reference', () => {
    const result = evaluate('14159', '14158');
    expect(result.mismatches).toEqual([4]);
    expect(result.errorCount).toBe(1);
    expect(result.allMatch).toBe(false);
  });

  it.each([
    ['', '1'],
    ['14159', ''],
    ['14159', '14a59'],
    ['3.14', '314'],
  ])('rejects reference %j with input %j', (reference, input) => {
    expect(() => evaluate(reference, input)).toThrow(InvalidInputError);
  });
});

describe('evaluateGuess', () => {
  it('derives the number of decimals from the guess', () => {
    const result = evaluateGuess('3.14159');
    expect(result.decimals).toBe(5);
    expect(result.reference).toBe('3.14159');
    expect(result.allMatch).toBe(true);
  });

  it('locates an error by its position in the full guess', () => {
    const result = evaluateGuess('3.14158');
    expect(result.mismatches).toEqual([6]);
  });

  it('compares against an explicit length when one is given', () => {
    const result = evaluateGuess('3.14', { decimals: 5 });
    expect(result.reference).toBe('3.14159');
    expect(result.errorCount).toBe(0);
    expect(result.allMatch).toBe(false);
  });

  it('rejects anything that is not a decimal number', () => {
    expect(() => evaluateGuess('3.14x')).toThrow('Invalid input - NOT a float');
    expect(() => evaluateGuess('.5')).toThrow(InvalidInputError);
  });

  it('uses the whole length for guesses shorter than three characters', () => {
    expect(impliedDecimals('31')).toBe(2);
    expect(impliedDecimals('3.1')).toBe(1);
  });
});

describe('isEasterEgg', () => {
  it('recognizes the names of the constant', () => {
    expect(isEasterEgg('Archimedes')).toBe(true);
    expect(isEasterEgg('PI')).toBe(true);
    expect(isEasterEgg('pie')).toBe(false);
  });
});
