import { compareDigits } from './diff';
import { piWithDecimals } from './digits';
import { InvalidInputError } from './errors';
import type { CompareResult } from './types';

const DIGITS_PATTERN = /^[0-9]+$/;
const GUESS_PATTERN = /^[0-9]+(\.[0-9]+)?$/;

const EASTER_EGGS = new Set(['Archimedes', 'pi', 'PI']);

export const ARCHIMEDES_NOTE = [
  'π is also called Archimedes constant and is commonly defined as',
  'the ratio of a circles circumference C to its diameter d:',
  'π = C / d',
].join('\n');

export function evaluate(referenceDigits: string, userInput: string): CompareResult {
  if (!DIGITS_PATTERN.test(referenceDigits)) {
    throw new InvalidInputError('Invalid reference - expected a non-empty string of digits');
  }
  if (!DIGITS_PATTERN.test(userInput)) {
    throw new InvalidInputError('Invalid input - expected a non-empty string of digits');
  }
  return compareDigits(referenceDigits, userInput);
}

export interface GuessEvaluation extends CompareResult {
  guess: string;
  reference: string;
  decimals: number;
}

export function isEasterEgg(input: string): boolean {
  return EASTER_EGGS.has(input);
}

/** Decimals implied by a guess such as "3.14159" when no explicit length is given. */
export function impliedDecimals(guess: string): number {
  return guess.length >= 3 ? guess.length - 2 : guess.length;
}

export function evaluateGuess(guess: string, options: { decimals?: number } = {}): GuessEvaluation {
  if (!GUESS_PATTERN.test(guess)) {
    throw new InvalidInputError('Invalid input - NOT a float');
  }

  const decimals = options.decimals ?? impliedDecimals(guess);
  const reference = piWithDecimals(decimals);
  const result = compareDigits(reference, guess);
  return { ...result, guess, reference, decimals };
}
