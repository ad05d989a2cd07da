import { describe, expect, it } from 'vitest';

import { PracticeSession } from '../session';
import type { SessionEvent, SessionOptions } from '../session';

const REFERENCE = '14159265358979323846';

function createSession(overrides: Partial<SessionOptions> = {}): PracticeSession {
  return new PracticeSession({
    reference: REFERENCE,
    mode: 'standard',
    startDigits: 3,
    maxDigits: 10,
    chunkSize: 4,
    ...overrides,
  });
}

function pressAll(session: PracticeSession, keys: string): SessionEvent[] {
  return keys.split('').flatMap((key) => session.press(key));
}

describe('PracticeSession', () => {
  it('starts idle and moves to awaiting a digit', () => {
    const session = createSession();
    expect(session.state).toBe('idle');
    session.start();
    expect(session.state).toBe('awaitingDigit');
  });

  it('emits a digit event per correct key and announces the goal once', () => {
    const session = createSession();
    const events = pressAll(session, '1415');

    expect(events).toEqual([
      { type: 'digit', index: 0, digit: '1' },
      { type: 'digit', index: 1, digit: '4' },
      { type: 'digit', index: 2, digit: '1' },
      { type: 'goal', digitsAchieved: 3 },
      { type: 'digit', index: 3, digit: '5' },
    ]);
    expect(session.digitsAchieved).toBe(4);
    expect(session.isEnded).toBe(false);
  });

  it('ends on the first wrong digit', () => {
    const session = createSession();
    const events = pressAll(session, '148');

    expect(events.at(-1)).toEqual({ type: 'ended', reason: 'mismatch', success: false, expected: '1', actual: '8' });
    expect(session.digitsAchieved).toBe(2);
    expect(session.errorCount).toBe(1);
    expect(session.success).toBe(false);
    expect(session.endReason).toBe('mismatch');
  });

  it('ignores keys after the session has ended', () => {
    const session = createSession();
    pressAll(session, '9');
    expect(session.press('1')).toEqual([]);
    expect(session.expire()).toEqual([]);
    expect(session.interrupt()).toEqual([]);
    expect(session.endReason).toBe('mismatch');
  });

  it('ignores keys that are not digits', () => {
    const session = createSession();
    expect(session.press('x')).toEqual([]);
    expect(session.press(' ')).toEqual([]);
    expect(session.digitsAchieved).toBe(0);
    expect(session.errorCount).toBe(0);
  });

  it('completes successfully at the maximum', () => {
    const session = createSession({ maxDigits: 5 });
    const events = pressAll(session, '14159');

    expect(events.at(-1)).toEqual({ type: 'ended', reason: 'completed', success: true, expected: null, actual: null });
    expect(session.success).toBe(true);
    expect(session.digitsAchieved).toBe(5);
  });

  it('clamps the goal to the maximum', () => {
    const session = createSession({ startDigits: 50, maxDigits: 5 });
    expect(session.startDigits).toBe(5);
  });

  it('pauses at every chunk boundary in chunk mode', () => {
    const session = createSession({ mode: 'chunk', startDigits: 1 });
    const events = pressAll(session, '1415');

    expect(events.filter((event) => event.type === 'checkpoint')).toEqual([
      { type: 'checkpoint', digitsAchieved: 4, chunk: 1 },
    ]);
    expect(session.state).toBe('chunkCheckpoint');

    session.press('9');
    expect(session.state).toBe('awaitingDigit');
    expect(session.digitsAchieved).toBe(5);
  });

  it('does not emit checkpoints outside chunk mode', () => {
    const session = createSession({ startDigits: 1 });
    const events = pressAll(session, '14159265');
    expect(events.some((event) => event.type === 'checkpoint')).toBe(false);
  });

  it('ends with a timeout on expiry', () => {
    const session = createSession({ mode: 'timed' });
    pressAll(session, '14');
    expect(session.expire()).toEqual([
      { type: 'ended', reason: 'timeout', success: false, expected: null, actual: null },
    ]);
    expect(session.digitsAchieved).toBe(2);
  });

  it('builds a record once ended', () => {
    const session = createSession({ mode: 'chunk' });
    pressAll(session, '1410');
    const timestamp = new Date('2024-03-14T01:59:26.000Z');

    expect(session.toRecord(timestamp, 4.5)).toEqual({
      timestamp,
      mode: 'chunk',
      digitsAchieved: 3,
      elapsedSeconds: 4.5,
      errorCount: 1,
      success: false,
    });
  });

  it('refuses to build a record for a running session', () => {
    const session = createSession();
    session.press('1');
    expect(() => session.toRecord(new Date(), 1)).toThrow(
      'A session record can only be built once the session has ended.',
    );
  });

  it('requires a reference covering the maximum', () => {
    expect(() => createSession({ reference: '1415', maxDigits: 10 })).toThrow(RangeError);
  });
});
