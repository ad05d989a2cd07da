import { DigitStream } from './diff';
import type { EndReason, PracticeMode, SessionRecord } from './types';

export type SessionState = 'idle' | 'awaitingDigit' | 'chunkCheckpoint' | 'ended';

export type SessionEvent =
  | { type: 'digit'; index: number; digit: string }
  | { type: 'goal'; digitsAchieved: number }
  | { type: 'checkpoint'; digitsAchieved: number; chunk: number }
  | { type: 'ended'; reason: EndReason; success: boolean; expected: string | null; actual: string | null };

export interface SessionOptions {
  reference: string;
  mode: PracticeMode;
  startDigits: number;
  maxDigits: number;
  chunkSize: number;
}

const DIGIT = /^[0-9]$/;

/**
 * One round of digit recall. Pure state: the caller feeds keys and timer
 * expiry and reads back the events to display.
 */
export class PracticeSession {
  readonly mode: PracticeMode;

  readonly startDigits: number;

  readonly maxDigits: number;

  readonly chunkSize: number;

  private readonly stream: DigitStream;

  private current: SessionState = 'idle';

  private reason: EndReason | null = null;

  private goalAnnounced = false;

  constructor(options: SessionOptions) {
    if (options.reference.length < options.maxDigits) {
      throw new RangeError(
        `Reference holds ${options.reference.length} digits but the session needs ${options.maxDigits}.`,
      );
    }
    this.mode = options.mode;
    this.maxDigits = options.maxDigits;
    this.startDigits = Math.min(options.startDigits, options.maxDigits);
    this.chunkSize = options.chunkSize;
    this.stream = new DigitStream(options.reference.slice(0, options.maxDigits));
  }

  get state(): SessionState {
    return this.current;
  }

  get digitsAchieved(): number {
    return this.stream.position;
  }

  get errorCount(): number {
    return this.stream.errorCount;
  }

  get success(): boolean {
    return this.reason === 'completed';
  }

  get endReason(): EndReason | null {
    return this.reason;
  }

  get isEnded(): boolean {
    return this.current === 'ended';
  }

  start(): void {
    if (this.current === 'idle') {
      this.current = 'awaitingDigit';
    }
  }

  press(key: string): SessionEvent[] {
    if (this.current === 'idle') this.start();
    if (this.current === 'ended' || !DIGIT.test(key)) return [];
    if (this.current === 'chunkCheckpoint') this.current = 'awaitingDigit';

    const result = this.stream.next(key);
    if (result.kind === 'mismatch') {
      return [this.end('mismatch', result.expected, result.actual)];
    }

    const events: SessionEvent[] = [{ type: 'digit', index: result.index, digit: key }];
    const achieved = this.stream.position;

    if (achieved === this.maxDigits) {
      events.push(this.end('completed', null, null));
      return events;
    }

    if (!this.goalAnnounced && achieved === this.startDigits) {
      this.goalAnnounced = true;
      events.push({ type: 'goal', digitsAchieved: achieved });
    }

    if (this.mode === 'chunk' && achieved % this.chunkSize === 0) {
      this.current = 'chunkCheckpoint';
      events.push({ type: 'checkpoint', digitsAchieved: achieved, chunk: achieved / this.chunkSize });
    }

    return events;
  }

  expire(): SessionEvent[] {
    if (this.current === 'ended') return [];
    return [this.end('timeout', null, null)];
  }

  interrupt(): SessionEvent[] {
    if (this.current === 'ended') return [];
    return [this.end('interrupted', null, null)];
  }

  toRecord(timestamp: Date, elapsedSeconds: number): SessionRecord {
    if (this.current !== 'ended') {
      throw new Error('A session record can only be built once the session has ended.');
    }
    return {
      timestamp,
      mode: this.mode,
      digitsAchieved: this.digitsAchieved,
      elapsedSeconds,
      errorCount: this.errorCount,
      success: this.success,
    };
  }

  private end(reason: EndReason, expected: string | null, actual: string | null): SessionEvent {
    this.current = 'ended';
    this.reason = reason;
    return { type: 'ended', reason, success: reason === 'completed', expected, actual };
  }
}
