import { TerminalModeError } from './errors';

export const INTERRUPT_KEYS: ReadonlySet<string> = new Set(['\u0003', '\u0004']);

export function isInterruptKey(key: string): boolean {
  return INTERRUPT_KEYS.has(key);
}

/** Scoped raw-input mode. `release` is idempotent and restores the previous mode. */
export interface RawModeGuard {
  release(): void;
}

export interface KeystrokeSource {
  acquire(): RawModeGuard;
  /**
   * Resolves with the next key. A key already buffered is returned even when
   * the signal has fired; otherwise an aborted signal or closed input
   * resolves with null.
   */
  read(signal?: AbortSignal): Promise<string | null>;
}

/** The slice of a TTY read stream the keystroke source drives. */
export interface TerminalInput {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  on(event: 'end', listener: () => void): unknown;
  off(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  off(event: 'end', listener: () => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

const ESC = '\u001b';

function isCsiFinalByte(char: string): boolean {
  const code = char.charCodeAt(0);
  return code >= 0x40 && code <= 0x7e;
}

/**
 * Splits raw terminal input into keys. An escape sequence (CSI `ESC [ … final`,
 * SS3 `ESC O x`, or an Alt chord `ESC x`) stays one key, so the digits inside
 * a function-key code such as F5 (`ESC [ 1 5 ~`) are never read as digits.
 */
export function splitKeys(chunk: string): string[] {
  const chars = Array.from(chunk);
  const keys: string[] = [];
  let i = 0;
  while (i < chars.length) {
    const char = chars[i] ?? '';
    if (char !== ESC || i + 1 >= chars.length) {
      keys.push(char);
      i += 1;
      continue;
    }

    const next = chars[i + 1] ?? '';
    let end = i + 2;
    if (next === '[') {
      while (end < chars.length && !isCsiFinalByte(chars[end] ?? '')) end += 1;
      end = Math.min(end + 1, chars.length);
    } else if (next === 'O') {
      end = Math.min(end + 1, chars.length);
    }
    keys.push(chars.slice(i, end).join(''));
    i = end;
  }
  return keys;
}

type Waiter = (key: string | null) => void;

export class TerminalKeystrokeSource implements KeystrokeSource {
  private readonly input: TerminalInput;

  private readonly buffer: string[] = [];

  private waiter: Waiter | null = null;

  private closed = false;

  constructor(input: TerminalInput = process.stdin) {
    this.input = input;
  }

  acquire(): RawModeGuard {
    const input = this.input;
    if (!input.isTTY || !input.setRawMode) {
      throw new TerminalModeError();
    }

    const wasRaw = input.isRaw === true;
    try {
      input.setRawMode(true);
    } catch (error) {
      throw new TerminalModeError('Could not switch the terminal to raw input mode.', error);
    }

    this.closed = false;
    input.setEncoding('utf8');
    input.on('data', this.onData);
    input.on('end', this.onEnd);
    input.resume();

    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        input.off('data', this.onData);
        input.off('end', this.onEnd);
        input.setRawMode?.(wasRaw);
        input.pause();
        this.buffer.length = 0;
        this.onEnd();
      },
    };
  }

  read(signal?: AbortSignal): Promise<string | null> {
    const buffered = this.buffer.shift();
    if (buffered !== undefined) return Promise.resolve(buffered);
    if (this.closed || signal?.aborted) return Promise.resolve(null);

    return new Promise((resolve) => {
      const onAbort = () => {
        this.waiter = null;
        resolve(null);
      };
      this.waiter = (key) => {
        signal?.removeEventListener('abort', onAbort);
        this.waiter = null;
        resolve(key);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private readonly onData = (chunk: string | Buffer): void => {
    for (const key of splitKeys(String(chunk))) {
      if (this.waiter) {
        this.waiter(key);
      } else {
        this.buffer.push(key);
      }
    }
  };

  private readonly onEnd = (): void => {
    this.closed = true;
    this.waiter?.(null);
  };
}
