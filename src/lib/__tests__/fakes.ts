import type { Output } from '../practice';
import type { KeystrokeSource, RawModeGuard } from '../terminal';

export class CapturedOutput implements Output {
  text = '';

  write(chunk: string): void {
    this.text += chunk;
  }
}

/** Plays back a fixed list of keys, then waits for the deadline (or reports closed input without one). */
export class ScriptedKeystrokeSource implements KeystrokeSource {
  readonly keys: string[];

  acquired = 0;

  released = 0;

  constructor(keys: string | readonly string[]) {
    this.keys = typeof keys === 'string' ? keys.split('') : [...keys];
  }

  acquire(): RawModeGuard {
    this.acquired += 1;
    let done = false;
    return {
      release: () => {
        if (done) return;
        done = true;
        this.released += 1;
      },
    };
  }

  read(signal?: AbortSignal): Promise<string | null> {
    const key = this.keys.shift();
    if (key !== undefined) return Promise.resolve(key);
    if (!signal || signal.aborted) return Promise.resolve(null);
    return new Promise((resolve) => {
      signal.addEventListener('abort', () => resolve(null), { once: true });
    });
  }
}

export function steppingClock(stepMs = 500): () => number {
  let current = 0;
  return () => {
    current += stepMs;
    return current;
  };
}
