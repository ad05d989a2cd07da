import { parsePracticeConfig } from './config';
import { computeStartDigits } from './difficulty';
import { digits } from './digits';
import { errorMessage } from './errors';
import {
  CLEAR_LINE,
  renderPreview,
  renderRoundHeader,
  renderSessionEvent,
  renderSessionSummary,
} from './render';
import { PracticeSession } from './session';
import type { SessionEvent } from './session';
import { consoleWarn, loadAggregate } from './stats';
import type { StatsRepository, Warn } from './stats';
import { isInterruptKey } from './terminal';
import type { KeystrokeSource } from './terminal';
import type { PracticeConfig, SessionRecord } from './types';

export interface Output {
  write(text: string): void;
}

export interface PracticeDependencies {
  stats: StatsRepository;
  input: KeystrokeSource;
  output: Output;
  /** Wall clock for the record timestamp. */
  now?: () => Date;
  /** Monotonic milliseconds for elapsed time. */
  clock?: () => number;
  colorBlind?: boolean;
  warn?: Warn;
}

type Timing = { startedAt: number };

/**
 * Runs one interactive round and persists its record. The raw-input guard is
 * released before the record is written or any error propagates.
 */
export async function runPracticeSession(
  settings: PracticeConfig,
  deps: PracticeDependencies,
): Promise<SessionRecord> {
  const config = parsePracticeConfig(settings, 'practice settings');
  const now = deps.now ?? (() => new Date());
  const clock = deps.clock ?? (() => performance.now());
  const warn = deps.warn ?? consoleWarn;

  const previous = await loadAggregate(deps.stats);
  const startDigits = computeStartDigits(previous, config);
  const session = new PracticeSession({
    reference: digits(config.maxDigits),
    mode: config.mode,
    startDigits,
    maxDigits: config.maxDigits,
    chunkSize: config.chunkSize,
  });

  const timing: Timing = { startedAt: clock() };
  let failure: { error: unknown } | null = null;

  const guard = deps.input.acquire();
  try {
    await playRound(session, config, deps, clock, timing);
  } catch (error) {
    failure = { error };
    session.interrupt();
  } finally {
    guard.release();
  }

  const elapsedSeconds = Math.max(0, (clock() - timing.startedAt) / 1000);
  const record = session.toRecord(now(), elapsedSeconds);

  try {
    await deps.stats.append(record);
  } catch (error) {
    warn(`Could not save the practice session: ${errorMessage(error)}`);
    throw error;
  }

  if (failure) throw failure.error;

  deps.output.write(`${renderSessionSummary(record, previous)}\n`);
  return record;
}

async function playRound(
  session: PracticeSession,
  config: PracticeConfig,
  deps: PracticeDependencies,
  clock: () => number,
  timing: Timing,
): Promise<void> {
  const { input, output } = deps;
  const context = { visualAid: config.visualAid, colorBlind: deps.colorBlind };
  const emit = (events: SessionEvent[]) => {
    for (const event of events) output.write(renderSessionEvent(event, context));
  };

  if (config.visualAid) {
    output.write(renderPreview(digits(session.startDigits)));
    const key = await input.read();
    output.write(CLEAR_LINE);
    if (key === null || isInterruptKey(key)) {
      emit(session.interrupt());
      return;
    }
  }

  output.write(renderRoundHeader(config, session.startDigits));
  timing.startedAt = clock();
  session.start();

  const deadline = new AbortController();
  const timer =
    config.mode === 'timed' ? setTimeout(() => deadline.abort(), config.timeLimitSeconds * 1000) : null;

  try {
    while (!session.isEnded) {
      const key = await input.read(timer ? deadline.signal : undefined);
      if (key === null) {
        emit(deadline.signal.aborted ? session.expire() : session.interrupt());
      } else if (isInterruptKey(key)) {
        emit(session.interrupt());
      } else {
        emit(session.press(key));
      }
    }
  } finally {
    if (timer) clearTimeout(timer);
  }
}
