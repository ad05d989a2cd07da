import type { GuessEvaluation } from './evaluate';
import type { SessionEvent } from './session';
import { aggregateStats, speedDigitsPerMinute } from './stats';
import type { DigitMatch, PracticeConfig, SessionRecord, StatsAggregate } from './types';

const RED = '\x1b[0;31m';
const UNDERLINE = '\x1b[4m';
const RESET = '\x1b[0m';

// Raw mode disables output post-processing, so newlines need an explicit carriage return.
const EOL = '\r\n';

const RECENT_SESSIONS = 5;

export interface HighlightOptions {
  /** Underline mismatches instead of colouring them red. */
  colorBlind?: boolean;
}

function highlight(text: string, options: HighlightOptions): string {
  return `${options.colorBlind ? UNDERLINE : RED}${text}${RESET}`;
}

export function renderComparison(positions: readonly DigitMatch[], options: HighlightOptions = {}): string {
  return positions.map((position) => (position.match ? position.actual : highlight(position.actual, options))).join('');
}

export function renderGuessReport(
  evaluation: GuessEvaluation,
  options: HighlightOptions & { verbose?: boolean } = {},
): string {
  const lines: string[] = [];
  const colored = renderComparison(evaluation.positions, options);

  if (options.verbose) {
    lines.push(`π with ${evaluation.decimals} decimals:\t${evaluation.reference}`);
    lines.push(`Your version of π:\t${colored}`);
    lines.push(`Number of errors: ${evaluation.errorCount}`);
    if (evaluation.allMatch) {
      lines.push(evaluation.decimals < 15 ? 'Well done.' : 'Perfect!');
    } else {
      lines.push('You can do better!');
    }
  } else {
    lines.push(colored);
    lines.push(evaluation.allMatch ? 'Match' : 'No match');
  }

  return lines.join('\n');
}

function formatSpeed(speed: number | null): string {
  return speed === null ? 'n/a' : `${speed.toFixed(1)} digits/min`;
}

function formatTimestamp(timestamp: Date): string {
  return timestamp.toISOString().slice(0, 16).replace('T', ' ');
}

export function renderStats(history: readonly SessionRecord[]): string {
  if (history.length === 0) {
    return 'No practice sessions recorded yet.';
  }

  const aggregate = aggregateStats(history);
  const successes = history.filter((record) => record.success).length;
  const recent = history.slice(-RECENT_SESSIONS).reverse();

  const lines = [
    'Practice statistics',
    `  Sessions:    ${aggregate.sessionCount} (${successes} successful)`,
    `  Best digits: ${aggregate.bestDigitsAchieved}`,
    `  Best speed:  ${formatSpeed(aggregate.bestSpeedDigitsPerMinute)}`,
    '',
    'Recent sessions',
    ...recent.map(
      (record) =>
        `  ${formatTimestamp(record.timestamp)}  ${record.mode.padEnd(8)}  ${String(record.digitsAchieved).padStart(4)} digits  ${record.elapsedSeconds.toFixed(1).padStart(6)}s  ${record.success ? 'success' : 'failed'}`,
    ),
  ];
  return lines.join('\n');
}

export function renderPreview(reference: string): string {
  return `Study: 3.${reference}  (press any key to start)`;
}

export const CLEAR_LINE = '\r\x1b[2K';

function describeMode(config: Pick<PracticeConfig, 'mode' | 'chunkSize' | 'timeLimitSeconds' | 'maxDigits'>): string {
  if (config.mode === 'timed') return `timed mode, ${config.timeLimitSeconds}s on the clock`;
  if (config.mode === 'chunk') return `chunk mode, checkpoints every ${config.chunkSize} digits`;
  return 'standard mode';
}

export function renderRoundHeader(
  config: Pick<PracticeConfig, 'mode' | 'chunkSize' | 'timeLimitSeconds' | 'maxDigits'>,
  startDigits: number,
): string {
  return `Practice: ${describeMode(config)}. Goal ${startDigits} digits, up to ${config.maxDigits}. Ctrl-C stops.${EOL}3.`;
}

export interface EventRenderContext extends HighlightOptions {
  visualAid: boolean;
}

export function renderSessionEvent(event: SessionEvent, context: EventRenderContext): string {
  switch (event.type) {
    case 'digit':
      return event.digit;
    case 'goal':
      return context.visualAid ? ` <goal ${event.digitsAchieved}> ` : '';
    case 'checkpoint':
      return context.visualAid ? ` [${event.digitsAchieved}] ` : ' ';
    case 'ended':
      if (event.reason === 'mismatch') {
        const expected = event.expected === null ? 'nothing' : event.expected;
        return `${highlight(event.actual ?? '', context)}${EOL}Wrong digit: expected ${expected}.${EOL}`;
      }
      if (event.reason === 'timeout') return `${EOL}Time is up.${EOL}`;
      if (event.reason === 'interrupted') return `${EOL}Session stopped.${EOL}`;
      return `${EOL}All digits correct!${EOL}`;
  }
}

export function renderSessionSummary(record: SessionRecord, previous: StatsAggregate): string {
  const lines = [
    `${record.success ? 'Success' : 'Session over'}: ${record.digitsAchieved} digits in ${record.elapsedSeconds.toFixed(1)}s (${formatSpeed(speedDigitsPerMinute(record))}).`,
  ];
  if (record.digitsAchieved > previous.bestDigitsAchieved) {
    lines.push(
      previous.sessionCount === 0
        ? 'First session recorded.'
        : `New personal best! Previous best was ${previous.bestDigitsAchieved} digits.`,
    );
  }
  return lines.join('\n');
}
