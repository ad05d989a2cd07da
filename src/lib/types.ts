export type PracticeMode = 'standard' | 'timed' | 'chunk';

export interface PracticeConfig {
  mode: PracticeMode;
  minDigits: number;
  maxDigits: number;
  chunkSize: number;
  timeLimitSeconds: number;
  /** Study preview of the goal digits and a live progress line during a session. */
  visualAid: boolean;
}

export type EndReason = 'completed' | 'mismatch' | 'timeout' | 'interrupted';

export interface SessionRecord {
  timestamp: Date;
  mode: PracticeMode;
  digitsAchieved: number;
  elapsedSeconds: number;
  errorCount: number;
  success: boolean;
}

export interface StatsAggregate {
  sessionCount: number;
  bestDigitsAchieved: number;
  /** null until a record with a positive elapsed time exists. */
  bestSpeedDigitsPerMinute: number | null;
}

export interface DigitMatch {
  index: number;
  /** null when the user typed past the end of the reference. */
  expected: string | null;
  actual: string;
  match: boolean;
}

export interface CompareResult {
  positions: DigitMatch[];
  mismatches: number[];
  errorCount: number;
  allMatch: boolean;
}
