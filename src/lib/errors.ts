export type PigameErrorCode =
  | 'INVALID_INPUT'
  | 'OUT_OF_RANGE'
  | 'STATS_CORRUPT'
  | 'TERMINAL_MODE'
  | 'CONFIG_INVALID'
  | 'DIGIT_TABLE'
  | 'USAGE';

export class PigameError extends Error {
  public readonly code: PigameErrorCode;

  constructor(code: PigameErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidInputError extends PigameError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

export class OutOfRangeError extends PigameError {
  public readonly requested: number;

  public readonly limit: number;

  constructor(requested: number, limit: number) {
    super('OUT_OF_RANGE', `Requested ${requested} digits; the table supports 1 to ${limit}.`);
    this.requested = requested;
    this.limit = limit;
  }
}

export class StatsCorruptError extends PigameError {
  constructor(filePath: string, cause: unknown) {
    super('STATS_CORRUPT', `Stats file ${filePath} is unreadable or malformed.`, { cause });
  }
}

export class TerminalModeError extends PigameError {
  constructor(message = 'Practice mode needs an interactive terminal (stdin is not a TTY).', cause?: unknown) {
    super('TERMINAL_MODE', message, { cause });
  }
}

export class ConfigInvalidError extends PigameError {
  public readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super('CONFIG_INVALID', `Invalid configuration in ${source}: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class DigitTableError extends PigameError {
  constructor(message: string, cause?: unknown) {
    super('DIGIT_TABLE', message, { cause });
  }
}

export class UsageError extends PigameError {
  constructor(message: string) {
    super('USAGE', message);
  }
}

export function extractErrorCode(error: unknown): PigameErrorCode | undefined {
  if (error instanceof PigameError) {
    return error.code;
  }

  if (!error || typeof error !== 'object') {
    return undefined;
  }

  return 'cause' in error ? extractErrorCode(error.cause) : undefined;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
