import { z } from 'zod';

import { MAX_DIGITS } from './digits';
import { ConfigInvalidError, errorMessage } from './errors';
import { readJsonFile, writeJsonAtomic } from './json-file';
import type { PracticeConfig, PracticeMode } from './types';

export const PRACTICE_MODES: readonly PracticeMode[] = ['standard', 'timed', 'chunk'];

export const DEFAULT_PRACTICE_CONFIG: PracticeConfig = {
  mode: 'standard',
  minDigits: 5,
  maxDigits: 100,
  chunkSize: 5,
  timeLimitSeconds: 60,
  visualAid: true,
};

// Node timers overflow above 2^31 - 1 milliseconds and fire immediately.
export const MAX_TIME_LIMIT_SECONDS = 2_147_483;

const digitCount = z
  .number({ invalid_type_error: 'must be a number' })
  .int('must be a whole number')
  .min(1, 'must be at least 1')
  .max(MAX_DIGITS, `must be at most ${MAX_DIGITS}`);

export const fieldSchemas = {
  mode: z.enum(['standard', 'timed', 'chunk'], {
    errorMap: () => ({ message: 'must be one of standard, timed, chunk' }),
  }),
  minDigits: digitCount,
  maxDigits: digitCount,
  chunkSize: z
    .number({ invalid_type_error: 'must be a number' })
    .int('must be a whole number')
    .positive('must be greater than 0'),
  timeLimitSeconds: z
    .number({ invalid_type_error: 'must be a number' })
    .positive('must be greater than 0')
    .max(MAX_TIME_LIMIT_SECONDS, `must be at most ${MAX_TIME_LIMIT_SECONDS}`),
  visualAid: z.boolean({ invalid_type_error: 'must be true or false' }),
};

const practiceConfigSchema = z
  .object({
    mode: fieldSchemas.mode.default(DEFAULT_PRACTICE_CONFIG.mode),
    minDigits: fieldSchemas.minDigits.default(DEFAULT_PRACTICE_CONFIG.minDigits),
    maxDigits: fieldSchemas.maxDigits.default(DEFAULT_PRACTICE_CONFIG.maxDigits),
    chunkSize: fieldSchemas.chunkSize.default(DEFAULT_PRACTICE_CONFIG.chunkSize),
    timeLimitSeconds: fieldSchemas.timeLimitSeconds.default(DEFAULT_PRACTICE_CONFIG.timeLimitSeconds),
    visualAid: fieldSchemas.visualAid.default(DEFAULT_PRACTICE_CONFIG.visualAid),
  })
  .refine((config) => config.minDigits <= config.maxDigits, {
    message: 'must not exceed maxDigits',
    path: ['minDigits'],
  });

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.join('.');
    return field ? `${field} ${issue.message}` : issue.message;
  });
}

export function parsePracticeConfig(value: unknown, source = 'configuration'): PracticeConfig {
  const parsed = practiceConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigInvalidError(source, describeIssues(parsed.error));
  }
  return parsed.data;
}

export function applyOverrides(config: PracticeConfig, overrides: Partial<PracticeConfig>): PracticeConfig {
  const merged: Record<string, unknown> = { ...config };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }
  return parsePracticeConfig(merged, 'command-line options');
}

export interface ConfigRepository {
  load(): Promise<PracticeConfig>;
  save(config: PracticeConfig): Promise<void>;
}

export class FileConfigRepository implements ConfigRepository {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async load(): Promise<PracticeConfig> {
    const result = await readJsonFile(this.filePath);
    if (result.status === 'missing') {
      return { ...DEFAULT_PRACTICE_CONFIG };
    }
    if (result.status === 'unreadable') {
      const issue =
        result.stage === 'parse' ? 'file is not valid JSON' : `file could not be read (${errorMessage(result.error)})`;
      throw new ConfigInvalidError(this.filePath, [issue]);
    }
    return parsePracticeConfig(result.value, this.filePath);
  }

  async save(config: PracticeConfig): Promise<void> {
    await writeJsonAtomic(this.filePath, parsePracticeConfig(config, 'new configuration'));
  }
}

export class InMemoryConfigRepository implements ConfigRepository {
  private current: PracticeConfig;

  constructor(initial: PracticeConfig = DEFAULT_PRACTICE_CONFIG) {
    this.current = { ...initial };
  }

  async load(): Promise<PracticeConfig> {
    return { ...this.current };
  }

  async save(config: PracticeConfig): Promise<void> {
    this.current = parsePracticeConfig(config, 'new configuration');
  }
}

export type Ask = (question: string) => Promise<string>;

const MAX_ATTEMPTS = 3;

const TRUE_WORDS = new Set(['y', 'yes', 'true', 'on', '1']);
const FALSE_WORDS = new Set(['n', 'no', 'false', 'off', '0']);

function parseAnswer(field: keyof PracticeConfig, answer: string): unknown {
  if (field === 'mode') return answer.toLowerCase();
  if (field === 'visualAid') {
    const word = answer.toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
    return answer;
  }
  const numeric = Number(answer);
  return Number.isNaN(numeric) ? answer : numeric;
}

const CONFIG_FIELDS: readonly (keyof PracticeConfig)[] = [
  'mode',
  'minDigits',
  'maxDigits',
  'chunkSize',
  'timeLimitSeconds',
  'visualAid',
];

const PROMPTS: Record<keyof PracticeConfig, string> = {
  mode: 'Practice mode (standard/timed/chunk)',
  minDigits: 'Minimum starting digits',
  maxDigits: 'Maximum digits per session',
  chunkSize: 'Chunk size',
  timeLimitSeconds: 'Time limit in seconds (timed mode)',
  visualAid: 'Show study preview and live progress (y/n)',
};

function formatCurrent(value: PracticeConfig[keyof PracticeConfig]): string {
  if (typeof value === 'boolean') return value ? 'y' : 'n';
  return String(value);
}

/**
 * Walks through every field. A blank answer keeps the current value; an
 * invalid one is asked again, and after three failed attempts the current
 * value is kept.
 */
export async function configureInteractively(
  current: PracticeConfig,
  ask: Ask,
  report: (message: string) => void = console.log,
): Promise<PracticeConfig> {
  const draft: PracticeConfig = { ...current };
  for (const field of CONFIG_FIELDS) {
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt += 1) {
      const answer = (await ask(`${PROMPTS[field]} [${formatCurrent(draft[field])}]: `)).trim();
      if (answer === '') break;

      const parsed = fieldSchemas[field].safeParse(parseAnswer(field, answer));
      if (!parsed.success) {
        report(`  ${field} ${parsed.error.issues[0]?.message ?? 'is invalid'}`);
        continue;
      }
      if (field === 'maxDigits' && typeof parsed.data === 'number' && parsed.data < draft.minDigits) {
        report(`  maxDigits must be at least minDigits (${draft.minDigits})`);
        continue;
      }
      Object.assign(draft, { [field]: parsed.data });
      break;
    }
  }

  return parsePracticeConfig(draft, 'new configuration');
}
