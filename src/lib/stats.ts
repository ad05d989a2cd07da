import fs from 'node:fs/promises';

import { z } from 'zod';

import { StatsCorruptError, errorMessage } from './errors';
import { readJsonFile, writeJsonAtomic } from './json-file';
import type { SessionRecord, StatsAggregate } from './types';

const storedRecordSchema = z.object({
  timestamp: z.string().datetime({ offset: true, local: true }),
  mode: z.enum(['standard', 'timed', 'chunk']),
  digits: z.number().int().nonnegative(),
  elapsed_seconds: z.number().nonnegative(),
  errors: z.number().int().nonnegative(),
  success: z.boolean(),
});

const storedHistorySchema = z.array(storedRecordSchema);

type StoredRecord = z.infer<typeof storedRecordSchema>;

function toStored(record: SessionRecord): StoredRecord {
  return {
    timestamp: record.timestamp.toISOString(),
    mode: record.mode,
    digits: record.digitsAchieved,
    elapsed_seconds: record.elapsedSeconds,
    errors: record.errorCount,
    success: record.success,
  };
}

function fromStored(stored: StoredRecord): SessionRecord {
  return {
    timestamp: new Date(stored.timestamp),
    mode: stored.mode,
    digitsAchieved: stored.digits,
    elapsedSeconds: stored.elapsed_seconds,
    errorCount: stored.errors,
    success: stored.success,
  };
}

export function speedDigitsPerMinute(record: Pick<SessionRecord, 'digitsAchieved' | 'elapsedSeconds'>): number | null {
  if (record.elapsedSeconds <= 0) return null;
  return record.digitsAchieved / (record.elapsedSeconds / 60);
}

export function aggregateStats(records: readonly SessionRecord[]): StatsAggregate {
  return records.reduce<StatsAggregate>(
    (acc, record) => {
      const speed = speedDigitsPerMinute(record);
      return {
        sessionCount: acc.sessionCount + 1,
        bestDigitsAchieved: Math.max(acc.bestDigitsAchieved, record.digitsAchieved),
        bestSpeedDigitsPerMinute:
          speed === null
            ? acc.bestSpeedDigitsPerMinute
            : Math.max(acc.bestSpeedDigitsPerMinute ?? 0, speed),
      };
    },
    { sessionCount: 0, bestDigitsAchieved: 0, bestSpeedDigitsPerMinute: null },
  );
}

export interface StatsRepository {
  load(): Promise<SessionRecord[]>;
  append(record: SessionRecord): Promise<void>;
}

export async function loadAggregate(repository: StatsRepository): Promise<StatsAggregate> {
  return aggregateStats(await repository.load());
}

export type Warn = (message: string) => void;

export const consoleWarn: Warn = (message) => {
  console.warn(`⚠️  ${message}`);
};

function describeCause(cause: unknown): string {
  if (cause instanceof z.ZodError) {
    const issue = cause.issues[0];
    if (!issue) return 'unexpected shape';
    const where = issue.path.length > 0 ? issue.path.join('.') : 'root';
    return `${where}: ${issue.message}`;
  }
  return errorMessage(cause);
}

type HistoryRead = { records: SessionRecord[]; corrupt: boolean };

export class FileStatsRepository implements StatsRepository {
  readonly filePath: string;

  private readonly warn: Warn;

  constructor(filePath: string, options: { warn?: Warn } = {}) {
    this.filePath = filePath;
    this.warn = options.warn ?? consoleWarn;
  }

  async load(): Promise<SessionRecord[]> {
    const { records } = await this.readHistory();
    return records;
  }

  async append(record: SessionRecord): Promise<void> {
    const { records, corrupt } = await this.readHistory();
    if (corrupt) {
      const asidePath = `${this.filePath}.corrupt`;
      await fs.rename(this.filePath, asidePath);
      this.warn(`Moved the unreadable stats file to ${asidePath}; starting a new history.`);
    }
    const next = [...records, record].map(toStored);
    await writeJsonAtomic(this.filePath, next);
  }

  private async readHistory(): Promise<HistoryRead> {
    const result = await readJsonFile(this.filePath);
    if (result.status === 'missing') {
      return { records: [], corrupt: false };
    }

    if (result.status === 'unreadable') {
      return this.corrupt(result.error);
    }

    const parsed = storedHistorySchema.safeParse(result.value);
    if (!parsed.success) {
      return this.corrupt(parsed.error);
    }
    return { records: parsed.data.map(fromStored), corrupt: false };
  }

  private corrupt(cause: unknown): HistoryRead {
    const error = new StatsCorruptError(this.filePath, cause);
    this.warn(`${error.message} Treating history as empty (${describeCause(cause)}).`);
    return { records: [], corrupt: true };
  }
}

export class InMemoryStatsRepository implements StatsRepository {
  private readonly records: SessionRecord[];

  constructor(initial: SessionRecord[] = []) {
    this.records = [...initial];
  }

  async load(): Promise<SessionRecord[]> {
    return [...this.records];
  }

  async append(record: SessionRecord): Promise<void> {
    this.records.push(record);
  }
}
