import os from 'node:os';
import path from 'node:path';

export const DEFAULT_DATA_DIR_NAME = '.pigame';

const STATS_FILE_NAME = 'stats.json';
const CONFIG_FILE_NAME = 'config.json';

function trimmed(value: string | undefined | null): string | null {
  if (typeof value !== 'string') return null;
  const result = value.trim();
  return result === '' ? null : result;
}

function readDataDirFromEnv(): string | null {
  return trimmed(process.env.PIGAME_HOME);
}

export function dataDir(): string {
  const fromEnv = readDataDirFromEnv();
  if (fromEnv) {
    return path.resolve(fromEnv);
  }
  return path.join(os.homedir(), DEFAULT_DATA_DIR_NAME);
}

export function statsFilePath(): string {
  return path.join(dataDir(), STATS_FILE_NAME);
}

export function configFilePath(): string {
  return path.join(dataDir(), CONFIG_FILE_NAME);
}

/** NO_COLOR (https://no-color.org) switches mismatch highlighting from red to underline. */
export function colorDisabled(): boolean {
  return trimmed(process.env.NO_COLOR) !== null;
}
