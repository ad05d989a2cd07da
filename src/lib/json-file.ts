import fs from 'node:fs/promises';
import path from 'node:path';

export type JsonReadResult =
  | { status: 'missing' }
  | { status: 'ok'; value: unknown }
  | { status: 'unreadable'; stage: 'read' | 'parse'; error: unknown };

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function readJsonFile(filePath: string): Promise<JsonReadResult> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) return { status: 'missing' };
    return { status: 'unreadable', stage: 'read', error };
  }

  try {
    const value: unknown = JSON.parse(raw);
    return { status: 'ok', value };
  } catch (error) {
    return { status: 'unreadable', stage: 'parse', error };
  }
}

/** Writes through a sibling temp file and a rename, so readers never see a half-written document. */
export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tempPath, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
