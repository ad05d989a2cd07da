import os from 'node:os';
import path from 'node:path';

import { expect, test, vi } from 'vitest';

async function withEnv<T>(
  overrides: Record<string, string | undefined>,
  run: (env: typeof import('../env')) => T,
): Promise<T> {
  const originalEnv = process.env;
  const envCopy: NodeJS.ProcessEnv = { ...originalEnv };

  for (const key of ['PIGAME_HOME', 'NO_COLOR']) {
    delete envCopy[key];
  }

  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) {
      delete envCopy[key];
    } else {
      envCopy[key] = value;
    }
  }

  process.env = envCopy;
  vi.resetModules();

  try {
    return run(await import('../env'));
  } finally {
    process.env = originalEnv;
  }
}

test('keeps data under the home directory by default', async () => {
  const files = await withEnv({}, (env) => [env.dataDir(), env.statsFilePath(), env.configFilePath()]);

  const home = path.join(os.homedir(), '.pigame');
  expect(files).toEqual([home, path.join(home, 'stats.json'), path.join(home, 'config.json')]);
});

test('honours PIGAME_HOME and resolves it to an absolute path', async () => {
  const stats = await withEnv({ PIGAME_HOME: '  /tmp/pigame-data  ' }, (env) => env.statsFilePath());
  expect(stats).toBe(path.join('/tmp/pigame-data', 'stats.json'));

  const relative = await withEnv({ PIGAME_HOME: 'pigame-data' }, (env) => env.dataDir());
  expect(relative).toBe(path.resolve('pigame-data'));
});

test('ignores a blank PIGAME_HOME', async () => {
  const dir = await withEnv({ PIGAME_HOME: '   ' }, (env) => env.dataDir());
  expect(dir).toBe(path.join(os.homedir(), '.pigame'));
});

test('disables colour only for a non-empty NO_COLOR', async () => {
  expect(await withEnv({ NO_COLOR: '1' }, (env) => env.colorDisabled())).toBe(true);
  expect(await withEnv({ NO_COLOR: '' }, (env) => env.colorDisabled())).toBe(false);
  expect(await withEnv({}, (env) => env.colorDisabled())).toBe(false);
});
