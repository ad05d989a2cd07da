import { createInterface } from 'node:readline/promises';

import {
  FileConfigRepository,
  PRACTICE_MODES,
  applyOverrides,
  configureInteractively,
  fieldSchemas,
} from './lib/config';
import type { Ask, ConfigRepository } from './lib/config';
import { MAX_DIGITS, displayDecimals, piWithDecimals } from './lib/digits';
import { colorDisabled, configFilePath, statsFilePath } from './lib/env';
import { UsageError, errorMessage, extractErrorCode } from './lib/errors';
import { ARCHIMEDES_NOTE, evaluateGuess, isEasterEgg } from './lib/evaluate';
import { runPracticeSession } from './lib/practice';
import type { Output } from './lib/practice';
import { renderGuessReport, renderStats } from './lib/render';
import { FileStatsRepository } from './lib/stats';
import type { StatsRepository } from './lib/stats';
import { TerminalKeystrokeSource } from './lib/terminal';
import type { KeystrokeSource } from './lib/terminal';
import type { PracticeConfig } from './lib/types';

export const VERSION = '1.6.0';

export const USAGE = [
  'Usage: pigame [-v] [-p LENGTH] [-V] [YOUR_PI]',
  '       pigame --practice [--practice-mode MODE] [--min-digits N] [--max-digits N]',
  '                         [--chunk-size N] [--time-limit N] [--visual-aid | --no-visual-aid]',
  '       pigame --stats | --config',
  '\tEvaluate your version of π (3.141.. )',
  '\t-v                  Increase verbosity.',
  '\t-p LENGTH           Calculate and show π with LENGTH number of decimals.',
  '\t-V, --version       Version.',
  `\t--practice          Interactive practice (modes: ${PRACTICE_MODES.join(', ')}).`,
  '\t--stats             Show practice statistics.',
  '\t--config            Change and save the practice settings.',
].join('\n');

export interface CliOptions {
  help: boolean;
  version: boolean;
  verbose: boolean;
  practice: boolean;
  stats: boolean;
  configure: boolean;
  showLength: number | null;
  guess: string | null;
  overrides: Partial<PracticeConfig>;
}

type NumericField = 'minDigits' | 'maxDigits' | 'chunkSize' | 'timeLimitSeconds';

const NUMERIC_FLAGS: Partial<Record<string, NumericField>> = {
  '--min-digits': 'minDigits',
  '--max-digits': 'maxDigits',
  '--chunk-size': 'chunkSize',
  '--time-limit': 'timeLimitSeconds',
};

function parseNumericFlag(flag: string, field: NumericField, raw: string): number {
  const parsed = fieldSchemas[field].safeParse(raw.trim() === '' ? Number.NaN : Number(raw));
  if (!parsed.success) {
    throw new UsageError(`${flag} ${parsed.error.issues[0]?.message ?? 'is invalid'}`);
  }
  return parsed.data;
}

function parseShowLength(raw: string): number {
  if (!/^-?[0-9]+$/.test(raw)) {
    throw new UsageError('Invalid input - NOT an integer');
  }
  const length = Number.parseInt(raw, 10);
  if (length > MAX_DIGITS) {
    throw new UsageError('Invalid input - too big a number for display');
  }
  return length;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    help: false,
    version: false,
    verbose: false,
    practice: false,
    stats: false,
    configure: false,
    showLength: null,
    guess: null,
    overrides: {},
  };

  const args = [...argv];
  const takeValue = (flag: string, inline: string | undefined): string => {
    if (inline !== undefined) return inline;
    const next = args.shift();
    if (next === undefined) throw new UsageError(`${flag} requires a value`);
    return next;
  };

  while (args.length > 0) {
    const arg = args.shift() ?? '';
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    switch (flag) {
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '-V':
      case '--version':
        options.version = true;
        break;
      case '-v':
        options.verbose = true;
        break;
      case '-p':
        options.showLength = parseShowLength(takeValue(flag, inline));
        break;
      case '--practice':
        options.practice = true;
        break;
      case '--stats':
        options.stats = true;
        break;
      case '--config':
        options.configure = true;
        break;
      case '--visual-aid':
        options.overrides.visualAid = true;
        break;
      case '--no-visual-aid':
        options.overrides.visualAid = false;
        break;
      case '--practice-mode': {
        const value = takeValue(flag, inline);
        const parsed = fieldSchemas.mode.safeParse(value);
        if (!parsed.success) {
          throw new UsageError(`--practice-mode must be one of ${PRACTICE_MODES.join(', ')}`);
        }
        options.overrides.mode = parsed.data;
        break;
      }
      default: {
        const field = NUMERIC_FLAGS[flag];
        if (field) {
          options.overrides[field] = parseNumericFlag(flag, field, takeValue(flag, inline));
          break;
        }
        if (flag.startsWith('-') && flag.length > 1) {
          throw new UsageError(`Unknown option: ${flag}`);
        }
        if (options.guess !== null) {
          throw new UsageError('Only one version of π can be evaluated at a time');
        }
        options.guess = arg;
      }
    }
  }

  return options;
}

export interface CliEnvironment {
  stdout: Output;
  stderr: Output;
  input?: KeystrokeSource;
  ask?: Ask;
  stats?: StatsRepository;
  config?: ConfigRepository;
  colorBlind?: boolean;
}

function line(output: Output, text: string): void {
  output.write(`${text}\n`);
}

async function withPrompt<T>(env: CliEnvironment, run: (ask: Ask) => Promise<T>): Promise<T> {
  if (env.ask) return run(env.ask);
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await run((question) => rl.question(question));
  } finally {
    rl.close();
  }
}

async function cmdConfigure(options: CliOptions, env: CliEnvironment, repository: ConfigRepository): Promise<void> {
  const current = applyOverrides(await repository.load(), options.overrides);
  const updated = await withPrompt(env, (ask) =>
    configureInteractively(current, ask, (message) => line(env.stdout, message)),
  );
  await repository.save(updated);
  line(env.stdout, 'Practice settings saved.');
}

async function cmdPractice(
  options: CliOptions,
  env: CliEnvironment,
  configRepository: ConfigRepository,
  stats: StatsRepository,
  colorBlind: boolean,
): Promise<void> {
  const config = applyOverrides(await configRepository.load(), options.overrides);
  await runPracticeSession(config, {
    stats,
    input: env.input ?? new TerminalKeystrokeSource(),
    output: env.stdout,
    colorBlind,
  });
}

function cmdEvaluate(options: CliOptions, env: CliEnvironment, colorBlind: boolean): void {
  if (options.showLength !== null) {
    const shown = piWithDecimals(options.showLength);
    line(env.stdout, options.verbose ? `π with ${displayDecimals(options.showLength)} decimals:\t${shown}` : shown);
  }

  if (options.guess === null) return;

  if (isEasterEgg(options.guess)) {
    line(env.stdout, ARCHIMEDES_NOTE);
    return;
  }

  const decimals = options.showLength === null ? undefined : displayDecimals(options.showLength);
  const evaluation = evaluateGuess(options.guess, { decimals });
  line(env.stdout, renderGuessReport(evaluation, { verbose: options.verbose, colorBlind }));
}

/** Runs the command line and returns the process exit code. */
export async function main(argv: readonly string[], env: CliEnvironment = defaultEnvironment()): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    line(env.stderr, `pigame error: ${errorMessage(error)}`);
    line(env.stderr, USAGE);
    return 1;
  }

  if (options.help) {
    line(env.stdout, USAGE);
    return 0;
  }
  if (options.version) {
    line(env.stdout, `pigame version: ${VERSION}`);
    return 0;
  }

  const colorBlind = env.colorBlind ?? colorDisabled();
  const configRepository = env.config ?? new FileConfigRepository(configFilePath());
  const stats = env.stats ?? new FileStatsRepository(statsFilePath());

  try {
    if (options.configure) {
      await cmdConfigure(options, env, configRepository);
      return 0;
    }
    if (options.stats) {
      line(env.stdout, renderStats(await stats.load()));
      return 0;
    }
    if (options.practice) {
      await cmdPractice(options, env, configRepository, stats, colorBlind);
      return 0;
    }
    if (options.guess === null && options.showLength === null) {
      line(env.stderr, USAGE);
      return 1;
    }
    cmdEvaluate(options, env, colorBlind);
    return 0;
  } catch (error) {
    const message =
      extractErrorCode(error) === undefined ? `unexpected failure: ${errorMessage(error)}` : errorMessage(error);
    line(env.stderr, `pigame error: ${message}`);
    return 1;
  }
}

function defaultEnvironment(): CliEnvironment {
  return { stdout: process.stdout, stderr: process.stderr };
}
