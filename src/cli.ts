#!/usr/bin/env node
/**
 * Command-line entry point
 *
 * Usage:
 *   telegram-archiver <file> [--from-date YYYY-MM-DD] [--to-date YYYY-MM-DD]
 *   telegram-archiver <file> --yesterday [--timezone America/Los_Angeles]
 *
 * Prints the run summary as JSON. Exit codes: 0 when every chat was
 * archived, 2 when some chats failed, 1 when the run itself failed.
 *
 * @module cli
 */

import 'dotenv/config';
import { createInterface } from 'readline/promises';
import { DateWindow, Outcome } from './types';
import { parseDateWindow, previousDayWindow } from './telegram/date-filter';
import { LoginPrompts, createTelegramSessionGateway } from './telegram/session-gateway';
import { createArchiveWriter } from './archive/archive-writer';
import { createOrchestrator } from './archive/batch-orchestrator';
import { readIdentifierFile } from './archive/identifier-list';
import { countOutcomes, formatSummaryLine, summarize } from './archive/result-aggregator';
import { DEFAULT_SCHEDULE_TIMEZONE, TelegramConfig, loadStorageConfig, loadTelegramConfig } from './config/config';
import { ConfigurationError, handleError, toError } from './errors/error-handler';

export const EXIT_OK = 0;
export const EXIT_RUN_FAILED = 1;
export const EXIT_PARTIAL_FAILURE = 2;

const USAGE = `Usage: telegram-archiver <file> [--from-date YYYY-MM-DD] [--to-date YYYY-MM-DD] [--yesterday] [--timezone Zone]`;

/**
 * Options parsed from the command line
 */
export interface CliOptions {
  /** Path of the identifier file */
  file: string;
  window: DateWindow;
}

/**
 * Flags that take a value, keyed by every accepted spelling
 */
const VALUE_FLAGS: Record<string, 'from' | 'to' | 'timezone'> = {
  '--from-date': 'from',
  '--from_date': 'from',
  '--to-date': 'to',
  '--to_date': 'to',
  '--timezone': 'timezone',
};

/**
 * Parse command-line arguments
 *
 * @param argv - Arguments after the script name
 * @param now - Reference time for --yesterday
 * @throws ConfigurationError on unknown flags, a missing file or a bad window
 */
export function parseCliArgs(argv: readonly string[], now: Date = new Date()): CliOptions {
  const values: Partial<Record<'from' | 'to' | 'timezone', string>> = {};
  const positionals: string[] = [];
  let yesterday = false;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith('--')) {
      positionals.push(token);
      continue;
    }

    const [flag, inlineValue] = token.split('=', 2);
    if (flag === '--yesterday') {
      yesterday = true;
      continue;
    }

    const target = VALUE_FLAGS[flag];
    if (!target) {
      throw new ConfigurationError(`Unknown option: ${flag}\n${USAGE}`, flag);
    }

    const value = inlineValue ?? argv[i + 1];
    if (value === undefined || (inlineValue === undefined && value.startsWith('--'))) {
      throw new ConfigurationError(`Option ${flag} requires a value\n${USAGE}`, flag);
    }
    if (inlineValue === undefined) {
      i += 1;
    }
    values[target] = value;
  }

  if (positionals.length !== 1) {
    throw new ConfigurationError(`Expected exactly one identifier file\n${USAGE}`, 'file');
  }

  if (yesterday) {
    if (values.from !== undefined || values.to !== undefined) {
      throw new ConfigurationError('--yesterday cannot be combined with --from-date or --to-date', '--yesterday');
    }
    return { file: positionals[0], window: previousDayWindow(now, values.timezone ?? DEFAULT_SCHEDULE_TIMEZONE) };
  }

  return { file: positionals[0], window: parseDateWindow({ from: values.from, to: values.to }) };
}

/**
 * Exit code for a completed run
 */
export function exitCodeFor(outcomes: readonly Outcome[]): number {
  return countOutcomes(outcomes).failed > 0 ? EXIT_PARTIAL_FAILURE : EXIT_OK;
}

/**
 * Terminal prompts for a first-time login
 */
function terminalLoginPrompts(config: TelegramConfig): LoginPrompts | undefined {
  if (config.session) {
    return undefined;
  }
  if (!config.phoneNumber) {
    throw new ConfigurationError('Set TELEGRAM_SESSION, or PHONENUMBER to log in interactively.', 'TELEGRAM_SESSION');
  }

  const ask = async (question: string): Promise<string> => {
    const rl = createInterface({ input: process.stdin, output: process.stderr });
    try {
      return (await rl.question(question)).trim();
    } finally {
      rl.close();
    }
  };

  return {
    phoneNumber: config.phoneNumber,
    phoneCode: () => ask('Telegram login code: '),
    password: () => ask('Two-step verification password: '),
  };
}

/**
 * Run the archiver from the command line
 *
 * @returns Process exit code
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    process.stderr.write(`${toError(error).message}\n`);
    return EXIT_RUN_FAILED;
  }

  const telegramConfig = loadTelegramConfig();
  const storageConfig = loadStorageConfig();
  const identifiers = await readIdentifierFile(options.file);
  const login = terminalLoginPrompts(telegramConfig);

  const gateway = createTelegramSessionGateway(telegramConfig);
  try {
    await gateway.open(login);
    if (login) {
      process.stderr.write(`Logged in. Save this as TELEGRAM_SESSION:\n${gateway.saveSession() ?? ''}\n`);
    }

    const orchestrator = createOrchestrator(gateway, createArchiveWriter(storageConfig));
    const outcomes = await orchestrator.run(identifiers, options.window);

    process.stdout.write(`${JSON.stringify(summarize(outcomes), null, 2)}\n`);
    console.error(formatSummaryLine(outcomes));
    return exitCodeFor(outcomes);
  } finally {
    await gateway.close();
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exit(code);
    })
    .catch((error: unknown) => {
      const { userMessage } = handleError(toError(error));
      process.stderr.write(`Fatal error: ${userMessage}\n`);
      process.exit(EXIT_RUN_FAILED);
    });
}
