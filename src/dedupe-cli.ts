#!/usr/bin/env node
/**
 * Duplicate sweep CLI
 *
 * Usage:
 *   tsx src/dedupe-cli.ts [options] <directory> [<directory> ...]
 */

import { config as loadEnv } from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import {
  ConfigManager,
  DEFAULT_CONFIG_PATH,
  RunConfigInput,
  mergeConfigs,
  readEnvConfig,
  resolveRunConfig,
} from './config.js';
import { runDedupeSession } from './dedupe-session.js';
import { AppError, Logger, errorMessage, handleError } from './logger.js';
import { Prompter, createKeepIndexPrompt, parseDirectorySelection } from './prompts.js';
import { Policy } from './types.js';

const logger = new Logger({ context: 'cli' });

// ============================================================================
// CLI Argument Parsing
// ============================================================================

export interface CliOptions {
  help: boolean;
  directories: string[];
  algorithm?: string;
  configPath?: string;
  /** Raw 1-based index list, e.g. "1,3" */
  deleteSelection?: string;
  dryRun?: boolean;
  policy?: Policy;
  yes: boolean;
  logDir?: string;
}

export const USAGE = `Usage: dupe-sweep [Options] <directory> [<directory> ...]
Options:
  -md5, --md5            Use MD5 hashing algorithm
  -sha256, --sha256      Use SHA-256 hashing algorithm (default)
  --algorithm <name>     MD5 or SHA-256
  --delete <1,3,...>     Directories (by number) to delete duplicates from
  --dry-run              Simulate deletion without removing files
  --no-dry-run           Remove files
  --manual               Choose the copy to keep for every duplicate group
  --auto                 Keep one copy automatically
  --yes                  Do not ask for confirmation before removing files
  --config <file>        YAML or JSON config file (default ${DEFAULT_CONFIG_PATH})
  --log-dir <dir>        Directory for the log file
  -h, --help             Show this help`;

function requireValue(argv: string[], i: number, flag: string): string {
  const value = argv[i + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new AppError(`Missing value for ${flag}`, 'INVALID_OPTION', 400);
  }
  return value;
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { help: false, directories: [], yes: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '-help' || arg === '--help') {
      options.help = true;
    } else if (arg === '-md5' || arg === '--md5') {
      options.algorithm = 'MD5';
    } else if (arg === '-sha256' || arg === '--sha256' || arg === 'SHA-256') {
      options.algorithm = 'SHA-256';
    } else if (arg === '--algorithm') {
      options.algorithm = requireValue(argv, i++, arg);
    } else if (arg === '--delete') {
      options.deleteSelection = requireValue(argv, i++, arg);
    } else if (arg === '--dry-run') {
      options.dryRun = true;
    } else if (arg === '--no-dry-run') {
      options.dryRun = false;
    } else if (arg === '--manual') {
      options.policy = 'manual';
    } else if (arg === '--auto') {
      options.policy = 'automatic';
    } else if (arg === '--yes' || arg === '-y') {
      options.yes = true;
    } else if (arg === '--config') {
      options.configPath = requireValue(argv, i++, arg);
    } else if (arg === '--log-dir') {
      options.logDir = requireValue(argv, i++, arg);
    } else if (arg.startsWith('-')) {
      throw new AppError(`Unknown option: ${arg}`, 'INVALID_OPTION', 400);
    } else {
      options.directories.push(arg);
    }
  }

  return options;
}

function toConfigInput(options: CliOptions): RunConfigInput {
  return {
    algorithm: options.algorithm,
    scanRoots: options.directories.length > 0 ? options.directories : undefined,
    dryRun: options.dryRun,
    policy: options.policy,
    logDir: options.logDir,
  };
}

// ============================================================================
// Interactive setup
// ============================================================================

async function chooseDeleteRoots(prompter: Prompter, directories: readonly string[], preset?: string): Promise<string[]> {
  let input = preset;
  if (input === undefined) {
    prompter.say('Choose directories to delete duplicates from (comma separated, e.g. 1,3,4):');
    directories.forEach((dir, i) => prompter.say(`${i + 1}) ${dir}`));
    input = await prompter.ask('');
  }

  const selection = parseDirectorySelection(input, directories);
  for (const token of selection.invalid) {
    logger.warn(`Invalid input: ${token}`);
  }
  return selection.selected;
}

/**
 * Returns the exit code
 */
export async function runCli(argv: string[], prompter: Prompter = new Prompter()): Promise<number> {
  try {
    const options = parseArgs(argv);
    if (options.help) {
      console.log(USAGE);
      return 0;
    }

    const fileConfig = new ConfigManager(options.configPath ?? DEFAULT_CONFIG_PATH, options.configPath !== undefined);
    const input = mergeConfigs(fileConfig.getAll(), readEnvConfig(), toConfigInput(options));
    const base = resolveRunConfig(input);
    console.log(`Used Algo: ${base.algorithm}`);

    const deleteRoots =
      options.deleteSelection === undefined && input.deleteRoots !== undefined
        ? input.deleteRoots
        : await chooseDeleteRoots(prompter, base.scanRoots, options.deleteSelection);

    const dryRun =
      input.dryRun ??
      (await prompter.confirm('Do you want to perform a DRY run (simulate deletion without actual file removal)?', true));

    if (!dryRun && !options.yes) {
      const sure = await prompter.confirm('You are about to delete the files. Are you sure?', false);
      if (!sure) {
        console.log('Aborted.');
        return 0;
      }
    }

    const policy: Policy =
      input.policy ??
      ((await prompter.confirm('Do you want to delete the files manually?', true)) ? 'manual' : 'automatic');

    const runConfig = resolveRunConfig({ ...input, deleteRoots, dryRun, policy });
    if (runConfig.deleteRoots.length === 0) {
      logger.warn('No directories selected for deletion; every duplicate will be skipped');
    }

    const { report } = await runDedupeSession(runConfig, {
      promptForKeepIndex: runConfig.policy === 'manual' ? createKeepIndexPrompt(prompter) : undefined,
      progressOutput: (text) => process.stdout.write(text),
    });

    for (const line of report.summary()) {
      console.log(line);
    }
    return 0;
  } catch (error) {
    const appError = handleError(error, 'cli');
    if (appError.statusCode === 400) {
      console.error(USAGE);
    }
    return 1;
  } finally {
    prompter.close();
  }
}

const currentScriptPath = fileURLToPath(import.meta.url);
const invokedScriptPath = process.argv[1] ? path.resolve(process.argv[1]) : '';

if (invokedScriptPath && currentScriptPath === invokedScriptPath) {
  loadEnv({ override: false });
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error) => {
      console.error(errorMessage(error));
      process.exitCode = 1;
    }
  );
}
