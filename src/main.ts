#!/usr/bin/env node
// Third-party dependencies
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';

// Local imports
import { DEFAULT_CONFIG_PATH, loadConfig } from './config';
import { ConfigError, errorMessage } from './errors';
import { displayHelp } from './help';
import { runSyncAndReport } from './sync';

// Package info
import { name, version } from '../package.json';

// Exit codes
const EXIT_SYNC_FAILED = 1;
const EXIT_CONFIG_ERROR = 2;

interface CliOptions {
  concurrency?: number;
  maxRetries?: number;
  prefix?: string;
  yes?: boolean;
  verbose?: boolean;
  logFile?: string;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

const program = new Command();

program
  .name(name)
  .version(version)
  .description('One-way synchronization of objects and bucket configuration between S3 compatible buckets')
  .argument('[config-file]', 'Path to the sync configuration file (JSON or YAML)', DEFAULT_CONFIG_PATH)
  .option('-c, --concurrency <number>', 'Number of objects synchronized at once', parsePositiveInt)
  .option('-r, --max-retries <number>', 'Attempts per request before a failure is reported', parsePositiveInt)
  .option('-p, --prefix <prefix>', 'Only synchronize objects with this prefix')
  .option('-y, --yes', 'Skip confirmation prompts and proceed with synchronization')
  .option('-v, --verbose', 'Enable verbose logging with per-object messages')
  .option('-l, --log-file <path>', 'Save logs to the specified file')
  .action(async (configFile: string, options: CliOptions) => {
    let exitCode = 0;

    try {
      const config = loadConfig(configFile);

      // Command line options override the configuration file
      if (options.concurrency) {
        config.concurrency = options.concurrency;
      }

      if (options.maxRetries) {
        config.maxRetries = options.maxRetries;
      }

      if (options.prefix) {
        config.prefix = options.prefix;
      }

      if (options.yes) {
        config.skipConfirmation = true;
      }

      if (options.verbose) {
        config.verbose = true;
      }

      if (options.logFile) {
        config.logFile = options.logFile;
      }

      const result = await runSyncAndReport(config);
      exitCode = result.ok ? 0 : EXIT_SYNC_FAILED;
    } catch (error) {
      console.error(chalk.red.bold('Error:'), chalk.red(errorMessage(error)));
      exitCode = error instanceof ConfigError ? EXIT_CONFIG_ERROR : EXIT_SYNC_FAILED;
    }

    process.exitCode = exitCode;
  });

program
  .command('help [topic]')
  .description('Display help information about specific topics')
  .action((topic: string | undefined) => {
    displayHelp(topic, name);
  });

program.addHelpText('after', `
Examples:
  $ ${name}
  $ ${name} ./sync.yaml
  $ ${name} ./sync.json --concurrency 20 --yes
  $ ${name} ./sync.yaml --prefix "images/"
  $ ${name} ./sync.yaml --log-file ./logs/sync.log --verbose
  $ ${name} help config
  $ ${name} help filters
  $ ${name} help process
  $ ${name} help permissions
`);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red.bold('Error:'), chalk.red(errorMessage(error)));
  process.exitCode = EXIT_SYNC_FAILED;
});
