// Third-party dependencies
import chalk from 'chalk';
import inquirer from 'inquirer';
import ora from 'ora';

// Local imports
import { syncBucketConfig } from './bucket-config';
import { syncObjects } from './coordinator';
import { errorMessage, SyncError, SyncPhase } from './errors';
import {
  closeLogger,
  initLogger,
  log,
  LogLevel,
  logError,
  logInfo,
  logSuccess,
  logWarning,
} from './logger';
import { listAllObjects } from './object-lister';
import { createProgressBar, silentProgress } from './progress';
import { S3StorageClient } from './s3-client';
import { formatTime } from './utils';

// Types
import type { ObjectSyncOutcome } from './coordinator';
import type { ProgressReporter } from './progress';
import type { BucketConfigSnapshot, ObjectDescriptor, StorageClient, SyncConfig, SyncCounts } from './types';

export interface SyncDependencies {
  source: StorageClient;
  destination: StorageClient;
  progress: ProgressReporter;
  confirm: (objects: readonly ObjectDescriptor[]) => Promise<boolean>;
}

export type SyncRunResult =
  | { ok: true; total: number; counts: SyncCounts; bucketConfig: BucketConfigSnapshot; elapsedMs: number }
  | { ok: false; total: number; counts: SyncCounts; error: SyncError; elapsedMs: number };

const EMPTY_COUNTS: SyncCounts = { copied: 0, skipped: 0, failed: 0, cancelled: 0 };

/**
 * Ask the user for confirmation before copying anything
 */
export async function confirmSync(objects: readonly ObjectDescriptor[]): Promise<boolean> {
  const { confirmSync: confirmed } = await inquirer.prompt<{ confirmSync: boolean }>([
    {
      type: 'confirm',
      name: 'confirmSync',
      message: `Do you want to proceed with synchronizing ${chalk.bold(objects.length.toString())} objects?`,
      default: false,
    },
  ]);

  return confirmed;
}

/**
 * Build S3 backed dependencies from the configuration
 */
export function createSyncDependencies(config: SyncConfig): SyncDependencies {
  return {
    source: S3StorageClient.fromAccount(config.source, config.maxRetries),
    destination: S3StorageClient.fromAccount(config.destination, config.maxRetries),
    progress: process.stdout.isTTY ? createProgressBar() : silentProgress,
    confirm: confirmSync,
  };
}

function showSample(objects: readonly ObjectDescriptor[]): void {
  logInfo('\nObjects to synchronize (showing first 10):', chalk.cyan);
  for (const object of objects.slice(0, 10)) {
    logInfo(`  - ${object.key}`, chalk.white);
  }

  if (objects.length > 10) {
    logInfo(`  ... and ${objects.length - 10} more objects`, chalk.white);
  }
  logInfo('', chalk.white);
}

/**
 * Print the final summary of a run
 */
export function printSummary(result: SyncRunResult): void {
  const { counts } = result;

  logInfo('Sync Summary', chalk.cyanBright.bold);
  logInfo('─'.repeat(50), chalk.white);
  logInfo(`Total objects:      ${result.total}`, chalk.white);
  logInfo(`Copied:             ${counts.copied}`, chalk.green);
  logInfo(`Skipped:            ${counts.skipped}`, chalk.gray);
  logInfo(`Failed:             ${counts.failed}`, chalk.redBright);
  if (counts.cancelled > 0) {
    logInfo(`Not attempted:      ${counts.cancelled}`, chalk.yellow);
  }
  logInfo(`Total time:         ${formatTime(Math.floor(result.elapsedMs / 1000))}`, chalk.white);

  log(
    LogLevel.INFO,
    `Sync Summary - Total: ${result.total}, Copied: ${counts.copied}, Skipped: ${counts.skipped}, ` +
      `Failed: ${counts.failed}, Not attempted: ${counts.cancelled}`,
    true
  );

  logInfo('', chalk.white);

  if (result.ok) {
    logSuccess(`✓ Synchronization completed: ${counts.copied} objects copied, ${counts.skipped} objects skipped`);
  } else {
    logError(`✗ Synchronization failed during ${result.error.phase}: ${result.error.message}`);
    logWarning('Synchronization is incomplete, do not assume the destination mirrors the source.');
  }
}

/**
 * Run one synchronization: bucket configuration first, then listing, then
 * the object copy pipeline.
 */
export async function runSync(
  config: SyncConfig,
  dependencies: SyncDependencies = createSyncDependencies(config)
): Promise<SyncRunResult> {
  initLogger(config);

  const { source, destination, progress } = dependencies;
  const startTime = Date.now();
  let total = 0;

  const fail = (error: SyncError, counts: SyncCounts = { ...EMPTY_COUNTS }): SyncRunResult => ({
    ok: false,
    total,
    counts,
    error,
    elapsedMs: Date.now() - startTime,
  });

  try {
    logInfo('Starting bucket synchronization...', chalk.cyan);
    logInfo(`Source: ${config.source.region}/${source.bucket}`, chalk.cyan);
    logInfo(`Destination: ${config.destination.region}/${destination.bucket}`, chalk.cyan);
    logInfo(`Concurrency: ${config.concurrency}`, chalk.white);
    logInfo(`Max Retries: ${config.maxRetries}`, chalk.white);

    if (config.prefix) {
      logInfo(`Prefix: ${config.prefix}`, chalk.cyan);
    }
    if (config.include && config.include.length > 0) {
      logInfo(`Include patterns: ${config.include.join(', ')}`, chalk.cyan);
    }
    if (config.exclude && config.exclude.length > 0) {
      logInfo(`Exclude patterns: ${config.exclude.join(', ')}`, chalk.cyan);
    }

    // Bucket configuration must be in place before any object is copied
    const configSpinner = ora('Syncing bucket configuration...').start();
    let bucketConfig: BucketConfigSnapshot;

    try {
      bucketConfig = await syncBucketConfig(source, destination);
      configSpinner.succeed('Bucket configuration synced');
    } catch (error) {
      configSpinner.fail(`Failed to sync bucket configuration: ${errorMessage(error)}`);
      throw error;
    }

    const listSpinner = ora('Listing objects from source bucket...').start();
    let objects: ObjectDescriptor[];

    try {
      objects = await listAllObjects(source, {
        prefix: config.prefix,
        include: config.include,
        exclude: config.exclude,
      });
      total = objects.length;
      listSpinner.succeed(`Found ${chalk.bold(total.toString())} objects in source bucket`);
      log(LogLevel.INFO, `Found ${total} objects in source bucket`, true);
    } catch (error) {
      listSpinner.fail(`Failed to list objects: ${errorMessage(error)}`);
      throw error;
    }

    if (total === 0) {
      logWarning('No objects to synchronize.');
      return { ok: true, total, counts: { ...EMPTY_COUNTS }, bucketConfig, elapsedMs: Date.now() - startTime };
    }

    showSample(objects);

    if (!config.skipConfirmation) {
      const confirmed = await dependencies.confirm(objects);
      if (!confirmed) {
        logWarning('Synchronization cancelled by user.');
        return fail(new SyncError('Synchronization cancelled by user', SyncPhase.CONFIRMATION));
      }
    } else {
      log(LogLevel.INFO, `Proceeding with synchronization of ${total} objects (confirmation skipped)`, true);
    }

    logInfo(`Starting object synchronization with concurrency of ${config.concurrency}`, chalk.cyan);
    progress.start(total);

    let outcome: ObjectSyncOutcome;
    try {
      outcome = await syncObjects({
        source,
        destination,
        objects,
        concurrency: config.concurrency,
        progress,
      });
    } finally {
      progress.stop();
    }

    if (outcome.error) {
      return fail(outcome.error, outcome.counts);
    }

    return { ok: true, total, counts: outcome.counts, bucketConfig, elapsedMs: Date.now() - startTime };
  } catch (error) {
    if (error instanceof SyncError) {
      logError(error.message, error);
      return fail(error);
    }
    throw error;
  }
}

/**
 * Run a synchronization, print its summary and release the log file
 */
export async function runSyncAndReport(
  config: SyncConfig,
  dependencies?: SyncDependencies
): Promise<SyncRunResult> {
  try {
    const result = await runSync(config, dependencies);
    printSummary(result);
    return result;
  } finally {
    await closeLogger();
  }
}
