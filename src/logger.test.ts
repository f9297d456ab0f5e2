import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ListingError } from './errors';
import { closeLogger, initLogger, log, LogLevel, logError, logVerbose } from './logger';

import type { SyncConfig } from './types';

function syncConfig(overrides: Partial<SyncConfig> = {}): SyncConfig {
  return {
    source: { accessKey: 'test-access-key', secretKey: 'test-secret', region: 'us-east-1', bucket: 'source-bucket' },
    destination: { accessKey: 'test-access-key', secretKey: 'test-secret', region: 'us-west-2', bucket: 'dest-bucket' },
    concurrency: 4,
    maxRetries: 3,
    skipConfirmation: true,
    verbose: false,
    ...overrides,
  };
}

function executionIds(contents: string): string[] {
  return [...contents.matchAll(/== Execution ID: ([0-9a-f-]+) ==/g)].map(match => match[1]);
}

describe('logger', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bucket-sync-log-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await closeLogger();
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes tagged lines between start and completion banners', async () => {
    const logFile = path.join(tmpDir, 'nested', 'sync.log');
    initLogger(syncConfig({ logFile, prefix: 'photos/' }));

    log(LogLevel.WARNING, 'slow listing');
    await closeLogger();

    const contents = fs.readFileSync(logFile, 'utf8');
    const [executionId, closingId] = executionIds(contents);
    expect(closingId).toBe(executionId);
    expect(contents).toContain('== BUCKET SYNC EXECUTION STARTED AT ');
    expect(contents).toContain(`== Execution ID: ${executionId} ==`);
    expect(contents).toContain(`[INFO] [${executionId}] Source: us-east-1/source-bucket`);
    expect(contents).toContain(`[INFO] [${executionId}] Destination: us-west-2/dest-bucket`);
    expect(contents).toContain(`[INFO] [${executionId}] Prefix: photos/`);
    expect(contents).toContain(`[WARNING] [${executionId}] slow listing`);
    expect(contents.trimEnd().split('\n').slice(-2)[0]).toBe(`== Execution ID: ${executionId} ==`);
  });

  it('appends consecutive runs to the same file with distinct ids', async () => {
    const logFile = path.join(tmpDir, 'sync.log');

    initLogger(syncConfig({ logFile }));
    await closeLogger();

    initLogger(syncConfig({ logFile }));
    await closeLogger();

    const contents = fs.readFileSync(logFile, 'utf8');
    const ids = executionIds(contents);
    expect(contents.split('BUCKET SYNC EXECUTION STARTED AT')).toHaveLength(3);
    expect(ids).toHaveLength(4);
    expect(ids[0]).toBe(ids[1]);
    expect(ids[2]).toBe(ids[3]);
    expect(ids[2]).not.toBe(ids[0]);
  });

  it('writes error details with the cause to the file only', async () => {
    const logFile = path.join(tmpDir, 'sync.log');
    initLogger(syncConfig({ logFile }));

    const error = new ListingError('Failed to list objects', { cause: new Error('SlowDown') });
    logError('listing stopped', error, true);
    await closeLogger();

    const contents = fs.readFileSync(logFile, 'utf8');
    expect(contents).toContain('[ERROR] ');
    expect(contents).toContain('[ERROR_DETAILS] ');
    expect(contents).toContain('ListingError: Failed to list objects');
    expect(contents).toContain('Caused by Error: SlowDown');
    expect(console.log).not.toHaveBeenCalled();
  });

  it('prints debug lines only in verbose mode', () => {
    initLogger(syncConfig());
    logVerbose('hidden detail');
    expect(console.log).not.toHaveBeenCalled();

    initLogger(syncConfig({ verbose: true }));
    logVerbose('shown detail');
    expect(console.log).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('[DEBUG] shown detail'));
  });

  it('keeps logging to the console when the log file cannot be opened', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    // A directory cannot be opened for appending
    initLogger(syncConfig({ logFile: tmpDir }));

    await vi.waitFor(() => {
      expect(consoleError).toHaveBeenCalledWith(expect.stringContaining('Failed to write log file: EISDIR'));
    });

    log(LogLevel.INFO, 'still syncing');
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('[INFO] still syncing'));
    await expect(closeLogger()).resolves.toBeUndefined();
  });

  it('closes without a log file', async () => {
    initLogger(syncConfig());

    await expect(closeLogger()).resolves.toBeUndefined();
  });
});
