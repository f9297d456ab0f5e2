// Node.js built-in modules
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

// Third-party dependencies
import chalk from 'chalk';
import * as fsExtra from 'fs-extra';
import { v4 as uuidv4 } from 'uuid';

// Local imports
import { errorMessage } from './errors';

// Types
import type { SyncConfig } from './types';

// Log levels
export enum LogLevel {
  INFO = 'INFO',
  SUCCESS = 'SUCCESS',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  DEBUG = 'DEBUG',
}

let config: SyncConfig | null = null;
let logStream: fs.WriteStream | null = null;
let executionId = uuidv4();

/**
 * Initialize the logger with the given configuration
 */
export function initLogger(syncConfig: SyncConfig): void {
  config = syncConfig;
  executionId = uuidv4();

  if (!config.logFile) {
    return;
  }

  try {
    fsExtra.ensureDirSync(path.dirname(config.logFile));

    // Append so that consecutive runs share one file
    const stream = fs.createWriteStream(config.logFile, { flags: 'a' });
    logStream = stream;

    // Open and write failures arrive as events, after this function returns
    stream.on('error', (error) => {
      console.error(chalk.red(`Failed to write log file: ${errorMessage(error)}`));
      if (logStream === stream) {
        logStream = null;
      }
    });

    const timestamp = new Date().toISOString();
    const processInfo = `PID: ${process.pid}, User: ${process.env.USERNAME || process.env.USER || 'unknown'}`;
    const systemInfo = `OS: ${os.platform()} ${os.release()}, Hostname: ${os.hostname()}`;

    logStream.write('\n');
    logStream.write('='.repeat(80) + '\n');
    logStream.write(`== BUCKET SYNC EXECUTION STARTED AT ${timestamp} ==\n`);
    logStream.write(`== Execution ID: ${executionId} ==\n`);
    logStream.write(`== ${processInfo} ==\n`);
    logStream.write(`== ${systemInfo} ==\n`);
    logStream.write('='.repeat(80) + '\n\n');

    log(LogLevel.INFO, 'Sync configuration:', true);
    log(LogLevel.INFO, `Source: ${config.source.region}/${config.source.bucket}`, true);
    log(LogLevel.INFO, `Destination: ${config.destination.region}/${config.destination.bucket}`, true);
    log(LogLevel.INFO, `Concurrency: ${config.concurrency}`, true);
    log(LogLevel.INFO, `Max retries: ${config.maxRetries}`, true);
    if (config.prefix) {
      log(LogLevel.INFO, `Prefix: ${config.prefix}`, true);
    }
  } catch (error) {
    console.error(chalk.red(`Failed to open log file: ${errorMessage(error)}`));
    // Continue without file logging
    logStream = null;
  }
}

/**
 * Close the logger. Resolves once the log file has been flushed.
 */
export function closeLogger(): Promise<void> {
  const stream = logStream;
  logStream = null;
  config = null;

  if (!stream) {
    return Promise.resolve();
  }

  const timestamp = new Date().toISOString();
  stream.write('\n');
  stream.write('='.repeat(80) + '\n');
  stream.write(`== BUCKET SYNC EXECUTION COMPLETED AT ${timestamp} ==\n`);
  stream.write(`== Execution ID: ${executionId} ==\n`);
  stream.write('='.repeat(80) + '\n');

  // 'close' follows both a flushed end and a failed stream
  return new Promise<void>((resolve) => {
    stream.once('close', () => resolve());
    stream.end();
  });
}

/**
 * Log a message with the specified level
 */
export function log(level: LogLevel, message: string, skipConsole = false): void {
  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level}] [${executionId}] ${message}`;

  if (logStream) {
    logStream.write(logMessage + '\n');
  }

  if (skipConsole) {
    return;
  }

  // Debug lines reach the console only in verbose mode
  if (level === LogLevel.DEBUG && !(config && config.verbose)) {
    return;
  }

  let consoleMessage: string;

  switch (level) {
    case LogLevel.INFO:
      consoleMessage = chalk.blue(`[INFO] ${message}`);
      break;
    case LogLevel.SUCCESS:
      consoleMessage = chalk.green(`[SUCCESS] ${message}`);
      break;
    case LogLevel.WARNING:
      consoleMessage = chalk.yellow(`[WARNING] ${message}`);
      break;
    case LogLevel.ERROR:
      consoleMessage = chalk.red(`[ERROR] ${message}`);
      break;
    case LogLevel.DEBUG:
      consoleMessage = chalk.gray(`[DEBUG] ${message}`);
      break;
    default:
      consoleMessage = message;
  }

  console.log(consoleMessage);
}

/**
 * Log an error with optional error object details
 */
export function logError(message: string, error?: unknown, skipConsole = false): void {
  log(LogLevel.ERROR, message, skipConsole);

  if (!(error instanceof Error)) {
    return;
  }

  let errorDetails = `${error.name}: ${error.message}\n${error.stack || '(No stack trace)'}`;
  if (error.cause instanceof Error) {
    errorDetails += `\nCaused by ${error.cause.name}: ${error.cause.message}`;
  }

  // Always log error details to file
  if (logStream) {
    logStream.write(`[${new Date().toISOString()}] [ERROR_DETAILS] [${executionId}] ${errorDetails}\n`);
  }

  if (config && config.verbose && !skipConsole) {
    console.log(chalk.red(errorDetails));
  }
}

/**
 * Log verbose information (only in verbose mode or to file)
 */
export function logVerbose(message: string): void {
  log(LogLevel.DEBUG, message);
}

export function logSuccess(message: string): void {
  log(LogLevel.SUCCESS, message);
}

export function logWarning(message: string): void {
  log(LogLevel.WARNING, message);
}

/**
 * Log an info message with custom color
 */
export function logInfo(message: string, color?: (message: string) => string): void {
  log(LogLevel.INFO, color ? color(message) : message);
}
