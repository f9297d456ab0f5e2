// Third-party dependencies
import cliProgress from 'cli-progress';

/**
 * Counter-style progress indicator, advanced once per finished object
 */
export interface ProgressReporter {
  start(total: number): void;
  increment(): void;
  stop(): void;
}

export function createProgressBar(): ProgressReporter {
  const progressBar = new cliProgress.SingleBar({
    format: ' {bar} | {percentage}% | {value}/{total} | Syncing objects | ETA: {eta_formatted}',
    clearOnComplete: false,
    hideCursor: true,
  }, cliProgress.Presets.shades_grey);

  return {
    start: (total) => progressBar.start(total, 0),
    increment: () => progressBar.increment(),
    stop: () => progressBar.stop(),
  };
}

/**
 * Reporter that draws nothing, for runs without a terminal
 */
export const silentProgress: ProgressReporter = {
  start: () => undefined,
  increment: () => undefined,
  stop: () => undefined,
};
