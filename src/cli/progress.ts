/**
 * @fileoverview Progress indicators for CLI operations
 */

import cliProgress from 'cli-progress';

export interface ProgressBarHandle {
  increment(delta?: number, payload?: Record<string, unknown>): void;
  stop(): void;
}

export interface ProgressBarOptions {
  total: number;
  /** Defaults to stderr so stdout stays machine-readable */
  stream?: NodeJS.WritableStream;
}

export function createProgressBar(options: ProgressBarOptions): ProgressBarHandle {
  const { total } = options;

  const bar = new cliProgress.SingleBar(
    {
      format: '{bar} {percentage}% | {value}/{total} files | {file}',
      stream: options.stream ?? process.stderr,
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: true,
      stopOnComplete: true,
    },
    cliProgress.Presets.shades_classic,
  );

  bar.start(total, 0, { file: '' });

  return {
    increment(delta = 1, payload?: Record<string, unknown>): void {
      bar.increment(delta, payload);
    },

    stop(): void {
      bar.stop();
    },
  };
}

/**
 * Format milliseconds into a human-readable duration
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}
