/**
 * @fileoverview Output channels for CLI commands
 *
 * The report payload goes to stdout; warnings, progress and errors go to
 * stderr. Commands take a CliIo so tests can capture both streams.
 */

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Stream handed to the progress bar; omitted in tests */
  progressStream?: NodeJS.WritableStream;
}

export const processIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  progressStream: process.stderr,
};
