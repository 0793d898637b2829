/**
 * Progress lines on stderr, prefixed with the seconds elapsed since the
 * writer was created: `[   1.2s] Parsed 250,000 lines`.
 */

import chalk from 'chalk';

export function formatStatusLine(message: string, elapsedMs: number): string {
  const seconds = (Math.max(0, elapsedMs) / 1000).toFixed(1);
  return `[${seconds.padStart(6)}s] ${message}`;
}

export function createStatusWriter(quiet: boolean, now: () => number = Date.now): (message: string) => void {
  const start = now();
  if (quiet) return () => undefined;
  return message => {
    process.stderr.write(chalk.dim(formatStatusLine(message, now() - start)) + '\n');
  };
}
