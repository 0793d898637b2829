/**
 * `layerlens compare`: Profile two G-code files and print headline metrics
 * side by side, plus the layers matched by Z.
 */

import * as path from 'path';
import type { Command } from 'commander';
import {
  compareProfiles,
  formatComparisonMarkdown,
  formatComparisonText,
  profileFile,
} from 'layerlens-shared';
import { checkGcodeInput, fail, globalOptions, parsePositiveInt, resolveProfileOptions } from '../options';

const DEFAULT_ALIGNMENT_ROWS = 20;

type CompareFormat = 'text' | 'markdown';

export async function compareAction(
  fileA: string,
  fileB: string,
  _opts: Record<string, unknown>,
  cmd: Command,
): Promise<void> {
  const opts = cmd.opts();
  const global = globalOptions(cmd);

  try {
    const format = parseCompareFormat(opts.format);
    const alignmentRows = parsePositiveInt(opts.rows, '--rows', DEFAULT_ALIGNMENT_ROWS);
    checkGcodeInput(fileA);
    checkGcodeInput(fileB, 'Compare G-code');

    const resolvedA = await resolveProfileOptions(global);
    const resolvedB = opts.compareConfig ? await resolveProfileOptions(global, opts.compareConfig) : resolvedA;

    resolvedA.status(`Parsing G-code A (${path.basename(fileA)})`);
    const a = await profileFile(fileA, { ...resolvedA.profiler, keepEvents: false, onStatus: resolvedA.status });
    resolvedA.status(`Parsing G-code B (${path.basename(fileB)})`);
    const b = await profileFile(fileB, { ...resolvedB.profiler, keepEvents: false, onStatus: resolvedA.status });

    const comparison = compareProfiles(a, b, { a: path.parse(fileA).name, b: path.parse(fileB).name });

    if (global.json) {
      process.stdout.write(JSON.stringify(comparison, null, 2) + '\n');
    } else if (format === 'markdown') {
      process.stdout.write(formatComparisonMarkdown(comparison, { alignmentRows }));
    } else {
      process.stdout.write(formatComparisonText(comparison, { alignmentRows }));
    }
  } catch (err) {
    fail(err);
  }
}

/** @internal Exported for tests. */
export function parseCompareFormat(value: unknown): CompareFormat {
  if (value === undefined || value === 'text') return 'text';
  if (value === 'markdown') return 'markdown';
  throw new Error(`Unknown format "${String(value)}" (expected text or markdown)`);
}
