/**
 * `layerlens summary`: Profile a G-code file and print the result as text,
 * JSON, or markdown.
 */

import * as path from 'path';
import type { Command } from 'commander';
import {
  formatProfileJson,
  formatProfileMarkdown,
  formatProfileText,
  profileFile,
  DEFAULT_TOP_N_SLOWEST,
} from 'layerlens-shared';
import { checkGcodeInput, fail, globalOptions, parsePositiveInt, resolveProfileOptions } from '../options';

type OutputFormat = 'text' | 'json' | 'markdown';

export async function summaryAction(file: string, _opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts = cmd.opts();
  const global = globalOptions(cmd);

  try {
    const format = parseFormat(opts.format, global.json === true);
    const width = parsePositiveInt(opts.width, '--width', process.stdout.columns || 100);
    const topNSlowest = parsePositiveInt(opts.topNSlowest, '--top-n-slowest', DEFAULT_TOP_N_SLOWEST);

    checkGcodeInput(file);
    const resolved = await resolveProfileOptions(global);
    resolved.status(`Parsing ${path.basename(file)}`);
    const result = await profileFile(file, {
      ...resolved.profiler,
      keepEvents: false,
      onStatus: resolved.status,
    });
    resolved.status('Done');

    const dumpOptions = { width, topNSlowest, fileName: path.basename(file) };
    switch (format) {
      case 'json':
        process.stdout.write(formatProfileJson(result, dumpOptions));
        break;
      case 'markdown':
        process.stdout.write(formatProfileMarkdown(result, dumpOptions));
        break;
      case 'text':
      default:
        process.stdout.write(formatProfileText(result, dumpOptions));
        break;
    }
  } catch (err) {
    fail(err);
  }
}

function parseFormat(value: unknown, json: boolean): OutputFormat {
  if (value === undefined) return json ? 'json' : 'text';
  if (value === 'text' || value === 'json' || value === 'markdown') return value;
  throw new Error(`Unknown format "${String(value)}" (expected text, json or markdown)`);
}
