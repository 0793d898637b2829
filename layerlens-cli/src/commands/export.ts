/**
 * `layerlens export`: Write CSV/JSON sidecars and a sha256 manifest for a
 * G-code file.
 */

import * as path from 'path';
import type { Command } from 'commander';
import { profileFile, writeCsvExports, DEFAULT_TOP_SEGMENTS } from 'layerlens-shared';
import { checkGcodeInput, fail, globalOptions, parsePositiveInt, resolveProfileOptions } from '../options';

export async function exportAction(file: string, _opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts = cmd.opts();
  const global = globalOptions(cmd);
  const perLayerOnly = opts.perLayerOnly === true;

  try {
    const topNSegments = parsePositiveInt(opts.topNSegments, '--top-n-segments', DEFAULT_TOP_SEGMENTS);
    checkGcodeInput(file);

    const resolved = await resolveProfileOptions(global);
    resolved.status(`Parsing ${path.basename(file)}`);
    const result = await profileFile(file, {
      ...resolved.profiler,
      topSegments: topNSegments,
      onStatus: resolved.status,
    });

    const base = opts.output ? String(opts.output) : defaultExportBase(file);
    resolved.status('Writing exports');
    const manifest = writeCsvExports(result, base, { inputPath: file, perLayerOnly, topNSegments });

    if (global.json) {
      process.stdout.write(JSON.stringify(manifest, null, 2) + '\n');
    } else {
      for (const entry of manifest.files) {
        process.stdout.write(`${entry.path}\n`);
      }
    }
    process.stderr.write(`Wrote ${manifest.files.length} files (${result.totals.eventCount} moves, ${result.totals.layerCount} layers)\n`);
  } catch (err) {
    fail(err);
  }
}

/** `dir/part.gcode` → `dir/part`. */
export function defaultExportBase(file: string): string {
  const parsed = path.parse(file);
  return path.join(parsed.dir, parsed.name);
}
