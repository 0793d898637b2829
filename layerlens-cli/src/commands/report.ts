/**
 * `layerlens report`: Generate a self-contained HTML profile report and
 * open it in the browser.
 *
 * With `--compare`, the second file is profiled with the same settings
 * (or `--compare-config`) and a comparison section is added.
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import type { Command } from 'commander';
import {
  compareProfiles,
  generateHtmlReport,
  openInBrowser,
  profileFile,
  DEFAULT_LEGEND_BINS,
  DEFAULT_TOP_N_SLOWEST,
} from 'layerlens-shared';
import type { HtmlReportOptions, ProfileComparison } from 'layerlens-shared';
import { checkGcodeInput, fail, globalOptions, parsePositiveInt, resolveProfileOptions } from '../options';

export async function reportAction(file: string, _opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts = cmd.opts();
  const global = globalOptions(cmd);
  const comparePath: string | undefined = opts.compare;
  const theme: 'dark' | 'light' = opts.theme === 'light' ? 'light' : 'dark';
  const open = opts.open !== false;
  const legends = opts.legends !== false;

  try {
    const bins = parsePositiveInt(opts.bins, '--bins', DEFAULT_LEGEND_BINS);
    const topNSlowest = parsePositiveInt(opts.topNSlowest, '--top-n-slowest', DEFAULT_TOP_N_SLOWEST);

    checkGcodeInput(file);
    if (comparePath) checkGcodeInput(comparePath, 'Compare G-code');

    const resolved = await resolveProfileOptions(global);
    resolved.status(`Parsing G-code A (${path.basename(file)})`);
    const result = await profileFile(file, { ...resolved.profiler, onStatus: resolved.status });

    let comparison: ProfileComparison | undefined;
    if (comparePath) {
      const compareOpts = opts.compareConfig ? await resolveProfileOptions(global, opts.compareConfig) : resolved;
      resolved.status(`Parsing G-code B (${path.basename(comparePath)})`);
      const other = await profileFile(comparePath, {
        ...compareOpts.profiler,
        keepEvents: false,
        onStatus: resolved.status,
      });
      comparison = compareProfiles(result, other, {
        a: path.parse(file).name,
        b: path.parse(comparePath).name,
      });
    }

    resolved.status('Building report');
    const reportOptions: HtmlReportOptions = {
      fileName: path.basename(file),
      theme,
      bins,
      legends,
      topNSlowest,
      comparison,
    };
    const html = generateHtmlReport(result, reportOptions);

    const outFile = path.resolve(opts.output || defaultOutputPath(file, comparePath));
    fs.writeFileSync(outFile, html, 'utf-8');
    process.stderr.write(`Report written to: ${outFile}\n`);

    if (open) {
      openInBrowser(outFile, err => {
        process.stderr.write(chalk.yellow(`Warning: could not open browser: ${err.message}\n`));
      });
    }
  } catch (err) {
    fail(err);
  }
}

/** `part.gcode` → `part.html`; with a comparison `part_vs_other.html`. */
export function defaultOutputPath(file: string, comparePath?: string): string {
  const parsed = path.parse(file);
  const name = comparePath ? `${parsed.name}_vs_${path.parse(comparePath).name}` : parsed.name;
  return path.join(parsed.dir, `${name}.html`);
}
