#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';

/** Version from the nearest package.json named layerlens-cli (works from src/ and dist/). */
function readCliVersion(): string {
  let dir = __dirname;
  for (let i = 0; i < 5; i++) {
    for (const candidate of [path.join(dir, 'package.json'), path.join(dir, 'layerlens-cli', 'package.json')]) {
      if (!fs.existsSync(candidate)) continue;
      const pkg: unknown = JSON.parse(fs.readFileSync(candidate, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'name' in pkg && pkg.name === 'layerlens-cli' && 'version' in pkg) {
        return String(pkg.version);
      }
    }
    dir = path.dirname(dir);
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('layerlens')
  .description('Profile G-code motion streams: per-layer and per-feature speed, flow and timing')
  .version(readCliVersion())
  .option('--config <path>', 'Slicer config.ini (key = value) supplying limits and filament settings')
  .option('--filament-diameter <mm>', 'Filament diameter in mm (default: 1.75, or from --config)')
  .option('--filament-density <g/cm3>', 'Filament density in g/cm³ (default: 1.24, or from --config)')
  .option('--layers <strategy>', 'Layer detection: auto, marker, z-increase, extruding-z-increase (default: auto)')
  .option('--quiet', 'Suppress progress output')
  .option('--json', 'Output as JSON');

// Summary command: profile printed as text, JSON or markdown
const summaryCmd = new Command('summary')
  .description('Profile a G-code file and print totals, feature types and slowest layers')
  .argument('<gcode>', 'ASCII G-code file')
  .option('--format <fmt>', 'Output format: text, json, markdown (default: text)')
  .option('--width <cols>', 'Terminal width for text output (default: auto-detect)')
  .option('--top-n-slowest <n>', 'Slowest layers to list (default: 10)')
  .action(async (file: string, _opts: Record<string, unknown>, cmd: Command) => {
    const { summaryAction } = await import('./commands/summary');
    return summaryAction(file, _opts, cmd);
  });
program.addCommand(summaryCmd);

// Report command: self-contained HTML report
const reportCmd = new Command('report')
  .description('Generate a self-contained HTML report and open it in the browser')
  .argument('<gcode>', 'ASCII G-code file')
  .option('--output <path>', 'Write report to a specific file path (default: <gcode>.html)')
  .option('--no-open', 'Do not auto-open the report in the browser')
  .option('--theme <theme>', 'Color theme: dark, light (default: dark)')
  .option('--bins <n>', 'Legend histogram bins (default: 20)')
  .option('--no-legends', 'Leave the legend tables out of the report')
  .option('--top-n-slowest <n>', 'Slowest layers to list (default: 10)')
  .option('--compare <gcode>', 'Second G-code file to compare against')
  .option('--compare-config <path>', 'Slicer config.ini for the compared file (default: --config)')
  .action(async (file: string, _opts: Record<string, unknown>, cmd: Command) => {
    const { reportAction } = await import('./commands/report');
    return reportAction(file, _opts, cmd);
  });
program.addCommand(reportCmd);

// Export command: CSV/JSON sidecars with a manifest
const exportCmd = new Command('export')
  .description('Write per-layer, top-flow-segment and feature-flow CSVs plus a JSON summary and manifest')
  .argument('<gcode>', 'ASCII G-code file')
  .option('--output <base>', 'Output base path; files are <base>_layers.csv etc. (default: <gcode> without extension)')
  .option('--top-n-segments <n>', 'Rows in the top flow segments CSV (default: 200)')
  .option('--per-layer-only', 'Skip the per-move CSV')
  .action(async (file: string, _opts: Record<string, unknown>, cmd: Command) => {
    const { exportAction } = await import('./commands/export');
    return exportAction(file, _opts, cmd);
  });
program.addCommand(exportCmd);

// Compare command: two profiles side by side
const compareCmd = new Command('compare')
  .description('Compare two G-code files: headline metrics with deltas and layers matched by Z')
  .argument('<a>', 'Baseline G-code file')
  .argument('<b>', 'G-code file to compare')
  .option('--compare-config <path>', 'Slicer config.ini for <b> (default: --config)')
  .option('--format <fmt>', 'Output format: text, markdown (default: text)')
  .option('--rows <n>', 'Layer alignment rows to print (default: 20)')
  .action(async (a: string, b: string, _opts: Record<string, unknown>, cmd: Command) => {
    const { compareAction } = await import('./commands/compare');
    return compareAction(a, b, _opts, cmd);
  });
program.addCommand(compareCmd);

program.parseAsync().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${msg}\n`);
  process.exit(1);
});
