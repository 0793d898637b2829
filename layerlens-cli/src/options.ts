/**
 * Shared option handling for every command: global flags, the slicer config
 * file and input checks. Precedence is flag > config file > default.
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import type { Command } from 'commander';
import {
  extractSlicerConfig,
  isBoundaryStrategyName,
  readConfigIni,
  toProfileConfigInput,
  BOUNDARY_STRATEGIES,
} from 'layerlens-shared';
import type { BoundaryStrategyName, GcodeProfilerOptions, SlicerConfigInfo } from 'layerlens-shared';
import { createStatusWriter } from './status';

/** Global flags as commander hands them over. */
export interface GlobalOptions {
  config?: string;
  filamentDiameter?: string;
  filamentDensity?: string;
  layers?: string;
  quiet?: boolean;
  json?: boolean;
}

export interface ResolvedProfileOptions {
  profiler: GcodeProfilerOptions;
  slicer: SlicerConfigInfo | null;
  status: (message: string) => void;
  json: boolean;
}

export const DEFAULT_CLI_BOUNDARY: BoundaryStrategyName = 'auto';

/** Reads a global-or-local flag without caring where it was declared. */
export function globalOptions(cmd: Command): GlobalOptions {
  const all: Record<string, unknown> = cmd.optsWithGlobals();
  return {
    config: asString(all.config),
    filamentDiameter: asString(all.filamentDiameter),
    filamentDensity: asString(all.filamentDensity),
    layers: asString(all.layers),
    quiet: all.quiet === true,
    json: all.json === true,
  };
}

/**
 * Builds profiler options from the global flags and, when `--config` (or
 * `configOverride`) names one, a slicer config file.
 */
export async function resolveProfileOptions(
  opts: GlobalOptions,
  configOverride?: string,
): Promise<ResolvedProfileOptions> {
  const configPath = configOverride ?? opts.config;
  let slicer: SlicerConfigInfo | null = null;
  if (configPath) {
    if (!fs.existsSync(configPath)) throw new Error(`Config file not found: ${configPath}`);
    slicer = extractSlicerConfig(await readConfigIni(configPath));
  }

  const profiler: GcodeProfilerOptions = {
    ...(slicer ? toProfileConfigInput(slicer) : {}),
    boundary: parseBoundary(opts.layers),
  };
  if (opts.filamentDiameter !== undefined) {
    profiler.filamentDiameterMm = parsePositiveNumber(opts.filamentDiameter, '--filament-diameter');
  }
  if (opts.filamentDensity !== undefined) {
    profiler.filamentDensityGCm3 = parsePositiveNumber(opts.filamentDensity, '--filament-density');
  }

  return {
    profiler,
    slicer,
    status: createStatusWriter(opts.quiet === true),
    json: opts.json === true,
  };
}

/** Fails when the file is missing; warns (stderr) when it is not `.gcode`. */
export function checkGcodeInput(filePath: string, label = 'G-code'): void {
  if (!fs.existsSync(filePath)) throw new Error(`${label} file not found: ${filePath}`);
  if (path.extname(filePath).toLowerCase() !== '.gcode') {
    process.stderr.write(chalk.yellow(`Warning: ${path.basename(filePath)} does not have a .gcode extension. Expected ASCII G-code.\n`));
  }
}

export function parseBoundary(value: string | undefined): BoundaryStrategyName {
  if (value === undefined) return DEFAULT_CLI_BOUNDARY;
  if (!isBoundaryStrategyName(value)) {
    throw new Error(`Unknown layer strategy "${value}" (expected one of: ${BOUNDARY_STRATEGIES.join(', ')})`);
  }
  return value;
}

export function parsePositiveNumber(value: string, flag: string): number {
  const n = Number(value);
  if (!value.trim() || !Number.isFinite(n) || n <= 0) {
    throw new Error(`${flag} expects a positive number, got "${value}"`);
  }
  return n;
}

export function parsePositiveInt(value: string | undefined, flag: string, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`${flag} expects a positive integer, got "${value}"`);
  }
  return n;
}

/** Prints `Error: <message>` on stderr and exits 1. */
export function fail(err: unknown): never {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(chalk.red(`Error: ${msg}\n`));
  process.exit(1);
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}
