/**
 * Reader for slicer `config.ini` exports (`key = value` per line).
 *
 * Values stay raw strings until read through {@link configGetFloat}, which
 * understands plain numbers, percentages, `nil`/`none`, quoted values and
 * comma-separated per-extruder lists (first entry wins).
 *
 * @module config/configIni
 */

import * as fs from 'fs';
import type { ProfileConfigInput } from './profileConfig';

export type ConfigIni = Record<string, string>;

/** Slicer settings the profiler understands, `null` when absent or unparseable. */
export interface SlicerConfigInfo {
  nozzleDiameterMm: number | null;
  filamentDiameterMm: number | null;
  filamentDensityGCm3: number | null;
  maxVolumetricFlowMm3S: number | null;
  maxPrintSpeedMmS: number | null;
  layerHeightMm: number | null;
  firstLayerHeightMm: number | null;
  minLayerHeightMm: number | null;
  maxLayerHeightMm: number | null;
  maxFanSpeedPct: number | null;
}

const LINE_PATTERN = /^([^=]+?)\s*=\s*(.*)$/;
const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export function parseConfigIni(text: string): ConfigIni {
  const out: ConfigIni = {};
  for (const raw of text.split(/\r?\n/)) {
    if (!raw.trim() || raw.trimStart().startsWith('#')) continue;
    const match = LINE_PATTERN.exec(raw);
    if (!match) continue;
    out[match[1].trim()] = match[2].trim();
  }
  return out;
}

/** Reads and parses a config file. Rejects with the fs error when unreadable. */
export async function readConfigIni(filePath: string): Promise<ConfigIni> {
  const text = await fs.promises.readFile(filePath, 'utf8');
  return parseConfigIni(text);
}

/** Best-effort numeric read: `"20%"` → 20, `"nil"` → null, `"1.75,1.75"` → 1.75. */
export function iniValueToNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  let s = value.trim();
  if (!s) return null;
  if ((s.startsWith('"') && s.endsWith('"') && s.length >= 2) || (s.startsWith("'") && s.endsWith("'") && s.length >= 2)) {
    s = s.slice(1, -1).trim();
  }
  if (s.includes(',')) s = s.split(',')[0].trim();
  if (s.toLowerCase() === 'nil' || s.toLowerCase() === 'none') return null;
  if (s.endsWith('%')) s = s.slice(0, -1).trim();
  if (!NUMBER_PATTERN.test(s)) return null;
  const n = parseFloat(s);
  return Number.isFinite(n) ? n : null;
}

export function configGetFloat(cfg: ConfigIni, key: string): number | null {
  return iniValueToNumber(cfg[key]);
}

export function extractSlicerConfig(cfg: ConfigIni): SlicerConfigInfo {
  return {
    nozzleDiameterMm: configGetFloat(cfg, 'nozzle_diameter'),
    filamentDiameterMm: configGetFloat(cfg, 'filament_diameter'),
    filamentDensityGCm3: configGetFloat(cfg, 'filament_density'),
    maxVolumetricFlowMm3S: configGetFloat(cfg, 'filament_max_volumetric_speed'),
    maxPrintSpeedMmS: configGetFloat(cfg, 'max_print_speed'),
    layerHeightMm: configGetFloat(cfg, 'layer_height'),
    firstLayerHeightMm: configGetFloat(cfg, 'first_layer_height'),
    minLayerHeightMm: configGetFloat(cfg, 'min_layer_height'),
    maxLayerHeightMm: configGetFloat(cfg, 'max_layer_height'),
    maxFanSpeedPct: configGetFloat(cfg, 'max_fan_speed'),
  };
}

/**
 * Profile settings carried by a slicer config. Absent values are left out
 * so they do not override defaults or flags when spread.
 */
export function toProfileConfigInput(info: SlicerConfigInfo): ProfileConfigInput {
  const out: ProfileConfigInput = {};
  if (info.filamentDiameterMm !== null && info.filamentDiameterMm > 0) out.filamentDiameterMm = info.filamentDiameterMm;
  if (info.filamentDensityGCm3 !== null && info.filamentDensityGCm3 > 0) out.filamentDensityGCm3 = info.filamentDensityGCm3;
  if (info.maxVolumetricFlowMm3S !== null) out.maxVolumetricFlowMm3S = info.maxVolumetricFlowMm3S;
  if (info.maxPrintSpeedMmS !== null) out.maxPrintSpeedMmS = info.maxPrintSpeedMmS;
  if (info.minLayerHeightMm !== null) out.minLayerHeightMm = info.minLayerHeightMm;
  if (info.maxLayerHeightMm !== null) out.maxLayerHeightMm = info.maxLayerHeightMm;
  return out;
}
