import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  configGetFloat,
  extractSlicerConfig,
  iniValueToNumber,
  parseConfigIni,
  readConfigIni,
  toProfileConfigInput,
} from './configIni';

const SAMPLE = [
  '# generated by a slicer',
  'nozzle_diameter = 0.4,0.6',
  'filament_diameter = 1.75',
  'filament_density = "1.27"',
  '',
  'filament_max_volumetric_speed = 15',
  'max_print_speed = nil',
  'max_fan_speed = 80%',
  'min_layer_height = 0.07',
  'max_layer_height = 0.3',
  'start_gcode = G28 ; home = all',
  'not a setting',
].join('\r\n');

describe('parseConfigIni', () => {
  it('reads key = value lines and skips comments', () => {
    const cfg = parseConfigIni(SAMPLE);
    expect(cfg['nozzle_diameter']).toBe('0.4,0.6');
    expect(cfg['start_gcode']).toBe('G28 ; home = all');
    expect(Object.keys(cfg)).toHaveLength(9);
    expect(cfg['not a setting']).toBeUndefined();
  });
});

describe('iniValueToNumber', () => {
  it('understands the value forms slicers write', () => {
    expect(iniValueToNumber('0.2')).toBe(0.2);
    expect(iniValueToNumber('80%')).toBe(80);
    expect(iniValueToNumber('"1.27"')).toBe(1.27);
    expect(iniValueToNumber('0.4,0.6')).toBe(0.4);
    expect(iniValueToNumber('1e-3')).toBe(0.001);
  });

  it('returns null for absent or non-numeric values', () => {
    expect(iniValueToNumber(undefined)).toBeNull();
    expect(iniValueToNumber('')).toBeNull();
    expect(iniValueToNumber('nil')).toBeNull();
    expect(iniValueToNumber('None')).toBeNull();
    expect(iniValueToNumber('12abc')).toBeNull();
  });
});

describe('extractSlicerConfig', () => {
  it('picks the settings the profiler uses', () => {
    const info = extractSlicerConfig(parseConfigIni(SAMPLE));
    expect(info).toEqual({
      nozzleDiameterMm: 0.4,
      filamentDiameterMm: 1.75,
      filamentDensityGCm3: 1.27,
      maxVolumetricFlowMm3S: 15,
      maxPrintSpeedMmS: null,
      layerHeightMm: null,
      firstLayerHeightMm: null,
      minLayerHeightMm: 0.07,
      maxLayerHeightMm: 0.3,
      maxFanSpeedPct: 80,
    });
  });

  it('converts to profile input without absent values', () => {
    const input = toProfileConfigInput(extractSlicerConfig(parseConfigIni(SAMPLE)));
    expect(input).toEqual({
      filamentDiameterMm: 1.75,
      filamentDensityGCm3: 1.27,
      maxVolumetricFlowMm3S: 15,
      minLayerHeightMm: 0.07,
      maxLayerHeightMm: 0.3,
    });
    expect(toProfileConfigInput(extractSlicerConfig({ filament_diameter: '0' }))).toEqual({});
  });

  it('reads single keys', () => {
    expect(configGetFloat({ layer_height: '0.2' }, 'layer_height')).toBe(0.2);
    expect(configGetFloat({}, 'layer_height')).toBeNull();
  });
});

describe('readConfigIni', () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it('reads a config file from disk', async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'layerlens-ini-'));
    const file = path.join(dir, 'config.ini');
    fs.writeFileSync(file, 'max_print_speed = 200\n');
    expect(await readConfigIni(file)).toEqual({ max_print_speed: '200' });
  });

  it('rejects a missing file', async () => {
    await expect(readConfigIni(path.join(os.tmpdir(), 'layerlens-none', 'config.ini'))).rejects.toThrow();
  });
});
