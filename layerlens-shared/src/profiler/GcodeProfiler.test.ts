import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { GcodeProfiler, profileFile, profileText } from './GcodeProfiler';
import type { ProfileIssue } from '../types/motion';

const PROGRAM = [
  ';TYPE:Skirt',
  'G1 Z0.2 F600',
  'G1 X10 E1',
  ';TYPE:Infill',
  'G1 X10 Y10 E1',
  'G1 Z0.4',
  'G1 X0 Y10 E1',
];

describe('profileText', () => {
  it('groups events into layers and feature types', () => {
    const result = profileText(PROGRAM.join('\n') + '\n');

    expect(result.boundaryStrategy).toBe('z-increase');
    expect(result.totals).toMatchObject({ lineCount: 7, eventCount: 5, layerCount: 2, extrusionMm: 3, retractCount: 0 });
    expect(result.totals.timeS).toBeCloseTo(3.04, 10);
    expect(result.totals.travelTimeS).toBeCloseTo(0.04, 10);
    expect(result.totals.extrudeTimeS).toBe(3);

    expect(result.groups.map(g => g.z)).toEqual([0.2, 0.4]);
    expect(result.groups[0].timeS).toBeCloseTo(2.02, 10);
    expect(result.groups[1].layerHeightMm).toBeCloseTo(0.2, 10);
    expect(result.groups.map(g => [g.firstLine, g.lastLine])).toEqual([[2, 5], [6, 7]]);

    expect(result.categories.map(c => c.label)).toEqual(['Infill', 'Skirt']);
    expect(result.categories.map(c => c.eventCount)).toEqual([3, 2]);
    expect(result.overall.eventCount).toBe(5);
  });

  it('finalizes the previous layer before a same-line category change', () => {
    const result = profileText([';TYPE:A', 'G1 Z0.2 F600', 'G1 X10 E1', 'G1 Z0.4 X0 E1 ;TYPE:B', 'G1 X10 E1'].join('\n'));

    expect(result.groups.map(g => [g.firstLine, g.lastLine])).toEqual([[2, 3], [4, 5]]);
    expect(result.events?.filter(e => e.layer === 0).map(e => e.category)).toEqual(['A', 'A']);
    expect(result.events?.find(e => e.lineNumber === 4)).toMatchObject({ layer: 1, category: 'B' });
    expect(result.categories.map(c => [c.label, c.eventCount])).toEqual([['B', 2], ['A', 2]]);
  });

  it('counts travel as zero flow in the mean and the time over the limit', () => {
    const area = Math.PI * 0.875 * 0.875;
    const result = profileText('G1 X10 E1 F600\nG1 X20 F600\n', { maxVolumetricFlowMm3S: area / 2 });

    expect(result.totals.timeS).toBe(2);
    expect(result.overall.flow.mean).toBeCloseTo(area / 2, 10);
    expect(result.overall.flow.overLimitFraction).toBe(0.5);
    expect(result.overall.flow.peak).toBeCloseTo(area, 10);
    expect(result.groups[0].flow.mean).toBeCloseTo(area / 2, 10);
  });

  it('sums layer times to the total', () => {
    const result = profileText(PROGRAM.join('\n'));
    const layerTime = result.groups.reduce((sum, g) => sum + g.timeS, 0);
    expect(layerTime).toBeCloseTo(result.totals.timeS, 10);
    expect(result.events?.map(e => e.layer)).toEqual([0, 0, 0, 1, 1]);
  });

  it('gives the same result for CRLF input', () => {
    const lf = profileText(PROGRAM.join('\n'));
    const crlf = profileText(PROGRAM.join('\r\n'));
    expect(crlf.totals).toEqual(lf.totals);
    expect(crlf.categories.map(c => c.label)).toEqual(lf.categories.map(c => c.label));
  });

  it('ranks the top flow segments', () => {
    const result = profileText(PROGRAM.join('\n'), { topSegments: 2 });
    expect(result.topFlowSegments.map(e => e.lineNumber)).toEqual([3, 5]);
  });

  it('drops events when asked', () => {
    expect(profileText(PROGRAM.join('\n'), { keepEvents: false }).events).toBeNull();
  });

  it('follows the configured boundary strategy', () => {
    const text = [';LAYER:0', 'G1 Z0.2 F600', 'G1 X10 E1', 'G1 Z0.4', 'G1 X0 E1', ';LAYER:1', 'G1 X10 E1'].join('\n');
    expect(profileText(text).totals.layerCount).toBe(2);
    const markers = profileText(text, { boundary: 'marker' });
    expect(markers.boundaryStrategy).toBe('marker');
    expect(markers.groups.map(g => g.eventCount)).toEqual([4, 1]);
  });

  it('records issues and keeps going', () => {
    const seen: ProfileIssue[] = [];
    const result = profileText('G1 X1.2.3 F600\nG1 X5 E1\nM82\nG1 X6 E0.5\n', { onIssue: issue => seen.push(issue) });
    expect(result.issueCounts).toEqual({ 'malformed-field': 1, 'z-decrease': 0, 'negative-extrusion': 1 });
    expect(result.issues).toEqual(seen);
    expect(result.totals.eventCount).toBe(2);
  });

  it('returns an empty profile for empty input', () => {
    const result = profileText('');
    expect(result.groups).toEqual([]);
    expect(result.categories).toEqual([]);
    expect(result.totals).toMatchObject({ lineCount: 0, eventCount: 0, layerCount: 0, timeS: 0 });
  });
});

describe('GcodeProfiler', () => {
  it('reports progress every N lines', () => {
    const messages: string[] = [];
    const profiler = new GcodeProfiler({ statusEveryLines: 2, onStatus: m => messages.push(m) });
    for (const line of PROGRAM) profiler.processLine(line);
    profiler.finish();
    expect(messages).toEqual(['Parsed 2 lines', 'Parsed 4 lines', 'Parsed 6 lines']);
  });

  it('finishes once and rejects later input', () => {
    const profiler = new GcodeProfiler();
    profiler.processChunk('G1 X1 F600');
    const first = profiler.finish();
    expect(profiler.finish()).toBe(first);
    expect(first.totals.eventCount).toBe(1);
    expect(() => profiler.processChunk('G1 X2\n')).toThrow('Profiler already finished');
  });
});

describe('profileFile', () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it('streams a file through the profiler', async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'layerlens-'));
    const file = path.join(dir, 'part.gcode');
    fs.writeFileSync(file, PROGRAM.join('\n'));

    const result = await profileFile(file);
    expect(result.totals).toEqual(profileText(PROGRAM.join('\n')).totals);
  });

  it('rejects a missing file', async () => {
    await expect(profileFile(path.join(os.tmpdir(), 'layerlens-missing', 'none.gcode'))).rejects.toThrow();
  });
});
