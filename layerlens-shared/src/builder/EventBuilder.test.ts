import { describe, it, expect } from 'vitest';
import { EventBuilder } from './EventBuilder';
import { classify } from '../parsers/lineClassifier';
import { resolveProfileConfig } from '../config/profileConfig';
import type { ProfileConfigInput } from '../config/profileConfig';
import type { MotionEvent, ProfileIssue } from '../types/motion';

const AREA_175 = Math.PI * 0.875 * 0.875;

function run(lines: string[], config: ProfileConfigInput = {}) {
  const issues: ProfileIssue[] = [];
  const builder = new EventBuilder(resolveProfileConfig(config), { onIssue: issue => issues.push(issue) });
  const events: MotionEvent[] = [];
  const boundaries: number[] = [];
  lines.forEach((line, i) => {
    const result = builder.feed(classify(line, i + 1));
    if (result.boundary) boundaries.push(i + 1);
    events.push(...result.events);
  });
  return { builder, events, boundaries, issues };
}

describe('EventBuilder', () => {
  it('derives distance, speed and duration from the sticky feedrate', () => {
    const { events } = run(['G1 X10 Y0 F1200', 'G1 X10 Y10']);
    expect(events).toHaveLength(2);
    expect(events.map(e => e.distanceMm)).toEqual([10, 10]);
    expect(events.map(e => e.speedMmS)).toEqual([20, 20]);
    expect(events.map(e => e.durationS)).toEqual([0.5, 0.5]);
    expect(events.map(e => e.flowMm3S)).toEqual([0, 0]);
    expect(events[1].from).toEqual({ x: 10, y: 0, z: 0 });
    expect(events[1].index).toBe(1);
    expect(events[1].lineNumber).toBe(2);
  });

  it('computes volumetric flow for extruding moves', () => {
    const { events } = run(['G1 X10 E1 F600']);
    expect(events[0].isExtruding).toBe(true);
    expect(events[0].durationS).toBe(1);
    expect(events[0].flowMm3S).toBeCloseTo(AREA_175, 10);
  });

  it('gives moves without a feedrate zero speed and duration', () => {
    const { events } = run(['G1 X5']);
    expect(events[0]).toMatchObject({ speedMmS: 0, durationS: 0, feedrateMmPerMin: 0 });
  });

  it('emits nothing for moves that change neither position nor extruder', () => {
    const { builder, events } = run(['G1 F1800', 'G1 X0 Y0']);
    expect(events).toHaveLength(0);
    expect(builder.getState().feedrateMmPerMin).toBe(1800);
  });

  it('emits stationary extrusion with zero duration', () => {
    const { events } = run(['G1 E2 F300']);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ distanceMm: 0, extrusionMm: 2, durationS: 0, flowMm3S: 0 });
  });

  it('handles absolute extrusion and clamps retractions', () => {
    const { events, issues } = run(['M82', 'G1 X1 E5 F600', 'G1 X2 E4']);
    expect(events[0].extrusionMm).toBe(5);
    expect(events[1]).toMatchObject({ isExtruding: false, extrusionMm: 0, retractionMm: 1 });
    expect(issues).toEqual([
      { kind: 'negative-extrusion', lineNumber: 3, value: -1, message: 'extrusion delta -1 clamped to 0' },
    ]);
  });

  it('resets the extruder with G92', () => {
    const { events } = run(['M82', 'G1 X1 E5 F600', 'G92 E0', 'G1 X2 E1']);
    expect(events[1].extrusionMm).toBe(1);
    expect(events[1].retractionMm).toBe(0);
  });

  it('switches both coordinate and extruder modes with G90/G91', () => {
    const { builder, events } = run(['G91', 'G1 X5 F600', 'G1 X5']);
    expect(events[1].to.x).toBe(10);
    expect(builder.getState()).toMatchObject({ coordinateMode: 'relative', extruderMode: 'relative' });

    const absolute = run(['G90']).builder.getState();
    expect(absolute).toMatchObject({ coordinateMode: 'absolute', extruderMode: 'absolute' });
  });

  it('stamps setpoints and categories onto events', () => {
    const { events } = run(['M106 S255', 'M104 S210', 'M140 S60', ';TYPE:Perimeter', 'G1 X1 E0.1 F600']);
    expect(events[0]).toMatchObject({ fanPct: 100, hotendC: 210, bedC: 60, chamberC: null, category: 'Perimeter' });
  });

  it('applies a same-line directive before the command', () => {
    const { events } = run([';TYPE:Skirt', 'G1 X1 E0.1 F600', 'G1 X2 E0.1 ;TYPE:Infill']);
    expect(events.map(e => e.category)).toEqual(['Skirt', 'Infill']);
  });

  it('reports malformed fields', () => {
    const { issues } = run(['G1 X1.2.3 F600', 'M104 S2.1.0']);
    expect(issues).toEqual([
      { kind: 'malformed-field', lineNumber: 1, field: 'x', text: '1.2.3' },
      { kind: 'malformed-field', lineNumber: 2, field: 's', text: '2.1.0' },
    ]);
  });

  describe('layers', () => {
    it('re-bases the first layer instead of opening an empty one', () => {
      const { events, boundaries } = run(['G1 Z0.2 F600', 'G1 X10 E1', 'G1 Z0.4', 'G1 X0 E1']);
      expect(boundaries).toEqual([3]);
      expect(events.map(e => e.layer)).toEqual([0, 0, 1, 1]);
      expect(events.map(e => e.layerZ)).toEqual([0.2, 0.2, 0.4, 0.4]);
    });

    it('puts a same-line category into the layer its Z move opens', () => {
      const { events, boundaries } = run([';TYPE:A', 'G1 Z0.2 F600', 'G1 X10 E1', 'G1 Z0.4 X0 E1 ;TYPE:B', 'G1 X10 E1']);
      expect(boundaries).toEqual([4]);
      expect(events.map(e => [e.layer, e.category])).toEqual([[0, 'A'], [0, 'A'], [1, 'B'], [1, 'B']]);
    });

    it('reports a Z drop below the layer height', () => {
      const { issues } = run(['G1 Z0.4 F600', 'G1 X10 E1', 'G1 Z0.3']);
      expect(issues).toEqual([
        { kind: 'z-decrease', lineNumber: 3, value: 0.3, message: 'Z dropped to 0.3 below layer Z 0.4' },
      ]);
    });

    it('follows layer markers under the marker strategy', () => {
      const { events, boundaries } = run(
        [';LAYER:0', ';Z:0.2', 'G1 Z0.2 F600', 'G1 X10 E1', ';LAYER:1', ';Z:0.4', 'G1 Z0.4', 'G1 X0 E1'],
        { boundary: 'marker' },
      );
      expect(boundaries).toEqual([5]);
      expect(events.map(e => e.layer)).toEqual([0, 0, 1, 1]);
      expect(events.map(e => e.layerZ)).toEqual([0.2, 0.2, 0.4, 0.4]);
    });

    it('takes the layer Z from the first extruding move when no marker names it', () => {
      const { events } = run([';LAYER:0', 'G1 Z5 F600', 'G1 Z0.3', 'G1 X1 E0.1'], { boundary: 'marker' });
      expect(events.map(e => e.layerZ)).toEqual([0, 0, 0.3]);
    });
  });

  it('freezes emitted events', () => {
    const { events } = run(['G1 X1 F600']);
    expect(Object.isFrozen(events[0])).toBe(true);
    expect(Object.isFrozen(events[0].to)).toBe(true);
  });
});
