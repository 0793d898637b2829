import { describe, it, expect } from 'vitest';
import { alignLayersByZ, compareProfiles, nearestLayer } from './compare';
import { profileText } from '../profiler/GcodeProfiler';

function program(feedrate: number): string {
  return [
    ';TYPE:Skirt',
    `G1 Z0.2 F${feedrate}`,
    'G1 X10 E1',
    ';TYPE:Infill',
    'G1 X10 Y10 E1',
    'G1 Z0.4',
    'G1 X0 Y10 E1',
  ].join('\n');
}

describe('compareProfiles', () => {
  const slow = profileText(program(600));
  const fast = profileText(program(1200));

  it('reports each metric with b - a', () => {
    const comparison = compareProfiles(slow, fast);
    expect(comparison.labelA).toBe('A');
    expect(comparison.labelB).toBe('B');
    expect(comparison.metrics.map(m => m.label)).toEqual([
      'Total time', 'Layers', 'Travel time', 'Extrude time', 'Retractions',
      'Filament', 'Max peak flow', 'Max P95 flow', 'Max peak speed', 'Max P95 speed',
    ]);

    const byLabel = new Map(comparison.metrics.map(m => [m.label, m]));
    expect(byLabel.get('Total time')?.delta).toBeCloseTo(-1.52, 10);
    expect(byLabel.get('Layers')).toEqual({ label: 'Layers', unit: '', a: 2, b: 2, delta: 0 });
    expect(byLabel.get('Max peak speed')).toEqual({ label: 'Max peak speed', unit: 'mm/s', a: 10, b: 20, delta: 10 });
  });

  it('keeps custom labels', () => {
    const comparison = compareProfiles(slow, fast, { a: 'part', b: 'part-fast' });
    expect([comparison.labelA, comparison.labelB]).toEqual(['part', 'part-fast']);
  });

  it('leaves the delta empty when a side has no samples', () => {
    const comparison = compareProfiles(slow, profileText('G1 X10'));
    const row = comparison.metrics.find(m => m.label === 'Max P95 flow');
    expect(row?.b).toBeNull();
    expect(row?.delta).toBeNull();
  });
});

describe('alignLayersByZ', () => {
  it('matches each distinct Z with the nearest layer of each side', () => {
    const a = profileText(program(600)).groups;
    const b = profileText('G1 Z0.3 F600\nG1 X10 E1').groups;
    const rows = alignLayersByZ(a, b);

    expect(rows.map(r => r.z)).toEqual([0.2, 0.3, 0.4]);
    expect(rows[0].a?.index).toBe(0);
    expect(rows[0].b?.z).toBe(0.3);
    expect(rows[2].a?.index).toBe(1);
    expect(rows[2].b?.index).toBe(0);
  });
});

describe('nearestLayer', () => {
  const [layer] = profileText(program(600)).groups;

  it('prefers the first layer on ties', () => {
    const groups = [{ ...layer, index: 0, z: 1 }, { ...layer, index: 1, z: 3 }];
    expect(nearestLayer(groups, 2)?.index).toBe(0);
    expect(nearestLayer(groups, 2.5)?.index).toBe(1);
  });

  it('returns null without layers', () => {
    expect(nearestLayer([], 1)).toBeNull();
  });
});
