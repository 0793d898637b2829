import { describe, it, expect } from 'vitest';
import { AutoBoundary, MarkerBoundary, ZIncreaseBoundary, createBoundaryStrategy } from './boundary';

const EPS = 1e-6;

describe('ZIncreaseBoundary', () => {
  it('starts a layer only when Z rises above the last boundary', () => {
    const strategy = new ZIncreaseBoundary(EPS);
    expect(strategy.onMove({ z: 0.2, isExtruding: false })).toEqual({ boundary: true, z: 0.2 });
    expect(strategy.onMove({ z: 0.2, isExtruding: true })).toEqual({ boundary: false });
    expect(strategy.onMove({ z: 0.1, isExtruding: true })).toEqual({ boundary: false });
    expect(strategy.onMove({ z: 0.2 + EPS / 2, isExtruding: true })).toEqual({ boundary: false });
    expect(strategy.onMove({ z: 0.4, isExtruding: true })).toEqual({ boundary: true, z: 0.4 });
  });

  it('ignores travel moves in extruding-only mode', () => {
    const strategy = new ZIncreaseBoundary(EPS, true);
    expect(strategy.name).toBe('extruding-z-increase');
    expect(strategy.onMove({ z: 0.6, isExtruding: false }).boundary).toBe(false);
    expect(strategy.onMove({ z: 0.2, isExtruding: true })).toEqual({ boundary: true, z: 0.2 });
  });

  it('never reacts to directives', () => {
    const strategy = new ZIncreaseBoundary(EPS);
    expect(strategy.onAnnotation().boundary).toBe(false);
  });
});

describe('MarkerBoundary', () => {
  it('starts a layer on every layer marker', () => {
    const strategy = new MarkerBoundary(EPS);
    expect(strategy.onAnnotation({ directive: 'layer', index: 0 })).toEqual({ boundary: true });
    expect(strategy.onAnnotation({ directive: 'layer', index: null })).toEqual({ boundary: true });
    expect(strategy.onMove().boundary).toBe(false);
  });

  it('uses Z comments for height once layer markers were seen', () => {
    const strategy = new MarkerBoundary(EPS);
    strategy.onAnnotation({ directive: 'layer', index: 0 });
    expect(strategy.onAnnotation({ directive: 'layer-z', z: 0.6 })).toEqual({ boundary: false, z: 0.6 });
  });

  it('falls back to rising Z comments without layer markers', () => {
    const strategy = new MarkerBoundary(EPS);
    expect(strategy.onAnnotation({ directive: 'layer-z', z: 0.2 })).toEqual({ boundary: true, z: 0.2 });
    expect(strategy.onAnnotation({ directive: 'layer-z', z: 0.2 })).toEqual({ boundary: false });
    expect(strategy.onAnnotation({ directive: 'layer-z', z: 0.4 })).toEqual({ boundary: true, z: 0.4 });
  });
});

describe('AutoBoundary', () => {
  it('uses Z increases until the first layer directive', () => {
    const strategy = new AutoBoundary(EPS);
    expect(strategy.onMove({ z: 0.2, isExtruding: true }).boundary).toBe(true);
    expect(strategy.onAnnotation({ directive: 'category', label: 'Infill' }).boundary).toBe(false);
    expect(strategy.onAnnotation({ directive: 'layer', index: 1 }).boundary).toBe(true);
    expect(strategy.onMove({ z: 0.4, isExtruding: true }).boundary).toBe(false);
  });
});

describe('createBoundaryStrategy', () => {
  it('builds the named strategy', () => {
    expect(createBoundaryStrategy('z-increase', EPS).name).toBe('z-increase');
    expect(createBoundaryStrategy('extruding-z-increase', EPS).name).toBe('extruding-z-increase');
    expect(createBoundaryStrategy('marker', EPS).name).toBe('marker');
    expect(createBoundaryStrategy('auto', EPS).name).toBe('auto');
  });
});
