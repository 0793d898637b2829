/**
 * Explicit run configuration for the profiler.
 *
 * Every component receives a resolved `ProfileConfig` through its
 * constructor; there is no module-level default state beyond the constants
 * below.
 *
 * @module config/profileConfig
 */

export const DEFAULT_FILAMENT_DIAMETER_MM = 1.75;
export const DEFAULT_FILAMENT_DENSITY_G_CM3 = 1.24;
export const DEFAULT_Z_EPSILON_MM = 1e-6;
export const DEFAULT_ISSUE_CAP = 200;
export const DEFAULT_TOP_SEGMENTS = 200;

export type BoundaryStrategyName = 'z-increase' | 'extruding-z-increase' | 'marker' | 'auto';

export const BOUNDARY_STRATEGIES: readonly BoundaryStrategyName[] = [
  'z-increase',
  'extruding-z-increase',
  'marker',
  'auto',
];

export interface ProfileConfig {
  filamentDiameterMm: number;
  filamentDensityGCm3: number;
  /** Volumetric flow limit (mm³/s); drives exceedance fractions and flow legend range. */
  maxVolumetricFlowMm3S: number | null;
  /** Speed limit (mm/s); drives exceedance fractions and speed legend range. */
  maxPrintSpeedMmS: number | null;
  minLayerHeightMm: number | null;
  maxLayerHeightMm: number | null;
  zEpsilonMm: number;
  boundary: BoundaryStrategyName;
  /** Maximum individual issues retained (counts are always complete). */
  issueCap: number;
  /** Size of the top-flow-segments table. */
  topSegments: number;
}

export type ProfileConfigInput = Partial<ProfileConfig>;

/** Fill in defaults. Non-finite or non-positive physical constants fall back to the default. */
export function resolveProfileConfig(input: ProfileConfigInput = {}): ProfileConfig {
  return {
    filamentDiameterMm: positiveOr(input.filamentDiameterMm, DEFAULT_FILAMENT_DIAMETER_MM),
    filamentDensityGCm3: positiveOr(input.filamentDensityGCm3, DEFAULT_FILAMENT_DENSITY_G_CM3),
    maxVolumetricFlowMm3S: finiteOrNull(input.maxVolumetricFlowMm3S),
    maxPrintSpeedMmS: finiteOrNull(input.maxPrintSpeedMmS),
    minLayerHeightMm: finiteOrNull(input.minLayerHeightMm),
    maxLayerHeightMm: finiteOrNull(input.maxLayerHeightMm),
    zEpsilonMm: input.zEpsilonMm !== undefined && Number.isFinite(input.zEpsilonMm) && input.zEpsilonMm >= 0
      ? input.zEpsilonMm
      : DEFAULT_Z_EPSILON_MM,
    boundary: input.boundary ?? 'z-increase',
    issueCap: Math.max(0, Math.floor(input.issueCap ?? DEFAULT_ISSUE_CAP)),
    topSegments: Math.max(1, Math.floor(input.topSegments ?? DEFAULT_TOP_SEGMENTS)),
  };
}

/** Filament cross-section area in mm². */
export function filamentAreaMm2(diameterMm: number): number {
  const r = diameterMm / 2;
  return Math.PI * r * r;
}

export function isBoundaryStrategyName(value: string): value is BoundaryStrategyName {
  return (BOUNDARY_STRATEGIES as readonly string[]).includes(value);
}

function positiveOr(value: number | null | undefined, fallback: number): number {
  return value !== undefined && value !== null && Number.isFinite(value) && value > 0 ? value : fallback;
}

function finiteOrNull(value: number | null | undefined): number | null {
  return value !== undefined && value !== null && Number.isFinite(value) ? value : null;
}
