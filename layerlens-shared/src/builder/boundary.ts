/**
 * Layer boundary strategies.
 *
 * The event builder asks a strategy, for every directive and every move,
 * whether a new layer starts. Swapping strategies never touches the
 * aggregators: they only see the builder's `boundary` flag.
 *
 * @module builder/boundary
 */

import type { Annotation } from '../types/gcode';
import type { BoundaryStrategyName } from '../config/profileConfig';

export interface BoundaryDecision {
  boundary: boolean;
  /** Representative Z for the current layer, when the strategy knows it. */
  z?: number;
}

export interface MoveObservation {
  /** Z after the move. */
  z: number;
  isExtruding: boolean;
}

export interface BoundaryStrategy {
  readonly name: BoundaryStrategyName;
  onAnnotation(annotation: Annotation): BoundaryDecision;
  onMove(move: MoveObservation): BoundaryDecision;
}

const NO_BOUNDARY: BoundaryDecision = { boundary: false };

/**
 * Z rising above the last boundary Z (plus epsilon) starts a layer.
 * The reference Z only ever moves up.
 */
export class ZIncreaseBoundary implements BoundaryStrategy {
  readonly name: BoundaryStrategyName;
  private referenceZ = 0;

  constructor(
    private readonly epsilon: number,
    private readonly extrudingOnly = false,
  ) {
    this.name = extrudingOnly ? 'extruding-z-increase' : 'z-increase';
  }

  onAnnotation(): BoundaryDecision {
    return NO_BOUNDARY;
  }

  onMove(move: MoveObservation): BoundaryDecision {
    if (this.extrudingOnly && !move.isExtruding) return NO_BOUNDARY;
    if (move.z > this.referenceZ + this.epsilon) {
      this.referenceZ = move.z;
      return { boundary: true, z: move.z };
    }
    return NO_BOUNDARY;
  }
}

/**
 * Slicer comments drive layers: `;LAYER:n` and `;LAYER_CHANGE` start one,
 * `;Z:` names its height. Files that only carry `;Z:` get a new layer
 * whenever that value increases.
 */
export class MarkerBoundary implements BoundaryStrategy {
  readonly name: BoundaryStrategyName = 'marker';
  private explicitMarkerSeen = false;
  private lastMarkerZ: number | null = null;

  constructor(private readonly epsilon: number) {}

  onAnnotation(annotation: Annotation): BoundaryDecision {
    switch (annotation.directive) {
      case 'layer':
        this.explicitMarkerSeen = true;
        return { boundary: true };
      case 'layer-z': {
        if (this.explicitMarkerSeen) return { boundary: false, z: annotation.z };
        const rising = this.lastMarkerZ === null || annotation.z > this.lastMarkerZ + this.epsilon;
        if (!rising) return NO_BOUNDARY;
        this.lastMarkerZ = annotation.z;
        return { boundary: true, z: annotation.z };
      }
      default:
        return NO_BOUNDARY;
    }
  }

  onMove(): BoundaryDecision {
    return NO_BOUNDARY;
  }
}

/**
 * Z-increase until the stream shows its first layer directive, markers after.
 */
export class AutoBoundary implements BoundaryStrategy {
  readonly name: BoundaryStrategyName = 'auto';
  private readonly heuristic: ZIncreaseBoundary;
  private readonly markers: MarkerBoundary;
  private useMarkers = false;

  constructor(epsilon: number) {
    this.heuristic = new ZIncreaseBoundary(epsilon);
    this.markers = new MarkerBoundary(epsilon);
  }

  onAnnotation(annotation: Annotation): BoundaryDecision {
    if (annotation.directive === 'layer' || annotation.directive === 'layer-z') {
      this.useMarkers = true;
    }
    return this.useMarkers ? this.markers.onAnnotation(annotation) : NO_BOUNDARY;
  }

  onMove(move: MoveObservation): BoundaryDecision {
    return this.useMarkers ? this.markers.onMove() : this.heuristic.onMove(move);
  }
}

export function createBoundaryStrategy(name: BoundaryStrategyName, epsilon: number): BoundaryStrategy {
  switch (name) {
    case 'extruding-z-increase': return new ZIncreaseBoundary(epsilon, true);
    case 'marker': return new MarkerBoundary(epsilon);
    case 'auto': return new AutoBoundary(epsilon);
    case 'z-increase':
    default: return new ZIncreaseBoundary(epsilon);
  }
}
