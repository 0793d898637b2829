/**
 * Motion events and the issue records produced while building them.
 */

export interface Point3D {
  x: number;
  y: number;
  z: number;
}

/**
 * One qualifying G0/G1 move with the sticky machine state at that moment.
 * Instances are frozen by the builder.
 */
export interface MotionEvent {
  /** 0-based ordinal within the stream. */
  index: number;
  /** 1-based source line. */
  lineNumber: number;
  command: 'G0' | 'G1';
  from: Point3D;
  to: Point3D;
  /** Euclidean XYZ displacement. */
  distanceMm: number;
  isExtruding: boolean;
  /** Positive extrusion delta; retractions clamp to 0. */
  extrusionMm: number;
  /** Magnitude of a negative extrusion delta, else 0. */
  retractionMm: number;
  /** Last set feedrate; 0 when none has been seen. */
  feedrateMmPerMin: number;
  speedMmS: number;
  durationS: number;
  flowMm3S: number;
  /** Absolute Z after the move. */
  z: number;
  category: string | null;
  fanPct: number | null;
  hotendC: number | null;
  bedC: number | null;
  chamberC: number | null;
  /** Layer ordinal assigned by the boundary strategy. */
  layer: number;
  /** Representative Z of that layer at the time of the event. */
  layerZ: number;
}

// ── Issues ──

export type IssueKind = 'malformed-field' | 'z-decrease' | 'negative-extrusion';

export interface MalformedFieldIssue {
  kind: 'malformed-field';
  lineNumber: number;
  field: string;
  text: string;
}

export interface StructuralAnomalyIssue {
  kind: 'z-decrease' | 'negative-extrusion';
  lineNumber: number;
  /** Offending raw value (new Z, or the negative extrusion delta). */
  value: number;
  message: string;
}

export type ProfileIssue = MalformedFieldIssue | StructuralAnomalyIssue;
