/**
 * Stateful fold from classified tokens to motion events.
 *
 * Holds the one mutable machine state (position, positioning modes,
 * feedrate, setpoints, category, layer) and stamps a frozen snapshot of it
 * onto every event it emits.
 *
 * @module builder/EventBuilder
 */

import type { Annotation, MalformedField, MotionToken, Token } from '../types/gcode';
import type { MotionEvent, Point3D, ProfileIssue } from '../types/motion';
import { filamentAreaMm2 } from '../config/profileConfig';
import type { ProfileConfig } from '../config/profileConfig';
import { createBoundaryStrategy } from './boundary';
import type { BoundaryDecision, BoundaryStrategy } from './boundary';

export type PositioningMode = 'absolute' | 'relative';

export interface MachineState {
  position: { x: number; y: number; z: number; e: number };
  coordinateMode: PositioningMode;
  extruderMode: PositioningMode;
  feedrateMmPerMin: number;
  fanPct: number | null;
  hotendC: number | null;
  bedC: number | null;
  chamberC: number | null;
  category: string | null;
  layer: number;
  layerZ: number;
}

export interface FeedResult {
  events: MotionEvent[];
  /** A new layer starts before `events`. */
  boundary: boolean;
}

export interface EventBuilderOptions {
  /** Overrides the strategy named in `config.boundary`. */
  boundary?: BoundaryStrategy;
  onIssue?: (issue: ProfileIssue) => void;
}

export class EventBuilder {
  private readonly area: number;
  private readonly epsilon: number;
  private readonly strategy: BoundaryStrategy;
  private readonly onIssue: ((issue: ProfileIssue) => void) | null;

  private state: MachineState = {
    position: { x: 0, y: 0, z: 0, e: 0 },
    coordinateMode: 'absolute',
    extruderMode: 'relative',
    feedrateMmPerMin: 0,
    fanPct: null,
    hotendC: null,
    bedC: null,
    chamberC: null,
    category: null,
    layer: 0,
    layerZ: 0,
  };

  /** Layer Z not yet known; the next extruding move supplies it. */
  private layerZPending = true;
  private eventsInLayer = 0;
  private eventCount = 0;

  constructor(config: ProfileConfig, options: EventBuilderOptions = {}) {
    this.area = filamentAreaMm2(config.filamentDiameterMm);
    this.epsilon = config.zEpsilonMm;
    this.strategy = options.boundary ?? createBoundaryStrategy(config.boundary, config.zEpsilonMm);
    this.onIssue = options.onIssue ?? null;
  }

  /** Copy of the current machine state. */
  getState(): MachineState {
    return { ...this.state, position: { ...this.state.position } };
  }

  get boundaryStrategy(): BoundaryStrategy {
    return this.strategy;
  }

  /**
   * Applies one token. A directive on the same line as a command is applied
   * first, so the command's event carries the new category and belongs to
   * any layer the directive opened.
   */
  feed(token: Token): FeedResult {
    let boundary = false;

    if (token.annotation) {
      boundary = this.applyAnnotation(token.annotation) || boundary;
    }

    switch (token.kind) {
      case 'motion': {
        const { event, boundary: moveBoundary } = this.applyMotion(token);
        boundary = moveBoundary || boundary;
        return { events: event ? [event] : [], boundary };
      }
      case 'setpoint':
        this.reportMalformed(token.errors, token.lineNumber);
        if (token.value !== undefined) {
          switch (token.target) {
            case 'fan': this.state.fanPct = token.value; break;
            case 'hotend': this.state.hotendC = token.value; break;
            case 'bed': this.state.bedC = token.value; break;
            case 'chamber': this.state.chamberC = token.value; break;
          }
        }
        break;
      case 'positioning':
        if (token.scope === 'all') this.state.coordinateMode = token.mode;
        this.state.extruderMode = token.mode;
        break;
      case 'set-position':
        this.reportMalformed(token.errors, token.lineNumber);
        Object.assign(this.state.position, token.fields);
        break;
      default:
        break;
    }

    return { events: [], boundary };
  }

  // ── Private ──

  private applyAnnotation(annotation: Annotation): boolean {
    if (annotation.directive === 'category') {
      this.state.category = annotation.label;
      return false;
    }
    return this.applyDecision(this.strategy.onAnnotation(annotation));
  }

  /** Returns true when a new layer was opened (an empty layer is re-based instead). */
  private applyDecision(decision: BoundaryDecision): boolean {
    if (decision.z !== undefined) {
      this.state.layerZ = decision.z;
      this.layerZPending = false;
    }
    if (!decision.boundary) return false;

    if (decision.z === undefined) this.layerZPending = true;
    if (this.eventsInLayer === 0) return false;

    this.state.layer++;
    this.eventsInLayer = 0;
    return true;
  }

  private applyMotion(token: MotionToken): { event: MotionEvent | null; boundary: boolean } {
    this.reportMalformed(token.errors, token.lineNumber);

    const { fields } = token;
    const pos = this.state.position;
    if (fields.f !== undefined) this.state.feedrateMmPerMin = fields.f;

    const relative = this.state.coordinateMode === 'relative';
    const to: Point3D = {
      x: fields.x === undefined ? pos.x : relative ? pos.x + fields.x : fields.x,
      y: fields.y === undefined ? pos.y : relative ? pos.y + fields.y : fields.y,
      z: fields.z === undefined ? pos.z : relative ? pos.z + fields.z : fields.z,
    };

    let deltaE = 0;
    let nextE = pos.e;
    if (fields.e !== undefined) {
      if (this.state.extruderMode === 'relative') {
        deltaE = fields.e;
        nextE = pos.e + fields.e;
      } else {
        deltaE = fields.e - pos.e;
        nextE = fields.e;
      }
    }

    const from: Point3D = { x: pos.x, y: pos.y, z: pos.z };
    const dx = to.x - from.x;
    const dy = to.y - from.y;
    const dz = to.z - from.z;
    const distanceMm = Math.sqrt(dx * dx + dy * dy + dz * dz);

    pos.x = to.x;
    pos.y = to.y;
    pos.z = to.z;
    pos.e = nextE;

    if (distanceMm === 0 && deltaE === 0) {
      return { event: null, boundary: false };
    }

    const isExtruding = deltaE > 0;
    if (deltaE < 0) {
      this.issue({
        kind: 'negative-extrusion',
        lineNumber: token.lineNumber,
        value: deltaE,
        message: `extrusion delta ${deltaE} clamped to 0`,
      });
    }

    const boundary = distanceMm > 0
      ? this.applyDecision(this.strategy.onMove({ z: to.z, isExtruding }))
      : false;

    if (this.layerZPending && isExtruding) {
      this.state.layerZ = to.z;
      this.layerZPending = false;
    }

    if (dz < 0 && to.z < this.state.layerZ - this.epsilon) {
      this.issue({
        kind: 'z-decrease',
        lineNumber: token.lineNumber,
        value: to.z,
        message: `Z dropped to ${to.z} below layer Z ${this.state.layerZ}`,
      });
    }

    const feedrate = this.state.feedrateMmPerMin;
    const speedMmS = feedrate > 0 ? feedrate / 60 : 0;
    const durationS = distanceMm > 0 && speedMmS > 0 ? distanceMm / speedMmS : 0;
    const extrusionMm = Math.max(deltaE, 0);
    const flowMm3S = durationS > 0 && extrusionMm > 0 ? (extrusionMm / durationS) * this.area : 0;

    const event: MotionEvent = Object.freeze({
      index: this.eventCount++,
      lineNumber: token.lineNumber,
      command: token.command,
      from: Object.freeze(from),
      to: Object.freeze({ ...to }),
      distanceMm,
      isExtruding,
      extrusionMm,
      retractionMm: deltaE < 0 ? -deltaE : 0,
      feedrateMmPerMin: feedrate,
      speedMmS,
      durationS,
      flowMm3S,
      z: to.z,
      category: this.state.category,
      fanPct: this.state.fanPct,
      hotendC: this.state.hotendC,
      bedC: this.state.bedC,
      chamberC: this.state.chamberC,
      layer: this.state.layer,
      layerZ: this.state.layerZ,
    });
    this.eventsInLayer++;

    return { event, boundary };
  }

  private reportMalformed(errors: MalformedField[], lineNumber: number): void {
    for (const error of errors) {
      this.issue({ kind: 'malformed-field', lineNumber, field: error.field, text: error.text });
    }
  }

  private issue(issue: ProfileIssue): void {
    this.onIssue?.(issue);
  }
}
