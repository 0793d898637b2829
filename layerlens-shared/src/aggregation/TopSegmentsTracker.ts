/**
 * Keeps the N extrusion events with the highest volumetric flow.
 *
 * Sorted descending by flow; ties keep stream order.
 */

import type { MotionEvent } from '../types/motion';

export class TopSegmentsTracker {
  private readonly top: MotionEvent[] = [];

  constructor(private readonly limit: number) {}

  record(event: MotionEvent): void {
    if (this.limit <= 0 || event.flowMm3S <= 0) return;
    if (this.top.length >= this.limit && event.flowMm3S <= this.top[this.top.length - 1].flowMm3S) return;

    let i = this.top.length;
    while (i > 0 && this.top[i - 1].flowMm3S < event.flowMm3S) i--;
    this.top.splice(i, 0, event);
    if (this.top.length > this.limit) this.top.pop();
  }

  getTop(): MotionEvent[] {
    return [...this.top];
  }
}
