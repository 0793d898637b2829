/**
 * Single-pass G-code profiler.
 *
 * Wires the pipeline line → classify → EventBuilder → {GroupAggregator,
 * CategoryAggregator}. Lines are processed synchronously in the order they
 * arrive; `profileFile` only awaits the next chunk from the read stream.
 *
 * @module profiler/GcodeProfiler
 */

import * as fs from 'fs';
import { classify } from '../parsers/lineClassifier';
import { GcodeLineReader } from '../parsers/gcodeLineReader';
import { EventBuilder } from '../builder/EventBuilder';
import { GroupAggregator } from '../aggregation/GroupAggregator';
import { CategoryAggregator } from '../aggregation/CategoryAggregator';
import { IssueLog } from '../aggregation/IssueLog';
import { TopSegmentsTracker } from '../aggregation/TopSegmentsTracker';
import { MetricAccumulator } from '../aggregation/MetricAccumulator';
import { filamentAreaMm2, resolveProfileConfig } from '../config/profileConfig';
import type { ProfileConfig, ProfileConfigInput } from '../config/profileConfig';
import type { MotionEvent, ProfileIssue } from '../types/motion';
import type { GroupSummary, ProfileResult, ProfileTotals } from '../aggregation/types';

export const DEFAULT_STATUS_EVERY_LINES = 250_000;

export interface GcodeProfilerOptions extends ProfileConfigInput {
  /** Keep every event on the result (default true). */
  keepEvents?: boolean;
  /** Lines between `onStatus` calls (default 250 000). */
  statusEveryLines?: number;
  onStatus?: (message: string) => void;
  onIssue?: (issue: ProfileIssue) => void;
}

export class GcodeProfiler {
  readonly config: ProfileConfig;
  private readonly reader: GcodeLineReader;
  private readonly builder: EventBuilder;
  private readonly groups: GroupAggregator;
  private readonly categories: CategoryAggregator;
  private readonly overall: MetricAccumulator;
  private readonly topSegments: TopSegmentsTracker;
  private readonly issueLog: IssueLog;
  private readonly events: MotionEvent[] | null;
  private readonly statusEvery: number;
  private readonly onStatus: ((message: string) => void) | null;
  private result: ProfileResult | null = null;

  constructor(options: GcodeProfilerOptions = {}) {
    this.config = resolveProfileConfig(options);
    this.issueLog = new IssueLog(this.config.issueCap);
    const onIssue = options.onIssue;
    this.builder = new EventBuilder(this.config, {
      onIssue: issue => {
        this.issueLog.record(issue);
        onIssue?.(issue);
      },
    });
    this.groups = new GroupAggregator(this.config);
    this.categories = new CategoryAggregator(this.config);
    this.overall = new MetricAccumulator(this.config);
    this.topSegments = new TopSegmentsTracker(this.config.topSegments);
    this.events = options.keepEvents === false ? null : [];
    this.statusEvery = Math.max(1, Math.floor(options.statusEveryLines ?? DEFAULT_STATUS_EVERY_LINES));
    this.onStatus = options.onStatus ?? null;
    this.reader = new GcodeLineReader({ onLine: (line, n) => this.handleLine(line, n) });
  }

  /** Processes one complete line (no terminator). */
  processLine(line: string): void {
    this.processChunk(`${line}\n`);
  }

  processChunk(chunk: string): void {
    this.assertOpen();
    this.reader.processChunk(chunk);
  }

  /** Flushes, finalizes every bucket and returns the result. Idempotent. */
  finish(): ProfileResult {
    if (this.result) return this.result;
    this.reader.flush();

    const groups = this.groups.finalize();
    const categories = this.categories.finalize();
    this.result = {
      config: this.config,
      boundaryStrategy: this.builder.boundaryStrategy.name,
      totals: computeTotals(groups, this.reader.linesRead, this.config),
      overall: this.overall.finalize(),
      groups,
      categories,
      topFlowSegments: this.topSegments.getTop(),
      events: this.events,
      issues: this.issueLog.issues,
      issueCounts: this.issueLog.getCounts(),
    };
    return this.result;
  }

  // ── Private ──

  private handleLine(line: string, lineNumber: number): void {
    const { events, boundary } = this.builder.feed(classify(line, lineNumber));
    if (boundary) this.groups.boundary();
    for (const event of events) {
      this.groups.accumulate(event);
      this.categories.accumulate(event);
      this.overall.accumulate(event);
      this.topSegments.record(event);
      this.events?.push(event);
    }
    if (this.onStatus && lineNumber % this.statusEvery === 0) {
      this.onStatus(`Parsed ${lineNumber.toLocaleString('en-US')} lines`);
    }
  }

  private assertOpen(): void {
    if (this.result) throw new Error('Profiler already finished');
  }
}

/** Profiles an in-memory G-code program. */
export function profileText(text: string, options: GcodeProfilerOptions = {}): ProfileResult {
  const profiler = new GcodeProfiler(options);
  profiler.processChunk(text);
  return profiler.finish();
}

/** Streams a G-code file through the profiler. Rejects on read errors. */
export async function profileFile(filePath: string, options: GcodeProfilerOptions = {}): Promise<ProfileResult> {
  const profiler = new GcodeProfiler(options);
  const stream = fs.createReadStream(filePath, { encoding: 'utf8' });
  for await (const chunk of stream) {
    profiler.processChunk(typeof chunk === 'string' ? chunk : String(chunk));
  }
  return profiler.finish();
}

function computeTotals(
  groups: readonly GroupSummary[],
  lineCount: number,
  config: ProfileConfig,
): ProfileTotals {
  const totals: ProfileTotals = {
    lineCount,
    eventCount: 0,
    layerCount: groups.length,
    timeS: 0,
    distanceMm: 0,
    extrusionMm: 0,
    travelTimeS: 0,
    extrudeTimeS: 0,
    retractCount: 0,
    retractionMm: 0,
    filamentUsedM: 0,
    filamentUsedG: 0,
  };
  for (const g of groups) {
    totals.eventCount += g.eventCount;
    totals.timeS += g.timeS;
    totals.distanceMm += g.distanceMm;
    totals.extrusionMm += g.extrusionMm;
    totals.travelTimeS += g.travelTimeS;
    totals.extrudeTimeS += g.extrudeTimeS;
    totals.retractCount += g.retractCount;
    totals.retractionMm += g.retractionMm;
  }
  totals.filamentUsedM = totals.extrusionMm / 1000;
  totals.filamentUsedG = totals.extrusionMm * filamentAreaMm2(config.filamentDiameterMm) / 1000 * config.filamentDensityGCm3;
  return totals;
}
