/**
 * Public API for layerlens-shared.
 */

// Token and event types
export type {
  AxisField,
  MalformedField,
  Annotation,
  MotionToken,
  SetpointTarget,
  SetpointToken,
  PositioningToken,
  SetPositionToken,
  AnnotationToken,
  CommentToken,
  BlankToken,
  OtherToken,
  Token,
  TokenKind,
} from './types/gcode';
export type {
  Point3D,
  MotionEvent,
  IssueKind,
  MalformedFieldIssue,
  StructuralAnomalyIssue,
  ProfileIssue,
} from './types/motion';

// Configuration
export {
  resolveProfileConfig,
  filamentAreaMm2,
  isBoundaryStrategyName,
  BOUNDARY_STRATEGIES,
  DEFAULT_FILAMENT_DIAMETER_MM,
  DEFAULT_FILAMENT_DENSITY_G_CM3,
  DEFAULT_Z_EPSILON_MM,
  DEFAULT_ISSUE_CAP,
  DEFAULT_TOP_SEGMENTS,
} from './config/profileConfig';
export type { ProfileConfig, ProfileConfigInput, BoundaryStrategyName } from './config/profileConfig';
export {
  parseConfigIni,
  readConfigIni,
  iniValueToNumber,
  configGetFloat,
  extractSlicerConfig,
  toProfileConfigInput,
} from './config/configIni';
export type { ConfigIni, SlicerConfigInfo } from './config/configIni';

// Parsing
export { classify, parseDirective, parseFields } from './parsers/lineClassifier';
export { GcodeLineReader } from './parsers/gcodeLineReader';
export type { GcodeLineReaderCallbacks } from './parsers/gcodeLineReader';

// Event building
export { EventBuilder } from './builder/EventBuilder';
export type { MachineState, PositioningMode, FeedResult, EventBuilderOptions } from './builder/EventBuilder';
export { ZIncreaseBoundary, MarkerBoundary, AutoBoundary, createBoundaryStrategy } from './builder/boundary';
export type { BoundaryStrategy, BoundaryDecision, MoveObservation } from './builder/boundary';

// Statistics
export {
  weightedPercentile,
  peak,
  weightedMean,
  fractionTimeOver,
  histogram,
  timeHistogram,
  makeBinEdges,
  binIndex,
} from './stats/weighted';
export type { WeightedSample, Histogram, HistogramRange } from './stats/weighted';

// Aggregation
export { MetricAccumulator, summarize } from './aggregation/MetricAccumulator';
export type { MetricLimits } from './aggregation/MetricAccumulator';
export { GroupAggregator, LayerGroup } from './aggregation/GroupAggregator';
export { CategoryAggregator, UNCATEGORIZED_LABEL, suppressSpike } from './aggregation/CategoryAggregator';
export { TopSegmentsTracker } from './aggregation/TopSegmentsTracker';
export { IssueLog } from './aggregation/IssueLog';
export type {
  MetricStats,
  BucketTotals,
  BucketSummary,
  GroupSummary,
  CategorySummary,
  ProfileTotals,
  ProfileResult,
} from './aggregation/types';

// Profiler
export { GcodeProfiler, profileText, profileFile, DEFAULT_STATUS_EVERY_LINES } from './profiler/GcodeProfiler';
export type { GcodeProfilerOptions } from './profiler/GcodeProfiler';

// Formatters
export {
  formatProfileJson,
  formatProfileText,
  formatProfileMarkdown,
  formatComparisonText,
  formatComparisonMarkdown,
  fmtDuration,
  fmtNum,
  fmtPct,
  fmtDelta,
} from './formatters/profileDump';
export type { ProfileDumpOptions } from './formatters/profileDump';

// Report
export * from './report';
