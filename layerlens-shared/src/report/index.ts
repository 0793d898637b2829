/**
 * Public API for the report module.
 */

export type { HtmlReportOptions } from './types';
export { generateHtmlReport } from './htmlReportGenerator';
export { openInBrowser } from './openBrowser';
export { escapeHtml, svgLineChart, svgBarChart } from './htmlHelpers';
export type { ChartSeries, ChartOptions, ChartBar } from './htmlHelpers';
export { buildJsonSummary, slowestLayers, statOrNull, DEFAULT_TOP_N_SLOWEST } from './summary';
export type { JsonSummary } from './summary';
export { buildLegends, buildLegend, DEFAULT_LEGEND_BINS } from './legends';
export type { Legend, LegendBin, LegendName } from './legends';
export {
  toCsv,
  buildLayersCsv,
  buildTopSegmentsCsv,
  buildEventsCsv,
  buildFeatureFlowHistogram,
  buildFeatureFlowCsv,
  sidecarPaths,
  writeCsvExports,
  FEATURE_FLOW_BINS,
} from './csvExports';
export type { CsvCell, FeatureFlowRow, ManifestEntry, ExportManifest, CsvExportOptions } from './csvExports';
export { compareProfiles, alignLayersByZ, nearestLayer } from './compare';
export type { ProfileComparison, CompareMetricRow, LayerAlignmentRow, AlignedLayer } from './compare';
