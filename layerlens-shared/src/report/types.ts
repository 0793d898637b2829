/**
 * Report-specific types for HTML profile report generation.
 */

import type { ProfileComparison } from './compare';

/** Options for HTML report generation. */
export interface HtmlReportOptions {
  /** G-code file name to display in the header. */
  fileName?: string;
  /** Color theme (default: 'dark'). */
  theme?: 'dark' | 'light';
  /** Legend histogram bins (default: 20). */
  bins?: number;
  /** Renders the legend tables (default: true). */
  legends?: boolean;
  /** Slowest layers listed (default: 10). */
  topNSlowest?: number;
  /** Adds a comparison section against a second profile. */
  comparison?: ProfileComparison;
  /** Timestamp shown in the header (default: now). */
  generatedAt?: Date;
}
