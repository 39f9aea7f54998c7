/**
 * worklog-reports: reporting core for effective time-tracking segments.
 * Splits segments at local day/hour boundaries, aggregates totals and
 * exports CSV, JSON and Markdown.
 */

export type {
  AppWindowTotal,
  BoundedPart,
  EffectiveSegment,
  ExportFormat,
  ExportRange,
  Granularity,
  GroupBy,
  HourBucketEntry,
  LabelledTotal,
  Period,
  PeriodBucketEntry,
  ReportConfig,
  ReportIdentity,
  ReportSummary,
  SegmentCoverage,
  SegmentSource,
} from "./types.ts";

export {
  COVERAGE_WIRE,
  NO_BUNDLE_ID,
  NO_TITLE,
  SOURCE_WIRE,
  UNKNOWN_APP,
  UNTAGGED,
  assertValidSegments,
  durationSeconds,
  durationUs,
  isGap,
  sortByStart,
  validateSegment,
  withBounds,
} from "./model/segment.ts";
export { parseIdentity, parseSegments } from "./model/schema.ts";

export {
  splitAtBoundaries,
  splitByDay,
  splitByHour,
  splitSegments,
} from "./reports/splitter.ts";
export {
  labelsFor,
  mergeHourBuckets,
  mergeTotals,
  totalUnobservedGaps,
  totalWorkingTime,
  totalsByAppName,
  totalsByAppNameAndWindow,
  totalsByApplication,
  totalsByDay,
  totalsByHour,
  totalsByPeriod,
  totalsByTag,
  totalsByWindowTitle,
} from "./reports/aggregations.ts";
export {
  CSV_COLUMNS,
  CSV_HEADER,
  escapeCSV,
  escapeMarkdownCell,
  exportSegments,
  exportSegmentsWithConfig,
  exportToCSV,
  exportToJSON,
  exportToMarkdownInvoice,
  generateExportFilename,
} from "./reports/export.ts";
export type {
  ExportOptions,
  InvoiceOptions,
  JsonExport,
  SegmentRecord,
} from "./reports/export.ts";
export {
  buildReportSummary,
  formatReportSummaryText,
  rankTotals,
} from "./reports/summary.ts";

export {
  DEFAULT_CONFIG,
  assertValidConfig,
  identityFromConfig,
  loadConfig,
  resolveConfig,
  resolveTzOffsetSeconds,
  validateConfig,
} from "./config/settings.ts";

export {
  ConfigError,
  InvalidSegmentError,
  ReportError,
  UnknownTimeZoneError,
} from "./utils/errors.ts";
export {
  formatDuration,
  formatHours,
  isValidTimeZone,
  resolveTimeZone,
} from "./utils/time.ts";
export type { TimeZoneLike } from "./utils/time.ts";
export { createLogger, formatError, logger } from "./utils/logger.ts";
export type { Logger, LoggerOptions } from "./utils/logger.ts";
