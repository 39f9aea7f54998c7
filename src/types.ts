/**
 * Core types for worklog-reports
 */

/** Provenance of a segment */
export type SegmentSource = "raw" | "manual";

/** Whether the segment was observed activity or an untracked gap */
export type SegmentCoverage = "observed" | "unobservedGap";

/**
 * A reconciled interval of tracked activity or gap, half-open [start, end).
 * Every report in this package is derived from a list of these.
 */
export interface EffectiveSegment {
  /** Start, microseconds since the UNIX epoch (inclusive) */
  readonly startTsUs: number;
  /** End, microseconds since the UNIX epoch (exclusive) */
  readonly endTsUs: number;
  readonly source: SegmentSource;
  /** Application bundle identifier; empty string is its own category */
  readonly appBundleId: string;
  /** Display name, not unique per bundle id */
  readonly appName: string;
  /** Window title, null when it was not available */
  readonly windowTitle: string | null;
  readonly tags: readonly string[];
  readonly coverage: SegmentCoverage;
  /** Upstream event ids, passed through untouched */
  readonly supportingIds: readonly number[];
}

/** A segment clipped to a single local day or hour */
export type BoundedPart = EffectiveSegment;

/** Boundary granularity for splitting */
export type Granularity = "day" | "hour";

/** How hour and period buckets are labelled */
export type GroupBy = "app" | "tag" | "appWindow";

/** Calendar period for grouped totals */
export type Period = "day" | "week" | "month";

/** Seconds spent under one label during one local hour of day */
export interface HourBucketEntry {
  /** Local hour, 0-23 */
  hour: number;
  label: string;
  seconds: number;
}

/** Seconds spent under one label during one calendar period */
export interface PeriodBucketEntry {
  /** YYYY-MM-DD, YYYY-Www or YYYY-MM depending on the period */
  period: string;
  label: string;
  seconds: number;
}

/** Time spent in one (app, window title) pair */
export interface AppWindowTotal {
  appName: string;
  windowTitle: string;
  seconds: number;
}

/** Machine and user a report was generated for */
export interface ReportIdentity {
  machineId: string;
  username: string;
  uid: number;
}

/** Time range covered by an export, in microseconds */
export interface ExportRange {
  startUs: number;
  endUs: number;
}

/** Export format options */
export type ExportFormat = "csv" | "json" | "markdown";

/** Configuration for report generation */
export interface ReportConfig {
  /** IANA zone (or fixed offset like "UTC+2") for day and hour boundaries */
  timeZone: string;

  /** Whether window titles appear in exports (privacy option) */
  includeTitles: boolean;

  /** Labelling for hourly buckets */
  hourGroupBy: GroupBy;

  /** Labelling for day/week/month buckets */
  periodGroupBy: GroupBy;

  /** Fixed offset for local CSV timestamps; null derives it from timeZone */
  tzOffsetSeconds: number | null;

  machineId: string;
  username: string;
  uid: number;
}

/** Label and total seconds, used in summaries */
export interface LabelledTotal {
  label: string;
  seconds: number;
}

/** Everything a report page shows for one period */
export interface ReportSummary {
  timeZone: string;
  workingSeconds: number;
  gapSeconds: number;
  byApplication: LabelledTotal[];
  byTag: LabelledTotal[];
  byWindowTitle: LabelledTotal[];
  /** Sorted by date ascending */
  byDay: LabelledTotal[];
  byHour: HourBucketEntry[];
  /** ISO weeks labelled by the configured periodGroupBy */
  byWeek: PeriodBucketEntry[];
}
