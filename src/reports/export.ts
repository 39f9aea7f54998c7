/**
 * Export functionality for worklog-reports
 * Supports CSV, JSON and Markdown invoice formats
 */

import type {
  EffectiveSegment,
  ExportFormat,
  ExportRange,
  ReportConfig,
  ReportIdentity,
} from "../types.ts";
import {
  COVERAGE_WIRE,
  SOURCE_WIRE,
  assertValidSegments,
  durationSeconds,
  isGap,
  sortByStart,
} from "../model/segment.ts";
import {
  totalsByAppName,
  totalsByAppNameAndWindow,
} from "./aggregations.ts";
import {
  formatDuration,
  formatIsoInstant,
  offsetZone,
} from "../utils/time.ts";
import {
  identityFromConfig,
  resolveTzOffsetSeconds,
} from "../config/settings.ts";

/** CSV columns, in order */
export const CSV_COLUMNS = [
  "machine_id",
  "username",
  "segment_start_local",
  "segment_end_local",
  "segment_start_utc",
  "segment_end_utc",
  "duration_seconds",
  "source",
  "app_bundle_id",
  "app_name",
  "window_title",
  "tags",
  "coverage",
] as const;

export const CSV_HEADER = CSV_COLUMNS.join(",");

/** Separator between tags inside the tags column */
export const TAG_SEPARATOR = ";";

/** One element of the JSON export's segments array */
export interface SegmentRecord {
  start_ts_us: number;
  end_ts_us: number;
  start_utc: string;
  end_utc: string;
  duration_seconds: number;
  source: string;
  app_bundle_id: string;
  app_name: string;
  window_title: string | null;
  tags: string[];
  coverage: string;
  supporting_ids: number[];
}

/** Shape of the JSON export document */
export interface JsonExport {
  identity: {
    machine_id: string;
    username: string;
    uid: number;
  };
  exported_at_utc: string;
  range: {
    start_utc: string;
    end_utc: string;
  };
  segments: SegmentRecord[];
}

export interface InvoiceOptions {
  /** Break tasks down by window title (default: true) */
  includeTitles?: boolean;
  /** Offset used to display dates (default: 0) */
  tzOffsetSeconds?: number;
  /** Instant shown as the generation time (default: now) */
  generatedAt?: Date;
}

export interface ExportOptions {
  format: ExportFormat;
  identity: ReportIdentity;
  range: ExportRange;
  includeTitles: boolean;
  tzOffsetSeconds: number;
  exportedAt?: Date;
}

/**
 * Escape a value for CSV
 */
export function escapeCSV(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Escape a value for a Markdown table cell
 */
export function escapeMarkdownCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n|\r/g, " ");
}

function dateToUs(date: Date): number {
  return date.getTime() * 1000;
}

/**
 * Export segments to CSV: one header row, then one row per segment ordered
 * by start time
 */
export function exportToCSV(
  segments: readonly EffectiveSegment[],
  identity: ReportIdentity,
  includeTitles: boolean,
  tzOffsetSeconds: number
): string {
  assertValidSegments(segments);
  const localZone = offsetZone(tzOffsetSeconds);
  const lines: string[] = [CSV_HEADER];

  for (const segment of sortByStart(segments)) {
    const title = includeTitles ? (segment.windowTitle ?? "") : "";

    const row = [
      escapeCSV(identity.machineId),
      escapeCSV(identity.username),
      formatIsoInstant(segment.startTsUs, localZone),
      formatIsoInstant(segment.endTsUs, localZone),
      formatIsoInstant(segment.startTsUs),
      formatIsoInstant(segment.endTsUs),
      durationSeconds(segment).toFixed(3),
      SOURCE_WIRE[segment.source],
      escapeCSV(segment.appBundleId),
      escapeCSV(segment.appName),
      escapeCSV(title),
      escapeCSV(segment.tags.join(TAG_SEPARATOR)),
      COVERAGE_WIRE[segment.coverage],
    ];

    lines.push(row.join(","));
  }

  return lines.join("\n");
}

function toRecord(
  segment: EffectiveSegment,
  includeTitles: boolean
): SegmentRecord {
  return {
    start_ts_us: segment.startTsUs,
    end_ts_us: segment.endTsUs,
    start_utc: formatIsoInstant(segment.startTsUs),
    end_utc: formatIsoInstant(segment.endTsUs),
    duration_seconds: durationSeconds(segment),
    source: SOURCE_WIRE[segment.source],
    app_bundle_id: segment.appBundleId,
    app_name: segment.appName,
    window_title: includeTitles ? segment.windowTitle : null,
    tags: [...segment.tags],
    coverage: COVERAGE_WIRE[segment.coverage],
    supporting_ids: [...segment.supportingIds],
  };
}

/**
 * Export segments to a JSON document with identity and range metadata
 */
export function exportToJSON(
  segments: readonly EffectiveSegment[],
  identity: ReportIdentity,
  range: ExportRange,
  includeTitles: boolean,
  exportedAt: Date = new Date()
): string {
  assertValidSegments(segments);

  const exportData: JsonExport = {
    identity: {
      machine_id: identity.machineId,
      username: identity.username,
      uid: identity.uid,
    },
    exported_at_utc: formatIsoInstant(dateToUs(exportedAt)),
    range: {
      start_utc: formatIsoInstant(range.startUs),
      end_utc: formatIsoInstant(range.endUs),
    },
    segments: sortByStart(segments).map((segment) =>
      toRecord(segment, includeTitles)
    ),
  };

  return JSON.stringify(exportData, null, 2);
}

/**
 * Export a Markdown invoice of observed time, by app and optionally by
 * window title
 */
export function exportToMarkdownInvoice(
  segments: readonly EffectiveSegment[],
  identity: ReportIdentity,
  range: ExportRange,
  options: InvoiceOptions = {}
): string {
  const {
    includeTitles = true,
    tzOffsetSeconds = 0,
    generatedAt = new Date(),
  } = options;

  assertValidSegments(segments);
  const zone = offsetZone(tzOffsetSeconds);
  const displayDate = (tsUs: number): string =>
    formatIsoInstant(tsUs, zone).slice(0, 16).replace("T", " ");

  const observedSegments = segments.filter((s) => !isGap(s));
  const byApp = [...totalsByAppName(segments)].sort((a, b) => b[1] - a[1]);
  const totalSeconds = byApp.reduce((sum, [, seconds]) => sum + seconds, 0);
  const percent = (seconds: number): string =>
    `${(totalSeconds > 0 ? (seconds / totalSeconds) * 100 : 0).toFixed(1)}%`;

  const lines: string[] = [];

  lines.push("# Invoice");
  lines.push("");
  lines.push("| Field | Value |");
  lines.push("|-------|-------|");
  lines.push(
    `| **Date Range** | ${displayDate(range.startUs)} — ${displayDate(range.endUs)} |`
  );
  lines.push(`| **Machine** | ${escapeMarkdownCell(identity.machineId)} |`);
  lines.push(`| **User** | ${escapeMarkdownCell(identity.username)} |`);
  lines.push(`| **Generated** | ${displayDate(dateToUs(generatedAt))} |`);
  lines.push("");

  lines.push("## Tasks");
  lines.push("");

  if (includeTitles) {
    const rows = totalsByAppNameAndWindow(segments);
    lines.push("| Application | Window / Task | Duration | % of Total |");
    lines.push("|-------------|---------------|----------|------------|");
    for (const [app] of byApp) {
      for (const row of rows.filter((r) => r.appName === app)) {
        lines.push(
          `| ${escapeMarkdownCell(app)} | ${escapeMarkdownCell(row.windowTitle)} | ${formatDuration(row.seconds)} | ${percent(row.seconds)} |`
        );
      }
    }
  } else {
    lines.push("| Application | Duration | % of Total |");
    lines.push("|-------------|----------|------------|");
    for (const [app, seconds] of byApp) {
      lines.push(`| ${escapeMarkdownCell(app)} | ${formatDuration(seconds)} | ${percent(seconds)} |`);
    }
  }

  lines.push("");
  lines.push("## Summary");
  lines.push("");
  lines.push("| Metric | Value |");
  lines.push("|--------|-------|");
  lines.push(`| **Total Tracked Time** | ${formatDuration(totalSeconds)} |`);
  lines.push(`| **Total Hours** | ${(totalSeconds / 3600).toFixed(2)} |`);
  lines.push(`| **Unique Applications** | ${byApp.length} |`);
  lines.push(`| **Segments** | ${observedSegments.length} |`);

  return lines.join("\n");
}

/**
 * Export segments in the requested format
 */
export function exportSegments(
  segments: readonly EffectiveSegment[],
  options: ExportOptions
): string {
  switch (options.format) {
    case "csv":
      return exportToCSV(
        segments,
        options.identity,
        options.includeTitles,
        options.tzOffsetSeconds
      );
    case "json":
      return exportToJSON(
        segments,
        options.identity,
        options.range,
        options.includeTitles,
        options.exportedAt
      );
    case "markdown":
      return exportToMarkdownInvoice(segments, options.identity, options.range, {
        includeTitles: options.includeTitles,
        tzOffsetSeconds: options.tzOffsetSeconds,
        generatedAt: options.exportedAt,
      });
  }
}

/**
 * Export with identity, title privacy and local offset taken from the report
 * configuration. The offset is fixed at the range start unless configured.
 */
export function exportSegmentsWithConfig(
  segments: readonly EffectiveSegment[],
  format: ExportFormat,
  range: ExportRange,
  config: ReportConfig,
  exportedAt?: Date
): string {
  return exportSegments(segments, {
    format,
    identity: identityFromConfig(config),
    range,
    includeTitles: config.includeTitles,
    tzOffsetSeconds: resolveTzOffsetSeconds(config, range.startUs),
    exportedAt,
  });
}

const EXTENSIONS: Record<ExportFormat, string> = {
  csv: "csv",
  json: "json",
  markdown: "md",
};

/**
 * Generate a default export filename from the range's UTC dates
 */
export function generateExportFilename(
  range: ExportRange,
  format: ExportFormat
): string {
  const startStr = formatIsoInstant(range.startUs).slice(0, 10);
  const endStr = formatIsoInstant(range.endUs).slice(0, 10);
  return `worklog-${startStr}-to-${endStr}.${EXTENSIONS[format]}`;
}
