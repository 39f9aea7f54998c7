/**
 * Report summary for one period: every aggregate a report page shows,
 * plus a plain-text rendering
 */

import type {
  EffectiveSegment,
  LabelledTotal,
  ReportConfig,
  ReportSummary,
} from "../types.ts";
import {
  totalUnobservedGaps,
  totalWorkingTime,
  totalsByApplication,
  totalsByDay,
  totalsByHour,
  totalsByPeriod,
  totalsByTag,
  totalsByWindowTitle,
} from "./aggregations.ts";
import { resolveTimeZone, formatHours } from "../utils/time.ts";
import { createLogger } from "../utils/logger.ts";

const log = createLogger({ scope: "summary" });

/**
 * Map of totals as a list, largest first
 */
export function rankTotals(totals: ReadonlyMap<string, number>): LabelledTotal[] {
  return Array.from(totals.entries())
    .map(([label, seconds]) => ({ label, seconds }))
    .sort((a, b) => b.seconds - a.seconds);
}

/**
 * Build the summary for a list of segments. The zone is resolved up front so
 * a bad zone fails before any aggregation runs.
 */
export function buildReportSummary(
  segments: readonly EffectiveSegment[],
  config: Pick<ReportConfig, "timeZone" | "hourGroupBy" | "periodGroupBy">
): ReportSummary {
  const zone = resolveTimeZone(config.timeZone);

  const byDay = Array.from(totalsByDay(segments, zone).entries())
    .map(([label, seconds]) => ({ label, seconds }))
    .sort((a, b) => (a.label < b.label ? -1 : a.label > b.label ? 1 : 0));

  const summary: ReportSummary = {
    timeZone: zone.name,
    workingSeconds: totalWorkingTime(segments),
    gapSeconds: totalUnobservedGaps(segments),
    byApplication: rankTotals(totalsByApplication(segments)),
    byTag: rankTotals(totalsByTag(segments)),
    byWindowTitle: rankTotals(totalsByWindowTitle(segments)),
    byDay,
    byHour: totalsByHour(segments, zone, config.hourGroupBy),
    byWeek: totalsByPeriod(segments, zone, "week", config.periodGroupBy),
  };

  log.debug(
    `Summarized ${segments.length} segments in ${zone.name}: ${formatHours(summary.workingSeconds)} working`
  );
  return summary;
}

function section(lines: string[], title: string, rows: LabelledTotal[]): void {
  lines.push("-".repeat(40));
  lines.push(title);
  lines.push("-".repeat(40));

  for (const row of rows) {
    const hours = (row.seconds / 3600).toFixed(2);
    lines.push(`  ${row.label.padEnd(25)} ${hours.padStart(8)}h`);
  }

  lines.push("");
}

/**
 * Format a summary as text
 */
export function formatReportSummaryText(summary: ReportSummary): string {
  const lines: string[] = [];

  lines.push("=".repeat(60));
  lines.push("WORK TIME REPORT");
  lines.push("=".repeat(60));
  lines.push("");
  lines.push(`Time zone: ${summary.timeZone}`);
  lines.push(
    `Working time: ${formatHours(summary.workingSeconds)} (${(summary.workingSeconds / 3600).toFixed(2)}h)`
  );
  lines.push(`Untracked gaps: ${formatHours(summary.gapSeconds)}`);
  lines.push("");

  section(lines, "DAILY BREAKDOWN", summary.byDay);
  section(lines, "APPLICATIONS", summary.byApplication);
  section(lines, "TAGS", summary.byTag);

  lines.push("=".repeat(60));

  return lines.join("\n");
}
