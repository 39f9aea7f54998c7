/**
 * Aggregations over effective segments.
 *
 * Every function is a pure pass over the list. Durations are accumulated as
 * integer microseconds and converted to seconds once per bucket. Gaps are
 * excluded everywhere except totalUnobservedGaps.
 */

import type {
  AppWindowTotal,
  EffectiveSegment,
  GroupBy,
  HourBucketEntry,
  Period,
  PeriodBucketEntry,
} from "../types.ts";
import {
  NO_BUNDLE_ID,
  NO_TITLE,
  UNKNOWN_APP,
  UNTAGGED,
  US_PER_SECOND,
  assertValidSegments,
  durationUs,
  isGap,
} from "../model/segment.ts";
import { splitSegments } from "./splitter.ts";
import {
  localDateKey,
  localHour,
  periodKey,
  resolveTimeZone,
  type TimeZoneLike,
} from "../utils/time.ts";

function addTo<K>(map: Map<K, number>, key: K, amount: number): void {
  map.set(key, (map.get(key) ?? 0) + amount);
}

function toSeconds(totalsUs: Map<string, number>): Map<string, number> {
  const result = new Map<string, number>();
  for (const [key, us] of totalsUs) {
    result.set(key, us / US_PER_SECOND);
  }
  return result;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function observed(segments: readonly EffectiveSegment[]): EffectiveSegment[] {
  assertValidSegments(segments);
  return segments.filter((segment) => !isGap(segment));
}

/**
 * Sum observed segments into one bucket per key
 */
function totalsBy(
  segments: readonly EffectiveSegment[],
  keysOf: (segment: EffectiveSegment) => readonly string[]
): Map<string, number> {
  const totals = new Map<string, number>();
  for (const segment of observed(segments)) {
    const us = durationUs(segment);
    for (const key of keysOf(segment)) {
      addTo(totals, key, us);
    }
  }
  return toSeconds(totals);
}

function appNameLabel(segment: EffectiveSegment): string {
  return segment.appName === "" ? UNKNOWN_APP : segment.appName;
}

function tagLabels(segment: EffectiveSegment): readonly string[] {
  return segment.tags.length === 0 ? [UNTAGGED] : segment.tags;
}

/**
 * Bucket label(s) for a segment under a grouping mode; tag mode fans out
 */
export function labelsFor(
  segment: EffectiveSegment,
  groupBy: GroupBy
): readonly string[] {
  switch (groupBy) {
    case "app":
      return [appNameLabel(segment)];
    case "appWindow":
      return [`${appNameLabel(segment)} — ${segment.windowTitle ?? NO_TITLE}`];
    case "tag":
      return tagLabels(segment);
  }
}

/**
 * Total observed working time, in seconds
 */
export function totalWorkingTime(segments: readonly EffectiveSegment[]): number {
  const us = observed(segments).reduce((sum, s) => sum + durationUs(s), 0);
  return us / US_PER_SECOND;
}

/**
 * Total time in unobserved gaps, in seconds
 */
export function totalUnobservedGaps(
  segments: readonly EffectiveSegment[]
): number {
  assertValidSegments(segments);
  const us = segments
    .filter(isGap)
    .reduce((sum, s) => sum + durationUs(s), 0);
  return us / US_PER_SECOND;
}

/**
 * Seconds per bundle id
 */
export function totalsByApplication(
  segments: readonly EffectiveSegment[]
): Map<string, number> {
  return totalsBy(segments, (s) => [s.appBundleId === "" ? NO_BUNDLE_ID : s.appBundleId]);
}

/**
 * Seconds per tag. A segment with several tags counts in full under each.
 */
export function totalsByTag(
  segments: readonly EffectiveSegment[]
): Map<string, number> {
  return totalsBy(segments, tagLabels);
}

export function totalsByWindowTitle(
  segments: readonly EffectiveSegment[]
): Map<string, number> {
  return totalsBy(segments, (s) => [s.windowTitle ?? NO_TITLE]);
}

/**
 * Seconds per application display name
 */
export function totalsByAppName(
  segments: readonly EffectiveSegment[]
): Map<string, number> {
  return totalsBy(segments, (s) => [appNameLabel(s)]);
}

/**
 * Seconds per (app name, window title) pair, largest first
 */
export function totalsByAppNameAndWindow(
  segments: readonly EffectiveSegment[]
): AppWindowTotal[] {
  const byApp = new Map<string, Map<string, number>>();

  for (const segment of observed(segments)) {
    const app = appNameLabel(segment);
    const titles = byApp.get(app) ?? new Map<string, number>();
    addTo(titles, segment.windowTitle ?? NO_TITLE, durationUs(segment));
    byApp.set(app, titles);
  }

  const rows: AppWindowTotal[] = [];
  for (const [appName, titles] of byApp) {
    for (const [windowTitle, us] of titles) {
      rows.push({ appName, windowTitle, seconds: us / US_PER_SECOND });
    }
  }
  return rows.sort((a, b) => b.seconds - a.seconds);
}

/**
 * Seconds per local calendar day (YYYY-MM-DD). Segments crossing midnight
 * contribute to each day only what falls inside it.
 */
export function totalsByDay(
  segments: readonly EffectiveSegment[],
  timeZone: TimeZoneLike
): Map<string, number> {
  const zone = resolveTimeZone(timeZone);
  const totals = new Map<string, number>();

  for (const part of splitSegments(observed(segments), zone, "day")) {
    addTo(totals, localDateKey(part.startTsUs, zone), durationUs(part));
  }
  return toSeconds(totals);
}

/**
 * Seconds per (local hour of day, label). Segments are split at clock hours
 * first; in tag mode each tag gets the full within-hour duration.
 * Zero-length parts add no entry. Sorted by hour, then label.
 */
export function totalsByHour(
  segments: readonly EffectiveSegment[],
  timeZone: TimeZoneLike,
  groupBy: GroupBy
): HourBucketEntry[] {
  const zone = resolveTimeZone(timeZone);
  const buckets = new Map<number, Map<string, number>>();

  for (const part of splitSegments(observed(segments), zone, "hour")) {
    const us = durationUs(part);
    if (us === 0) continue;
    const hour = localHour(part.startTsUs, zone);
    const labels = buckets.get(hour) ?? new Map<string, number>();
    for (const label of labelsFor(part, groupBy)) {
      addTo(labels, label, us);
    }
    buckets.set(hour, labels);
  }

  const entries: HourBucketEntry[] = [];
  for (const [hour, labels] of buckets) {
    for (const [label, us] of labels) {
      entries.push({ hour, label, seconds: us / US_PER_SECOND });
    }
  }
  return entries.sort(
    (a, b) => a.hour - b.hour || compareStrings(a.label, b.label)
  );
}

/**
 * Seconds per (calendar period, label) for day, ISO week or month periods.
 * Segments are split at local midnight before bucketing.
 * Sorted by period, then label.
 */
export function totalsByPeriod(
  segments: readonly EffectiveSegment[],
  timeZone: TimeZoneLike,
  period: Period,
  groupBy: GroupBy
): PeriodBucketEntry[] {
  const zone = resolveTimeZone(timeZone);
  const buckets = new Map<string, Map<string, number>>();

  for (const part of splitSegments(observed(segments), zone, "day")) {
    const key = periodKey(part.startTsUs, zone, period);
    const labels = buckets.get(key) ?? new Map<string, number>();
    for (const label of labelsFor(part, groupBy)) {
      addTo(labels, label, durationUs(part));
    }
    buckets.set(key, labels);
  }

  const entries: PeriodBucketEntry[] = [];
  for (const [key, labels] of buckets) {
    for (const [label, us] of labels) {
      entries.push({ period: key, label, seconds: us / US_PER_SECOND });
    }
  }
  return entries.sort(
    (a, b) => compareStrings(a.period, b.period) || compareStrings(a.label, b.label)
  );
}

/**
 * Merge per-shard totals by summing each key
 */
export function mergeTotals(
  ...partials: ReadonlyArray<ReadonlyMap<string, number>>
): Map<string, number> {
  const merged = new Map<string, number>();
  for (const partial of partials) {
    for (const [key, seconds] of partial) {
      addTo(merged, key, seconds);
    }
  }
  return merged;
}

/**
 * Merge hour buckets from several shards, summing matching (hour, label) pairs
 */
export function mergeHourBuckets(
  ...partials: ReadonlyArray<readonly HourBucketEntry[]>
): HourBucketEntry[] {
  const merged = new Map<number, Map<string, number>>();
  for (const partial of partials) {
    for (const entry of partial) {
      const labels = merged.get(entry.hour) ?? new Map<string, number>();
      addTo(labels, entry.label, entry.seconds);
      merged.set(entry.hour, labels);
    }
  }

  const entries: HourBucketEntry[] = [];
  for (const [hour, labels] of merged) {
    for (const [label, seconds] of labels) {
      entries.push({ hour, label, seconds });
    }
  }
  return entries.sort(
    (a, b) => a.hour - b.hour || compareStrings(a.label, b.label)
  );
}
