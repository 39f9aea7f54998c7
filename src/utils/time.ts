/**
 * Time zone resolution, local calendar keys and duration formatting.
 * All calendar arithmetic goes through luxon so DST rules come from the
 * runtime's IANA database.
 */

import { DateTime, FixedOffsetZone, Info, type Zone } from "luxon";
import type { Granularity, Period } from "../types.ts";
import { US_PER_MS } from "../model/segment.ts";
import { UnknownTimeZoneError } from "./errors.ts";

/** Anything a zone can be resolved from */
export type TimeZoneLike = string | Zone;

/**
 * Resolve a zone name (IANA, "UTC", "UTC+3", "system") to a luxon Zone.
 * Throws UnknownTimeZoneError when the runtime does not know it.
 */
export function resolveTimeZone(timeZone: TimeZoneLike): Zone {
  if (typeof timeZone !== "string") {
    if (!timeZone.isValid) {
      throw new UnknownTimeZoneError(timeZone.name);
    }
    return timeZone;
  }

  const name = timeZone.trim();
  if (name === "") {
    throw new UnknownTimeZoneError(timeZone);
  }

  const zone = Info.normalizeZone(name);
  if (!zone.isValid) {
    throw new UnknownTimeZoneError(timeZone);
  }
  return zone;
}

/**
 * Whether a zone name resolves
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    resolveTimeZone(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Zone of the host, falling back to UTC
 */
export function systemTimeZone(): string {
  return DateTime.local().zoneName ?? "UTC";
}

/**
 * A fixed-offset zone, e.g. for CSV local timestamps
 */
export function offsetZone(offsetSeconds: number): Zone {
  return FixedOffsetZone.instance(Math.round(offsetSeconds / 60));
}

/**
 * UTC offset of a zone at a given instant, in seconds
 */
export function offsetSecondsAt(zone: Zone, tsUs: number): number {
  return zone.offset(Math.floor(tsUs / US_PER_MS)) * 60;
}

/**
 * Wall-clock view of a microsecond instant in a zone
 */
export function dateTimeAt(tsUs: number, zone: Zone): DateTime {
  return DateTime.fromMillis(Math.floor(tsUs / US_PER_MS), { zone });
}

/**
 * First instant of the next local date. startOf("day") lands on the first
 * existing wall time, so a date whose midnight is skipped starts at 01:00.
 */
function nextDayStartMs(local: DateTime): number {
  return local.startOf("day").plus({ days: 1 }).startOf("day").toMillis();
}

/**
 * First instant after ms that starts a local hour: either the wall clock
 * reads hh:00:00.000, or an offset change moves it into a different hour
 */
function nextHourStartMs(ms: number, zone: Zone): number {
  const local = DateTime.fromMillis(ms, { zone });
  const wallHourEnd =
    ms + (60 - local.minute) * 60_000 - local.second * 1000 - local.millisecond;
  const offset = zone.offset(ms);
  if (zone.offset(wallHourEnd) === offset) {
    return wallHourEnd;
  }

  // The offset changes first; find the transition instant
  let before = ms;
  let after = wallHourEnd;
  while (after - before > 1) {
    const mid = Math.floor((before + after) / 2);
    if (zone.offset(mid) === offset) {
      before = mid;
    } else {
      after = mid;
    }
  }

  const atTransition = DateTime.fromMillis(after, { zone });
  const justBefore = DateTime.fromMillis(after - 1, { zone });
  const onTheHour =
    atTransition.minute === 0 &&
    atTransition.second === 0 &&
    atTransition.millisecond === 0;
  if (
    onTheHour ||
    atTransition.hour !== justBefore.hour ||
    atTransition.day !== justBefore.day
  ) {
    return after;
  }
  return nextHourStartMs(after, zone);
}

/**
 * Instant of the first day/hour boundary strictly after tsUs.
 * Boundaries always fall on whole milliseconds, so the result is exact.
 */
export function nextBoundaryUs(
  tsUs: number,
  zone: Zone,
  granularity: Granularity
): number {
  const ms = Math.floor(tsUs / US_PER_MS);
  const next =
    granularity === "day"
      ? nextDayStartMs(dateTimeAt(tsUs, zone))
      : nextHourStartMs(ms, zone);
  return next * US_PER_MS;
}

/**
 * Local calendar date, YYYY-MM-DD
 */
export function localDateKey(tsUs: number, zone: Zone): string {
  return dateTimeAt(tsUs, zone).toFormat("yyyy-MM-dd");
}

/**
 * Local hour of day, 0-23
 */
export function localHour(tsUs: number, zone: Zone): number {
  return dateTimeAt(tsUs, zone).hour;
}

/**
 * Bucket key for a calendar period: YYYY-MM-DD, ISO YYYY-Www, or YYYY-MM
 */
export function periodKey(tsUs: number, zone: Zone, period: Period): string {
  const local = dateTimeAt(tsUs, zone);
  switch (period) {
    case "day":
      return local.toFormat("yyyy-MM-dd");
    case "week":
      return local.toFormat("kkkk-'W'WW");
    case "month":
      return local.toFormat("yyyy-MM");
  }
}

/**
 * ISO-8601 timestamp with milliseconds; "Z" when the offset is zero
 */
export function formatIsoInstant(
  tsUs: number,
  zone: Zone = FixedOffsetZone.utcInstance
): string {
  const local = dateTimeAt(tsUs, zone);
  const offset = local.offset === 0 ? "'Z'" : "ZZ";
  return local.toFormat(`yyyy-MM-dd'T'HH:mm:ss.SSS${offset}`);
}

/**
 * Format seconds for display, e.g. "2h 5m"
 */
export function formatHours(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);

  if (hours === 0) {
    return `${minutes}m`;
  } else if (minutes === 0) {
    return `${hours}h`;
  } else {
    return `${hours}h ${minutes}m`;
  }
}

/**
 * Format duration as HH:MM:SS (fractional seconds dropped)
 */
export function formatDuration(seconds: number): string {
  const whole = Math.floor(seconds);
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const secs = whole % 60;

  return [
    hours.toString().padStart(2, "0"),
    minutes.toString().padStart(2, "0"),
    secs.toString().padStart(2, "0"),
  ].join(":");
}
