/**
 * Split effective segments at local day or hour boundaries.
 *
 * Boundaries are computed as instants in the resolved zone and the walk is
 * instant-driven, so 23h and 25h DST days need no special casing. Durations
 * are conserved to the microsecond.
 */

import type { Zone } from "luxon";
import type { BoundedPart, EffectiveSegment, Granularity } from "../types.ts";
import { assertValidSegments, withBounds } from "../model/segment.ts";
import { ReportError } from "../utils/errors.ts";
import {
  nextBoundaryUs,
  resolveTimeZone,
  type TimeZoneLike,
} from "../utils/time.ts";

/** Returns the first boundary instant strictly after the given one */
export type NextBoundary = (tsUs: number) => number;

/**
 * Walk one segment across boundaries.
 * A segment inside one interval, or of zero length, comes back as the only part.
 */
export function splitAtBoundaries(
  segment: EffectiveSegment,
  nextBoundary: NextBoundary
): BoundedPart[] {
  if (segment.endTsUs <= segment.startTsUs) {
    return [segment];
  }

  const parts: BoundedPart[] = [];
  let cursor = segment.startTsUs;

  while (cursor < segment.endTsUs) {
    const boundary = nextBoundary(cursor);
    if (boundary <= cursor) {
      throw new ReportError(`Boundary ${boundary} does not advance past ${cursor}`);
    }
    const partEnd = Math.min(segment.endTsUs, boundary);
    parts.push(withBounds(segment, cursor, partEnd));
    cursor = partEnd;
  }

  // Untouched segments are returned as-is rather than as a copy
  if (parts.length === 1) {
    return [segment];
  }
  return parts;
}

/**
 * Boundary function for a resolved zone and granularity
 */
export function boundaryIn(zone: Zone, granularity: Granularity): NextBoundary {
  return (tsUs) => nextBoundaryUs(tsUs, zone, granularity);
}

/**
 * Split every segment so none crosses a local day/hour boundary.
 * Parts of one segment are contiguous and chronological; segments keep
 * their input order.
 */
export function splitSegments(
  segments: readonly EffectiveSegment[],
  timeZone: TimeZoneLike,
  granularity: Granularity
): BoundedPart[] {
  const zone = resolveTimeZone(timeZone);
  assertValidSegments(segments);

  const nextBoundary = boundaryIn(zone, granularity);
  return segments.flatMap((segment) => splitAtBoundaries(segment, nextBoundary));
}

/**
 * Split at local midnights
 */
export function splitByDay(
  segments: readonly EffectiveSegment[],
  timeZone: TimeZoneLike
): BoundedPart[] {
  return splitSegments(segments, timeZone, "day");
}

/**
 * Split at local clock hours
 */
export function splitByHour(
  segments: readonly EffectiveSegment[],
  timeZone: TimeZoneLike
): BoundedPart[] {
  return splitSegments(segments, timeZone, "hour");
}
