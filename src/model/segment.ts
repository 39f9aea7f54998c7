/**
 * Helpers over EffectiveSegment: durations, validation, wire values and
 * display sentinels
 */

import type {
  EffectiveSegment,
  SegmentCoverage,
  SegmentSource,
} from "../types.ts";
import { InvalidSegmentError } from "../utils/errors.ts";

export const US_PER_SECOND = 1_000_000;
export const US_PER_MS = 1_000;

/** Display labels for missing keys, applied only when grouping or exporting */
export const NO_BUNDLE_ID = "(no bundle id)";
export const NO_TITLE = "(no title)";
export const UNTAGGED = "(untagged)";
export const UNKNOWN_APP = "(unknown)";

/** Serialized form of each coverage value, shared by every exporter */
export const COVERAGE_WIRE: Record<SegmentCoverage, string> = {
  observed: "observed",
  unobservedGap: "unobserved_gap",
};

/** Serialized form of each source value */
export const SOURCE_WIRE: Record<SegmentSource, string> = {
  raw: "raw",
  manual: "manual",
};

export function durationUs(segment: EffectiveSegment): number {
  return segment.endTsUs - segment.startTsUs;
}

export function durationSeconds(segment: EffectiveSegment): number {
  return durationUs(segment) / US_PER_SECOND;
}

export function isGap(segment: EffectiveSegment): boolean {
  return segment.coverage === "unobservedGap";
}

/**
 * Copy a segment with new bounds; every other field is carried over as is
 */
export function withBounds(
  segment: EffectiveSegment,
  startTsUs: number,
  endTsUs: number
): EffectiveSegment {
  return { ...segment, startTsUs, endTsUs };
}

/**
 * Check one segment, returning a list of problems (empty when valid)
 */
export function validateSegment(segment: EffectiveSegment): string[] {
  const errors: string[] = [];

  if (!Number.isSafeInteger(segment.startTsUs)) {
    errors.push(`startTsUs must be a safe integer, got ${segment.startTsUs}`);
  }
  if (!Number.isSafeInteger(segment.endTsUs)) {
    errors.push(`endTsUs must be a safe integer, got ${segment.endTsUs}`);
  }
  if (segment.endTsUs < segment.startTsUs) {
    errors.push(
      `endTsUs (${segment.endTsUs}) is before startTsUs (${segment.startTsUs})`
    );
  }

  return errors;
}

/**
 * Reject the whole list if any segment is malformed.
 * Called by the splitter and every aggregation before producing output.
 */
export function assertValidSegments(
  segments: readonly EffectiveSegment[]
): void {
  segments.forEach((segment, index) => {
    const errors = validateSegment(segment);
    if (errors.length > 0) {
      throw new InvalidSegmentError(errors.join("; "), index);
    }
  });
}

/**
 * Sort by start time. Array.prototype.sort is stable, so ties keep input order.
 */
export function sortByStart(
  segments: readonly EffectiveSegment[]
): EffectiveSegment[] {
  return [...segments].sort((a, b) => a.startTsUs - b.startTsUs);
}
