/**
 * Boundary schemas for segment and identity data arriving as JSON
 */

import { z } from "zod";
import type {
  EffectiveSegment,
  ReportIdentity,
  SegmentCoverage,
} from "../types.ts";
import { InvalidSegmentError, ReportError } from "../utils/errors.ts";

const timestampUs = z
  .number()
  .int()
  .refine(Number.isSafeInteger, "must be a safe integer");

export const SegmentWireSchema = z
  .object({
    start_ts_us: timestampUs,
    end_ts_us: timestampUs,
    source: z.enum(["raw", "manual"]),
    app_bundle_id: z.string(),
    app_name: z.string(),
    window_title: z.string().nullable().default(null),
    tags: z.array(z.string()).default([]),
    coverage: z.enum(["observed", "unobserved_gap"]),
    supporting_ids: z.array(z.number().int()).default([]),
  })
  .refine((s) => s.end_ts_us >= s.start_ts_us, {
    message: "end_ts_us must not be before start_ts_us",
    path: ["end_ts_us"],
  });

export type SegmentWire = z.infer<typeof SegmentWireSchema>;

export const IdentitySchema = z.object({
  machine_id: z.string(),
  username: z.string(),
  uid: z.number().int().nonnegative(),
});

const COVERAGE_FROM_WIRE: Record<SegmentWire["coverage"], SegmentCoverage> = {
  observed: "observed",
  unobserved_gap: "unobservedGap",
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

/**
 * Convert one validated wire record into the in-memory model
 */
export function fromWire(wire: SegmentWire): EffectiveSegment {
  return {
    startTsUs: wire.start_ts_us,
    endTsUs: wire.end_ts_us,
    source: wire.source,
    appBundleId: wire.app_bundle_id,
    appName: wire.app_name,
    windowTitle: wire.window_title,
    tags: wire.tags,
    coverage: COVERAGE_FROM_WIRE[wire.coverage],
    supportingIds: wire.supporting_ids,
  };
}

/**
 * Parse an untrusted array of segments, e.g. from the timeline component's
 * JSON output
 */
export function parseSegments(input: unknown): EffectiveSegment[] {
  if (!Array.isArray(input)) {
    throw new InvalidSegmentError("expected an array of segments");
  }

  return input.map((item: unknown, index) => {
    const result = SegmentWireSchema.safeParse(item);
    if (!result.success) {
      throw new InvalidSegmentError(formatIssues(result.error), index);
    }
    return fromWire(result.data);
  });
}

/**
 * Parse an identity block in its exported shape
 */
export function parseIdentity(input: unknown): ReportIdentity {
  const result = IdentitySchema.safeParse(input);
  if (!result.success) {
    throw new ReportError(`Invalid identity: ${formatIssues(result.error)}`);
  }
  return {
    machineId: result.data.machine_id,
    username: result.data.username,
    uid: result.data.uid,
  };
}
