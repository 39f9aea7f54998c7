/**
 * Tests for segment and identity parsing
 */

import { describe, test, expect } from "vitest";
import { parseIdentity, parseSegments } from "./schema.ts";
import { InvalidSegmentError, ReportError } from "../utils/errors.ts";

const wire = {
  start_ts_us: 1_705_312_800_000_000,
  end_ts_us: 1_705_316_400_000_000,
  source: "manual",
  app_bundle_id: "com.example.editor",
  app_name: "Editor",
  window_title: "notes.md",
  tags: ["billable"],
  coverage: "unobserved_gap",
  supporting_ids: [42],
};

describe("parseSegments", () => {
  test("converts wire records to segments", () => {
    expect(parseSegments([wire])).toEqual([
      {
        startTsUs: 1_705_312_800_000_000,
        endTsUs: 1_705_316_400_000_000,
        source: "manual",
        appBundleId: "com.example.editor",
        appName: "Editor",
        windowTitle: "notes.md",
        tags: ["billable"],
        coverage: "unobservedGap",
        supportingIds: [42],
      },
    ]);
  });

  test("defaults optional fields", () => {
    const { window_title, tags, supporting_ids, ...required } = wire;
    const [segment] = parseSegments([required]);

    expect(segment?.windowTitle).toBeNull();
    expect(segment?.tags).toEqual([]);
    expect(segment?.supportingIds).toEqual([]);
  });

  test("rejects an end before the start", () => {
    const bad = { ...wire, end_ts_us: wire.start_ts_us - 1 };

    expect(() => parseSegments([wire, bad])).toThrow(InvalidSegmentError);
    expect(() => parseSegments([wire, bad])).toThrow(
      "Segment 1: end_ts_us: end_ts_us must not be before start_ts_us"
    );
  });

  test("rejects unknown coverage values", () => {
    expect(() => parseSegments([{ ...wire, coverage: "idle" }])).toThrow(
      /Segment 0: coverage/
    );
  });

  test("rejects fractional timestamps", () => {
    expect(() => parseSegments([{ ...wire, start_ts_us: 1.5 }])).toThrow(
      InvalidSegmentError
    );
  });

  test("rejects input that is not an array", () => {
    expect(() => parseSegments({ segments: [] })).toThrow(
      "expected an array of segments"
    );
  });
});

describe("parseIdentity", () => {
  test("reads the exported identity shape", () => {
    expect(
      parseIdentity({ machine_id: "machine-1", username: "tester", uid: 501 })
    ).toEqual({ machineId: "machine-1", username: "tester", uid: 501 });
  });

  test("rejects a negative uid", () => {
    expect(() =>
      parseIdentity({ machine_id: "m", username: "u", uid: -1 })
    ).toThrow(ReportError);
  });
});
