/**
 * Tests for export functionality
 */

import { describe, test, expect } from "vitest";
import {
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
  type JsonExport,
} from "./export.ts";
import { InvalidSegmentError } from "../utils/errors.ts";
import { DEFAULT_CONFIG } from "../config/settings.ts";
import type {
  EffectiveSegment,
  ExportRange,
  ReportConfig,
  ReportIdentity,
} from "../types.ts";

const us = (iso: string): number => Date.parse(iso) * 1000;

const identity: ReportIdentity = {
  machineId: "machine-1",
  username: "tester",
  uid: 501,
};

const range: ExportRange = {
  startUs: us("2024-01-15T00:00:00Z"),
  endUs: us("2024-01-16T00:00:00Z"),
};

const exportedAt = new Date("2024-01-16T08:00:00Z");

const editor: EffectiveSegment = {
  startTsUs: us("2024-01-15T10:00:00Z"),
  endTsUs: us("2024-01-15T10:01:00Z"),
  source: "raw",
  appBundleId: "com.example.editor",
  appName: "Editor",
  windowTitle: "notes.md",
  tags: ["billable", "meeting"],
  coverage: "observed",
  supportingIds: [1, 2],
};

const terminalGap: EffectiveSegment = {
  startTsUs: us("2024-01-15T09:00:00Z"),
  endTsUs: us("2024-01-15T09:00:00Z") + 30_500_000,
  source: "manual",
  appBundleId: "",
  appName: "Terminal",
  windowTitle: null,
  tags: [],
  coverage: "unobservedGap",
  supportingIds: [],
};

// Starts at the same instant as `editor`
const mail: EffectiveSegment = {
  startTsUs: us("2024-01-15T10:00:00Z"),
  endTsUs: us("2024-01-15T10:02:00Z"),
  source: "raw",
  appBundleId: "com.example.mail",
  appName: "Mail, Calendar",
  windowTitle: 'Re: "hello"',
  tags: ["x"],
  coverage: "observed",
  supportingIds: [3],
};

const segments = [editor, terminalGap, mail];

describe("escapeCSV", () => {
  test("escapes values with commas", () => {
    expect(escapeCSV("Hello, World")).toBe('"Hello, World"');
  });

  test("escapes values with quotes by doubling them", () => {
    expect(escapeCSV('Say "Hello"')).toBe('"Say ""Hello"""');
  });

  test("escapes values with newlines", () => {
    expect(escapeCSV("Line 1\nLine 2")).toBe('"Line 1\nLine 2"');
  });

  test("escapes values with carriage returns", () => {
    expect(escapeCSV("Line 1\rLine 2")).toBe('"Line 1\rLine 2"');
  });

  test("leaves safe values unchanged", () => {
    expect(escapeCSV("billable;meeting")).toBe("billable;meeting");
    expect(escapeCSV("")).toBe("");
  });
});

describe("escapeMarkdownCell", () => {
  test("escapes pipes and flattens line breaks", () => {
    expect(escapeMarkdownCell("a | b")).toBe("a \\| b");
    expect(escapeMarkdownCell("one\r\ntwo\nthree")).toBe("one two three");
  });
});

describe("exportToCSV", () => {
  test("has one header row and one row per segment", () => {
    const lines = exportToCSV(segments, identity, true, 3600).split("\n");

    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe(CSV_HEADER);
  });

  test("header names the 13 columns in order", () => {
    expect(CSV_COLUMNS).toHaveLength(13);
    expect(CSV_HEADER).toBe(
      "machine_id,username,segment_start_local,segment_end_local,segment_start_utc,segment_end_utc,duration_seconds,source,app_bundle_id,app_name,window_title,tags,coverage"
    );
  });

  test("sorts rows by start time, keeping input order for ties", () => {
    const lines = exportToCSV(segments, identity, true, 3600).split("\n");

    expect(lines[1]).toBe(
      "machine-1,tester,2024-01-15T10:00:00.000+01:00,2024-01-15T10:00:30.500+01:00,2024-01-15T09:00:00.000Z,2024-01-15T09:00:30.500Z,30.500,manual,,Terminal,,,unobserved_gap"
    );
    expect(lines[2]).toBe(
      "machine-1,tester,2024-01-15T11:00:00.000+01:00,2024-01-15T11:01:00.000+01:00,2024-01-15T10:00:00.000Z,2024-01-15T10:01:00.000Z,60.000,raw,com.example.editor,Editor,notes.md,billable;meeting,observed"
    );
    expect(lines[3]).toBe(
      'machine-1,tester,2024-01-15T11:00:00.000+01:00,2024-01-15T11:02:00.000+01:00,2024-01-15T10:00:00.000Z,2024-01-15T10:02:00.000Z,120.000,raw,com.example.mail,"Mail, Calendar","Re: ""hello""",x,observed'
    );
  });

  test("order does not depend on input order", () => {
    const forward = exportToCSV([terminalGap, editor, mail], identity, true, 0);
    const shuffled = exportToCSV([editor, terminalGap, mail], identity, true, 0);
    expect(shuffled).toBe(forward);
  });

  test("blanks titles but keeps the column when titles are excluded", () => {
    const lines = exportToCSV([editor], identity, false, 0).split("\n");

    expect(lines[1]?.split(",")).toHaveLength(13);
    expect(lines[1]?.split(",")[10]).toBe("");
  });

  test("renders zero offset local times with Z", () => {
    const lines = exportToCSV([editor], identity, true, 0).split("\n");
    expect(lines[1]?.split(",")[2]).toBe("2024-01-15T10:00:00.000Z");
  });

  test("renders negative offsets", () => {
    const lines = exportToCSV([editor], identity, true, -5 * 3600).split("\n");
    expect(lines[1]?.split(",")[2]).toBe("2024-01-15T05:00:00.000-05:00");
  });

  test("exports only the header for no segments", () => {
    expect(exportToCSV([], identity, true, 0)).toBe(CSV_HEADER);
  });

  test("rejects a malformed segment", () => {
    const bad = { ...editor, endTsUs: editor.startTsUs - 1 };
    expect(() => exportToCSV([bad], identity, true, 0)).toThrow(InvalidSegmentError);
  });
});

describe("exportToJSON", () => {
  const parse = (json: string): JsonExport => JSON.parse(json);

  test("includes identity, export time and range", () => {
    const data = parse(exportToJSON(segments, identity, range, true, exportedAt));

    expect(data.identity).toEqual({
      machine_id: "machine-1",
      username: "tester",
      uid: 501,
    });
    expect(data.exported_at_utc).toBe("2024-01-16T08:00:00.000Z");
    expect(data.range).toEqual({
      start_utc: "2024-01-15T00:00:00.000Z",
      end_utc: "2024-01-16T00:00:00.000Z",
    });
  });

  test("uses the same order as the CSV export", () => {
    const data = parse(exportToJSON(segments, identity, range, true, exportedAt));

    expect(data.segments.map((s) => s.app_bundle_id)).toEqual([
      "",
      "com.example.editor",
      "com.example.mail",
    ]);
    expect(data.segments.map((s) => s.coverage)).toEqual([
      "unobserved_gap",
      "observed",
      "observed",
    ]);
  });

  test("serializes every segment field", () => {
    const data = parse(exportToJSON([terminalGap], identity, range, true, exportedAt));

    expect(data.segments[0]).toEqual({
      start_ts_us: us("2024-01-15T09:00:00Z"),
      end_ts_us: us("2024-01-15T09:00:00Z") + 30_500_000,
      start_utc: "2024-01-15T09:00:00.000Z",
      end_utc: "2024-01-15T09:00:30.500Z",
      duration_seconds: 30.5,
      source: "manual",
      app_bundle_id: "",
      app_name: "Terminal",
      window_title: null,
      tags: [],
      coverage: "unobserved_gap",
      supporting_ids: [],
    });
  });

  test("keeps or drops window titles", () => {
    const withTitles = parse(exportToJSON([mail], identity, range, true, exportedAt));
    const withoutTitles = parse(exportToJSON([mail], identity, range, false, exportedAt));

    expect(withTitles.segments[0]?.window_title).toBe('Re: "hello"');
    expect(withoutTitles.segments[0]?.window_title).toBeNull();
    expect(withoutTitles.segments[0]?.tags).toEqual(["x"]);
    expect(withoutTitles.segments[0]?.supporting_ids).toEqual([3]);
  });

  test("is pretty-printed with two spaces", () => {
    const json = exportToJSON([], identity, range, true, exportedAt);
    expect(json.split("\n")[1]).toBe('  "identity": {');
  });
});

describe("exportToMarkdownInvoice", () => {
  const invoice = exportToMarkdownInvoice(segments, identity, range, {
    generatedAt: exportedAt,
  });
  const lines = invoice.split("\n");

  test("starts with a header table", () => {
    expect(lines.slice(0, 8)).toEqual([
      "# Invoice",
      "",
      "| Field | Value |",
      "|-------|-------|",
      "| **Date Range** | 2024-01-15 00:00 — 2024-01-16 00:00 |",
      "| **Machine** | machine-1 |",
      "| **User** | tester |",
      "| **Generated** | 2024-01-16 08:00 |",
    ]);
  });

  test("lists tasks by app and title, largest first, without gaps", () => {
    const start = lines.indexOf("## Tasks");
    expect(lines.slice(start + 2, start + 6)).toEqual([
      "| Application | Window / Task | Duration | % of Total |",
      "|-------------|---------------|----------|------------|",
      '| Mail, Calendar | Re: "hello" | 00:02:00 | 66.7% |',
      "| Editor | notes.md | 00:01:00 | 33.3% |",
    ]);
    expect(invoice).not.toContain("Terminal");
  });

  test("ends with a summary table", () => {
    expect(lines.slice(-4)).toEqual([
      "| **Total Tracked Time** | 00:03:00 |",
      "| **Total Hours** | 0.05 |",
      "| **Unique Applications** | 2 |",
      "| **Segments** | 2 |",
    ]);
  });

  test("groups by app only when titles are excluded", () => {
    const byApp = exportToMarkdownInvoice(segments, identity, range, {
      includeTitles: false,
      generatedAt: exportedAt,
    }).split("\n");
    const start = byApp.indexOf("## Tasks");

    expect(byApp.slice(start + 2, start + 6)).toEqual([
      "| Application | Duration | % of Total |",
      "|-------------|----------|------------|",
      "| Mail, Calendar | 00:02:00 | 66.7% |",
      "| Editor | 00:01:00 | 33.3% |",
    ]);
  });

  test("escapes table cells", () => {
    const piped = { ...editor, appName: "Term|inal", windowTitle: "a | b" };
    const rows = exportToMarkdownInvoice([piped], identity, range, {
      generatedAt: exportedAt,
    }).split("\n");

    expect(rows).toContain("| Term\\|inal | a \\| b | 00:01:00 | 100.0% |");
  });

  test("shows dates in the given offset", () => {
    const shifted = exportToMarkdownInvoice([], identity, range, {
      tzOffsetSeconds: 2 * 3600,
      generatedAt: exportedAt,
    }).split("\n");

    expect(shifted[4]).toBe("| **Date Range** | 2024-01-15 02:00 — 2024-01-16 02:00 |");
    expect(shifted).toContain("| **Total Hours** | 0.00 |");
  });
});

describe("exportSegments", () => {
  test("dispatches on format", () => {
    const base = {
      identity,
      range,
      includeTitles: true,
      tzOffsetSeconds: 3600,
      exportedAt,
    };

    expect(exportSegments(segments, { ...base, format: "csv" })).toBe(
      exportToCSV(segments, identity, true, 3600)
    );
    expect(exportSegments(segments, { ...base, format: "json" })).toBe(
      exportToJSON(segments, identity, range, true, exportedAt)
    );
    expect(exportSegments(segments, { ...base, format: "markdown" })).toBe(
      exportToMarkdownInvoice(segments, identity, range, {
        tzOffsetSeconds: 3600,
        generatedAt: exportedAt,
      })
    );
  });
});

describe("exportSegmentsWithConfig", () => {
  const config: ReportConfig = {
    ...DEFAULT_CONFIG,
    timeZone: "America/New_York",
    includeTitles: false,
    tzOffsetSeconds: null,
    machineId: "machine-1",
    username: "tester",
    uid: 501,
  };

  test("takes identity, titles and the zone's offset from the config", () => {
    const csv = exportSegmentsWithConfig([editor], "csv", range, config);

    expect(csv.split("\n")[1]).toBe(
      "machine-1,tester,2024-01-15T05:00:00.000-05:00,2024-01-15T05:01:00.000-05:00,2024-01-15T10:00:00.000Z,2024-01-15T10:01:00.000Z,60.000,raw,com.example.editor,Editor,,billable;meeting,observed"
    );
  });

  test("prefers a configured offset", () => {
    expect(
      exportSegmentsWithConfig(segments, "csv", range, {
        ...config,
        tzOffsetSeconds: 3600,
      })
    ).toBe(exportToCSV(segments, identity, false, 3600));
  });

  test("drops titles from JSON when the config excludes them", () => {
    const doc: JsonExport = JSON.parse(
      exportSegmentsWithConfig(segments, "json", range, config, exportedAt)
    );

    expect(doc.segments.map((s) => s.window_title)).toEqual([null, null, null]);
  });
});

describe("generateExportFilename", () => {
  test("uses the range's UTC dates and the format's extension", () => {
    expect(generateExportFilename(range, "csv")).toBe(
      "worklog-2024-01-15-to-2024-01-16.csv"
    );
    expect(generateExportFilename(range, "markdown")).toBe(
      "worklog-2024-01-15-to-2024-01-16.md"
    );
  });
});
