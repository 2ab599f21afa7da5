import { describe, it, expect } from "vitest";
import {
  formatNoMatchLine,
  formatSummaryLines,
  processAll,
  unmatchedLines,
} from "../src/tracking/processAll";
import type { PrimaryRecord, TagRecord } from "../src/tracking/types";

function primary(overrides: Partial<PrimaryRecord> = {}): PrimaryRecord {
  return {
    campaignName: "A",
    adGroupName: "B",
    adName: "C",
    clickUrl: "",
    impressionTrackingUrl: "",
    ...overrides,
  };
}

function tag(overrides: Partial<TagRecord> = {}): TagRecord {
  return {
    campaignName: "A",
    placementName: "B",
    adName: "C",
    clickTracker: "",
    impressionTracker: "",
    ...overrides,
  };
}

describe("processAll", () => {
  it("updates both URLs for a matched row", () => {
    const result = processAll(
      [primary({ clickUrl: "http://site.com" })],
      [[tag({ impressionTracker: '"http://imp.com/track"' })]]
    );

    expect(result.records[0].clickUrl).toBe(
      "http://site.com?utm_source=tiktok&utm_medium=paid&utm_campaign=A&tf_source=tiktok&tf_medium=paid_social&tf_campaign=A"
    );
    expect(result.records[0].impressionTrackingUrl).toBe("http://imp.com/track");
    expect(result.counts).toEqual({
      totalRows: 1,
      matchesFound: 1,
      clickUrlUpdates: 1,
      impressionUrlUpdates: 1,
    });
    expect(result.log).toEqual([
      "Processing complete:",
      "  • Total rows processed: 1",
      "  • Matches found: 1",
      "  • Click URL updates: 1",
      "  • Impression URL updates: 1",
      "",
    ]);
    expect(result.outcomes).toEqual([
      { rowIndex: 0, matched: true, sourceIndex: 0, clickUrlUpdated: true, impressionUrlUpdated: true },
    ]);
  });

  it("logs unmatched rows with their raw values in row order", () => {
    const rows = [
      primary({ campaignName: " X ", clickUrl: "http://a.com" }),
      primary(),
      primary({ adName: "Missing" }),
    ];
    const result = processAll(rows, [[tag()]]);

    expect(result.log.slice(6)).toEqual([
      "No match found for: Campaign=' X ', Ad Group='B', Ad='C'",
      "No match found for: Campaign='A', Ad Group='B', Ad='Missing'",
    ]);
    expect(result.records[0]).toEqual(rows[0]);
    expect(result.counts.matchesFound).toBe(1);
    expect(result.outcomes.map((o) => o.matched)).toEqual([false, true, false]);
  });

  it("does not count an unchanged click URL", () => {
    const url =
      "http://x.com/?utm_source=a&utm_medium=b&utm_campaign=c&tf_source=d&tf_medium=e&tf_campaign=f";
    const result = processAll([primary({ clickUrl: url }), primary()], [[tag()]]);

    expect(result.records[0].clickUrl).toBe(url);
    expect(result.records[1].clickUrl).toBe("");
    expect(result.counts.clickUrlUpdates).toBe(0);
  });

  it("replaces the impression URL even when the value is the same", () => {
    const result = processAll(
      [primary({ impressionTrackingUrl: "http://imp.com/t" })],
      [[tag({ impressionTracker: "http://imp.com/t" })]]
    );

    expect(result.records[0].impressionTrackingUrl).toBe("http://imp.com/t");
    expect(result.counts.impressionUrlUpdates).toBe(1);
  });

  it("leaves the impression URL alone when the tracker is empty or blank", () => {
    const result = processAll(
      [primary({ impressionTrackingUrl: "keep" }), primary({ adName: "D", impressionTrackingUrl: "keep" })],
      [[tag(), tag({ adName: "D", impressionTracker: "   " })]]
    );

    expect(result.records.map((r) => r.impressionTrackingUrl)).toEqual(["keep", "keep"]);
    expect(result.counts.impressionUrlUpdates).toBe(0);
  });

  it("takes the match from the earliest tag dataset", () => {
    const result = processAll(
      [primary({ clickUrl: "http://site.com" })],
      [[tag({ adName: "Z" })], [tag({ clickTracker: "FIRST|" })], [tag({ clickTracker: "SECOND|" })]]
    );

    expect(result.records[0].clickUrl.startsWith("FIRST|http://site.com?")).toBe(true);
    expect(result.outcomes[0].sourceIndex).toBe(1);
  });

  it("does not mutate its inputs", () => {
    const row = primary({ clickUrl: "http://site.com" });
    const tagRow = tag({ impressionTracker: '"http://imp.com"' });
    processAll([row], [[tagRow]]);

    expect(row).toEqual(primary({ clickUrl: "http://site.com" }));
    expect(tagRow).toEqual(tag({ impressionTracker: '"http://imp.com"' }));
  });

  it("handles an empty export", () => {
    const result = processAll([], [[tag()]]);
    expect(result.records).toEqual([]);
    expect(result.log[1]).toBe("  • Total rows processed: 0");
  });
});

describe("log helpers", () => {
  it("formats the summary block", () => {
    expect(
      formatSummaryLines({ totalRows: 4, matchesFound: 3, clickUrlUpdates: 2, impressionUrlUpdates: 1 })
    ).toEqual([
      "Processing complete:",
      "  • Total rows processed: 4",
      "  • Matches found: 3",
      "  • Click URL updates: 2",
      "  • Impression URL updates: 1",
      "",
    ]);
  });

  it("selects only the unmatched lines", () => {
    const line = formatNoMatchLine(primary());
    expect(unmatchedLines(["Processing complete:", "", line])).toEqual([line]);
  });
});
