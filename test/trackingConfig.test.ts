import { describe, it, expect } from "vitest";
import { loadTrackingConfig, parsePositiveInt } from "../src/tracking/config";

describe("loadTrackingConfig", () => {
  it("falls back to defaults", () => {
    expect(loadTrackingConfig({})).toEqual({ exportSheet: "Ads", tagHeaderRow: 11, outDir: "out" });
  });

  it("reads overrides from the environment", () => {
    expect(
      loadTrackingConfig({
        TRACKING_EXPORT_SHEET: " Export ",
        TRACKING_TAG_HEADER_ROW: "3",
        TRACKING_OUT_DIR: "build/out",
      })
    ).toEqual({ exportSheet: "Export", tagHeaderRow: 3, outDir: "build/out" });
  });

  it("rejects an invalid header row", () => {
    expect(() => loadTrackingConfig({ TRACKING_TAG_HEADER_ROW: "abc" })).toThrow(
      "Invalid TRACKING_TAG_HEADER_ROW: abc"
    );
  });
});

describe("parsePositiveInt", () => {
  it("accepts positive integers", () => {
    expect(parsePositiveInt(" 12 ", "--preview")).toBe(12);
  });

  it("rejects zero and fractions", () => {
    expect(() => parsePositiveInt("0", "--preview")).toThrow("Invalid --preview: 0");
    expect(() => parsePositiveInt("1.5", "--preview")).toThrow("Invalid --preview: 1.5");
  });
});
