import { describe, it, expect } from "vitest";
import { extractImpressionURL } from "../src/tracking/impressionUrl";

describe("extractImpressionURL", () => {
  it("returns the first quoted substring", () => {
    expect(extractImpressionURL('foo "http://track.me/imp" bar')).toBe("http://track.me/imp");
  });

  it("pulls the pixel URL out of an IMG tag", () => {
    const tag =
      '<IMG SRC="https://ad.doubleclick.net/ddm/trackimp/N1;dc_trk_aid=2;ord=[timestamp]?" BORDER="0" HEIGHT="1" WIDTH="1">';
    expect(extractImpressionURL(tag)).toBe(
      "https://ad.doubleclick.net/ddm/trackimp/N1;dc_trk_aid=2;ord=[timestamp]?"
    );
  });

  it("returns trimmed text without quotes", () => {
    expect(extractImpressionURL("  no quotes here  ")).toBe("no quotes here");
  });

  it("returns trimmed text with a single unmatched quote", () => {
    expect(extractImpressionURL(' a "b ')).toBe('a "b');
  });

  it("returns an empty first quoted pair as is", () => {
    expect(extractImpressionURL('"" then "http://x.com"')).toBe("");
  });

  it("returns an empty string for absent input", () => {
    expect(extractImpressionURL(undefined)).toBe("");
    expect(extractImpressionURL(null)).toBe("");
    expect(extractImpressionURL("")).toBe("");
  });
});
