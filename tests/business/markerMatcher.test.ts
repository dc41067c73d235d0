import { describe, it, expect } from "vitest";
import { compileMarker, compileMarkerSet } from "../../src/services/business/markerMatcher.js";
import { createNormalizer } from "../../src/services/business/textNormalizer.js";

const normalize = createNormalizer();

describe("compileMarker", () => {
  it("matches a phrase on whole words after normalization", () => {
    const marker = compileMarker("The Gospel of the Lord!", normalize);
    expect(marker.matches("the gospel of the lord praise to you")).toBe(true);
    expect(marker.matches("the gospel of the lordship")).toBe(false);
  });

  it("treats /pattern/flags entries as regular expressions", () => {
    const marker = compileMarker("/please be seated$/i", normalize);
    expect(marker.matches("now please be seated")).toBe(true);
    expect(marker.matches("please be seated now")).toBe(false);
  });

  it("gives the same answer on repeated calls with a global flag", () => {
    const marker = compileMarker("/amen/g", normalize);
    expect(marker.matches("amen")).toBe(true);
    expect(marker.matches("amen")).toBe(true);
  });

  it("rejects invalid patterns and empty phrases", () => {
    expect(() => compileMarker("/([/", normalize)).toThrow("Invalid marker pattern");
    expect(() => compileMarker("!!!", normalize)).toThrow("empty after normalization");
  });
});

describe("compileMarkerSet", () => {
  it("matches when any marker matches", () => {
    const set = compileMarkerSet(["let us profess our faith", "lord hear our prayer"], normalize);
    expect(set.matchers).toHaveLength(2);
    expect(set.matches("we pray to the lord lord hear our prayer")).toBe(true);
    expect(set.matches("go in peace")).toBe(false);
  });
});
