import { describe, expect, test } from "vitest";
import { isMatchablePattern, isPattern } from "../../src/patterns/guards";
import { motif } from "../../src/patterns/motif";
import { gap } from "../../src/patterns/region";

describe("isPattern", () => {
  test("accepts built patterns", () => {
    expect(isPattern(motif("ACGT"))).toBe(true);
    expect(isPattern(gap(1, 2))).toBe(true);
  });

  test("rejects values without a known kind", () => {
    expect(isPattern(null)).toBe(false);
    expect(isPattern("motif")).toBe(false);
    expect(isPattern({ literal: "acgt" })).toBe(false);
    expect(isPattern({ kind: "profile" })).toBe(false);
  });
});

describe("isMatchablePattern", () => {
  test("excludes gaps", () => {
    expect(isMatchablePattern(motif("ACGT"))).toBe(true);
    expect(isMatchablePattern(gap(1, 2))).toBe(false);
  });
});
