/**
 * Tests for the scan primitives: locate, locateAll and exists
 */

import { describe, expect, test } from "vitest";
import { InvalidPatternError } from "../../src/errors";
import { createSequence, dna } from "../../src/operations/core/sequence";
import { exists, locate, locateAll } from "../../src/operations/locate";
import { matchPattern } from "../../src/patterns/match";
import { motif } from "../../src/patterns/motif";
import { prosite } from "../../src/patterns/prosite";
import { anyRegion, gap } from "../../src/patterns/region";
import { regexPattern } from "../../src/patterns/regex";
import { repeat } from "../../src/patterns/repeat";
import { series } from "../../src/patterns/series";
import { patternSet } from "../../src/patterns/set";
import type { Pattern } from "../../src/types";

describe("locate", () => {
  test("finds an exact motif at the start", () => {
    expect(locate("ACGTACGT", motif("ACGT"))).toBe(0);
  });

  test("returns undefined when nothing matches", () => {
    expect(locate("ACGTACGT", motif("TTTT"))).toBeUndefined();
  });

  test("accepts sequences", () => {
    expect(locate(dna`GGACGT`, motif("ACGT"))).toBe(2);
  });

  test("finds fuzzy motifs", () => {
    expect(locate("TTTACGA", motif("ACGT", { threshold: 0.75 }))).toBe(3);
  });

  test("counts a literal cut short by the end of the sequence as partial", () => {
    expect(locate("GGGAC", motif("ACGT", { threshold: 0.5 }))).toBe(3);
    expect(locate("GGGAC", motif("ACGT", { threshold: 0.75 }))).toBeUndefined();
  });

  test("anchors series at each offset", () => {
    const acGt = series([motif("AC"), gap(1, 1), motif("GT")]);

    expect(locate("GGACTGTT", acGt)).toBe(2);
  });

  test("locates repeats and sets", () => {
    expect(locate("TTCAGACAG", repeat("CAG", 1, 1, { count: 2 }))).toBe(2);
    expect(locate("TTGCA", patternSet([motif("CAT"), motif("GCA")]))).toBe(2);
  });

  test("reports offset 0 for any regex that occurs", () => {
    expect(locate("TTGATC", regexPattern("GATC"))).toBe(0);
    expect(locate("TTGATC", prosite("<G-A"))).toBe(2);
  });

  test("handles any regions", () => {
    expect(locate("ACG", anyRegion(2, 3))).toBe(0);
    expect(locate("A", anyRegion(2, 3))).toBeUndefined();
  });

  test("returns undefined for an empty sequence", () => {
    expect(locate("", motif("ACGT", { threshold: 0 }))).toBeUndefined();
    expect(locate(createSequence(""), anyRegion(0, 1))).toBeUndefined();
  });

  test("returns the smallest offset whose suffix matches", () => {
    const input = "TTACGAACGTAC";
    const patterns: Pattern[] = [
      motif("ACGT"),
      motif("ACGT", { threshold: 0.75 }),
      series([motif("AC"), gap(0, 3), motif("AC")]),
      patternSet([motif("GAA"), motif("CGT")]),
    ];

    for (const pattern of patterns) {
      let expected: number | undefined;
      for (let i = 0; i < input.length; i++) {
        if (matchPattern(pattern, input.slice(i))) {
          expected = i;
          break;
        }
      }
      expect(locate(input, pattern)).toBe(expected);
    }
  });

  test("rejects gaps and non-patterns", () => {
    expect(() => locate("ACGT", gap(0, 1))).toThrow(InvalidPatternError);
    expect(() => locate("ACGT", JSON.parse("null"))).toThrow("Supplied pattern is invalid");
  });
});

describe("locateAll", () => {
  test("lists every matching offset", () => {
    expect(locateAll("ACGTACGT", motif("ACGT"))).toEqual([0, 4]);
  });

  test("lists each suffix a regex still occurs in", () => {
    expect(locateAll("TTGATC", regexPattern("GATC"))).toEqual([0, 1, 2]);
  });

  test("returns an empty list when nothing matches", () => {
    expect(locateAll("ACGT", motif("TTTT"))).toEqual([]);
  });
});

describe("exists", () => {
  test("agrees with locate", () => {
    expect(exists("ACGTACGT", motif("GTAC"))).toBe(true);
    expect(exists("ACGTACGT", motif("TTTT"))).toBe(false);
  });

  test("throws rather than answering false for a gap", () => {
    expect(() => exists("ACGT", gap(1, 2))).toThrow(InvalidPatternError);
  });
});
