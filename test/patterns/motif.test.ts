import { describe, expect, test } from "vitest";
import { AlphabetError, ValidationError } from "../../src/errors";
import { matchMotif, motif, scoreMotif } from "../../src/patterns/motif";
import { Alphabet } from "../../src/types";

describe("motif construction", () => {
  test("lower-cases the literal and applies defaults", () => {
    expect(motif("ACGT")).toEqual({
      kind: "motif",
      literal: "acgt",
      threshold: 1,
      alphabet: "dna",
    });
  });

  test("is frozen", () => {
    expect(Object.isFrozen(motif("ACGT"))).toBe(true);
  });

  test("rejects an empty literal", () => {
    expect(() => motif("")).toThrow(ValidationError);
  });

  test("rejects symbols outside the alphabet", () => {
    expect(() => motif("ACEG")).toThrow(AlphabetError);
    expect(() => motif("ACEG")).toThrow(
      "Supplied motif is not a valid DNA sequence: 'E' at offset 2"
    );
  });

  test("validates against the chosen alphabet", () => {
    expect(motif("ACGU", { alphabet: Alphabet.RNA }).alphabet).toBe("rna");
    expect(motif("EFQ", { alphabet: Alphabet.PROTEIN }).literal).toBe("efq");
  });

  test("accepts wildcards in any alphabet", () => {
    expect(motif("AXGN").literal).toBe("axgn");
  });

  test("rejects thresholds outside [0, 1]", () => {
    expect(() => motif("ACGT", { threshold: 1.5 })).toThrow(ValidationError);
    expect(() => motif("ACGT", { threshold: -0.1 })).toThrow(/Invalid motif options/);
  });
});

describe("matchMotif", () => {
  test("matches equal-length runs case-insensitively", () => {
    expect(matchMotif(motif("acgt"), "ACGT")).toBe(true);
    expect(matchMotif(motif("ACGT"), "acgt")).toBe(true);
    expect(matchMotif(motif("ACGT"), "ACGA")).toBe(false);
  });

  test("lets wildcards match any symbol", () => {
    expect(matchMotif(motif("ANGX"), "ATGC")).toBe(true);
    expect(matchMotif(motif("nnnn"), "GGGG")).toBe(true);
  });

  test("scores 3 of 4 positions against a 0.75 threshold", () => {
    expect(matchMotif(motif("ACGA", { threshold: 0.75 }), "ACGT")).toBe(true);
  });

  test("matches when the literal is a prefix of the input", () => {
    expect(matchMotif(motif("ACG"), "ACGTTT")).toBe(true);
  });

  test("counts an input shorter than the literal as a partial match", () => {
    expect(matchMotif(motif("ACGT"), "ACG")).toBe(false);
    expect(matchMotif(motif("ACGT", { threshold: 0.75 }), "ACG")).toBe(true);
  });

  test("stops scoring at the first mismatch", () => {
    // later positions match, but only the first one counts
    expect(matchMotif(motif("AAAA", { threshold: 0.5 }), "ATAA")).toBe(false);
  });

  test("is monotonic in the threshold", () => {
    const results = [1, 0.75, 0.5, 0.25, 0].map((threshold) =>
      matchMotif(motif("ACGA"), "ACGC", threshold)
    );

    expect(results).toEqual([false, true, true, true, true]);
  });

  test("matches empty input only at threshold 0", () => {
    expect(matchMotif(motif("ACGT"), "")).toBe(false);
    expect(matchMotif(motif("ACGT", { threshold: 0 }), "")).toBe(true);
  });

  test("takes an effective threshold without changing the motif", () => {
    const strict = motif("ACGA");

    expect(matchMotif(strict, "ACGT", 0.75)).toBe(true);
    expect(strict.threshold).toBe(1);
    expect(matchMotif(strict, "ACGT")).toBe(false);
  });

  test("aligns the literal at an offset", () => {
    const gt = motif("GT");

    expect(matchMotif(gt, "ACGT", gt.threshold, 2)).toBe(true);
    expect(matchMotif(gt, "ACGT", gt.threshold, 1)).toBe(false);
  });
});

describe("scoreMotif", () => {
  test("returns the matched fraction", () => {
    expect(scoreMotif(motif("ACGA"), "ACGT")).toBe(0.75);
    expect(scoreMotif(motif("ACGT"), "TTTT")).toBe(0);
    expect(scoreMotif(motif("ACGT"), "ACGTAA")).toBe(1);
  });

  test("scores from an offset", () => {
    expect(scoreMotif(motif("GTA"), "ACGTAC", 2)).toBe(1);
  });
});
