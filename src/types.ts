/**
 * Core type definitions for sequences and patterns
 *
 * Patterns form a closed discriminated union on `kind`. Every pattern value
 * is a frozen plain object produced by one of the factory functions in
 * `src/patterns`, so a `switch` on `kind` covers every case the matcher can
 * meet and the compiler checks that coverage.
 */

import { type } from "arktype";

// =============================================================================
// ALPHABETS AND SEQUENCES
// =============================================================================

/**
 * Biological alphabets a pattern or sequence can be validated against
 */
export const Alphabet = {
  DNA: "dna",
  RNA: "rna",
  PROTEIN: "protein",
} as const;

/**
 * Type for alphabet values
 */
export type Alphabet = (typeof Alphabet)[keyof typeof Alphabet];

/**
 * An ordered run of symbols tagged with the alphabet it was validated against
 */
export interface Sequence {
  /** Optional identifier, carried through for reporting */
  readonly id?: string;
  /** Alphabet the symbols were checked against on construction */
  readonly alphabet: Alphabet;
  /** The symbols, in their original case */
  readonly symbols: string;
  /** Cached symbol count */
  readonly length: number;
}

/**
 * Anything the matchers accept as input: a sequence or a raw symbol string
 */
export type SequenceLike = Sequence | string;

// =============================================================================
// PATTERNS
// =============================================================================

/**
 * Unconstrained region whose length lies in [min, max]
 */
export interface AnyPattern {
  readonly kind: "any";
  readonly min: number;
  readonly max: number;
}

/**
 * Bounded spacer between the motifs of a series or repeat.
 * Never matched on its own.
 */
export interface GapPattern {
  readonly kind: "gap";
  readonly min: number;
  readonly max: number;
}

/**
 * Literal matched with wildcard tolerance and a similarity threshold
 */
export interface MotifPattern {
  readonly kind: "motif";
  /** Lower-cased literal symbols */
  readonly literal: string;
  /** Minimum fraction of literal positions that must match */
  readonly threshold: number;
  readonly alphabet: Alphabet;
}

/**
 * Regular expression searched case-insensitively anywhere in the input
 */
export interface RegexPattern {
  readonly kind: "regex";
  readonly expression: string;
  readonly regex: RegExp;
  /** Source expression when compiled from Prosite notation */
  readonly prosite?: string;
}

/**
 * Motif or gap, the building blocks of ordered patterns
 */
export type SeriesComponent = MotifPattern | GapPattern;

/**
 * Motifs and the gaps between them, split out of a component list once at
 * construction. `gaps[i]` separates `motifs[i]` from `motifs[i + 1]`.
 */
export interface OrderedLayout {
  readonly motifs: readonly MotifPattern[];
  readonly gaps: readonly GapPattern[];
}

/**
 * One motif repeated `count` times with the same gap between each copy
 */
export interface RepeatPattern {
  readonly kind: "repeat";
  readonly motif: MotifPattern;
  readonly gap: GapPattern;
  readonly count: number;
  /** Expanded [motif, gap, motif, ...] list of length 2 * count - 1 */
  readonly components: readonly SeriesComponent[];
  readonly layout: OrderedLayout;
}

/**
 * Ordered motifs separated by gaps
 */
export interface SeriesPattern {
  readonly kind: "series";
  readonly components: readonly SeriesComponent[];
  readonly layout: OrderedLayout;
}

/**
 * First-match-wins alternation over sub-patterns
 */
export interface SetPattern {
  readonly kind: "set";
  readonly components: readonly MatchablePattern[];
  /** Threshold applied to direct motif children while matching */
  readonly threshold: number;
}

/**
 * Every pattern kind
 */
export type Pattern =
  | AnyPattern
  | GapPattern
  | MotifPattern
  | RegexPattern
  | RepeatPattern
  | SeriesPattern
  | SetPattern;

/**
 * Pattern kinds with a match operation
 */
export type MatchablePattern = Exclude<Pattern, GapPattern>;

/**
 * Discriminant values
 */
export type PatternKind = Pattern["kind"];

export const PATTERN_KINDS: readonly PatternKind[] = [
  "any",
  "gap",
  "motif",
  "regex",
  "repeat",
  "series",
  "set",
];

/**
 * Candidate window produced by an `any` region
 */
export interface AnyWindow {
  readonly start: number;
  readonly length: number;
  readonly symbols: string;
}

// =============================================================================
// OPTIONS
// =============================================================================

export interface MotifOptions {
  /** Fraction of positions that must match, default 1.0 */
  threshold?: number;
  /** Alphabet the literal is validated against, default DNA */
  alphabet?: Alphabet;
}

export interface RepeatOptions extends MotifOptions {
  /** Number of motif copies, default 1 */
  count?: number;
}

export interface SetOptions {
  /** Threshold pushed onto direct motif children, default 1.0 */
  threshold?: number;
}

export interface PrositeOptions {
  /** Alphabet token symbols are validated against, default DNA */
  alphabet?: Alphabet;
}

export interface SequenceOptions {
  id?: string;
  /** Check every symbol against the alphabet, default true */
  validate?: boolean;
}

// =============================================================================
// ARKTYPE SCHEMAS
// =============================================================================

const AlphabetSchema = type("'dna' | 'rna' | 'protein'").or("undefined");

const ThresholdSchema = type("0 <= number <= 1").or("undefined");

/**
 * Region and gap bounds: non-negative integers with min <= max
 */
export const BoundsSchema = type({
  min: "number>=0",
  max: "number>=0",
}).narrow((bounds, ctx) => {
  if (!Number.isInteger(bounds.min) || !Number.isInteger(bounds.max)) {
    return ctx.reject({
      expected: "integer bounds",
      actual: `min ${bounds.min}, max ${bounds.max}`,
      path: ["min"],
    });
  }
  if (bounds.min > bounds.max) {
    return ctx.reject({
      expected: "min <= max",
      actual: `min ${bounds.min} > max ${bounds.max}`,
      path: ["max"],
    });
  }
  return true;
});

export const MotifOptionsSchema = type({
  "threshold?": ThresholdSchema,
  "alphabet?": AlphabetSchema,
});

export const RepeatOptionsSchema = type({
  "threshold?": ThresholdSchema,
  "alphabet?": AlphabetSchema,
  "count?": type("number>=1").or("undefined"),
}).narrow((options, ctx) => {
  if (options.count !== undefined && !Number.isInteger(options.count)) {
    return ctx.reject({
      expected: "an integer repeat count",
      actual: String(options.count),
      path: ["count"],
    });
  }
  return true;
});

export const SetOptionsSchema = type({
  "threshold?": ThresholdSchema,
});

export const PrositeOptionsSchema = type({
  "alphabet?": AlphabetSchema,
});

export const SequenceOptionsSchema = type({
  "id?": type("string").or("undefined"),
  "validate?": type("boolean").or("undefined"),
});
