/**
 * biopattern - declarative pattern matching for biological sequences
 *
 * Compose motifs, gapped series, repeats, alternations, regular expressions
 * and Prosite expressions, then test them against DNA, RNA or protein
 * sequences or scan sequences for where they occur.
 */

// Error types
export {
  AlphabetError,
  BiopatternError,
  ERROR_SUGGESTIONS,
  ExpressionError,
  getErrorSuggestion,
  InvalidPatternError,
  PrositeError,
  ValidationError,
} from "./errors";
// Alphabets and sequences
export {
  ALPHABET_SYMBOLS,
  checkAlphabet,
  findInvalidSymbol,
  isValid,
  isWildcard,
} from "./operations/core/alphabet";
export {
  createSequence,
  dna,
  protein,
  rna,
  subsequence,
  suffix,
  toSymbols,
} from "./operations/core/sequence";
// Scan primitives
export { exists, locate, locateAll } from "./operations/locate";
// Pattern construction and matching
export {
  DEFAULT_ALPHABET,
  DEFAULT_REPEAT_COUNT,
  DEFAULT_THRESHOLD,
} from "./patterns/constants";
export { isMatchablePattern, isPattern } from "./patterns/guards";
export { matchPattern, matchSet } from "./patterns/match";
export { matchMotif, motif, scoreMotif } from "./patterns/motif";
export { compileProsite, prosite } from "./patterns/prosite";
export { anyRegion, anyWindows, gap, matchAny } from "./patterns/region";
export { matchRegex, regexPattern } from "./patterns/regex";
export { matchRepeat, repeat } from "./patterns/repeat";
export { matchOrdered, matchSeries, series, splitComponents } from "./patterns/series";
export { patternSet } from "./patterns/set";
// Core types
export {
  Alphabet,
  BoundsSchema,
  MotifOptionsSchema,
  PATTERN_KINDS,
  PrositeOptionsSchema,
  RepeatOptionsSchema,
  SequenceOptionsSchema,
  SetOptionsSchema,
} from "./types";
export type {
  AnyPattern,
  AnyWindow,
  GapPattern,
  MatchablePattern,
  MotifOptions,
  MotifPattern,
  OrderedLayout,
  Pattern,
  PatternKind,
  PrositeOptions,
  RegexPattern,
  RepeatOptions,
  RepeatPattern,
  Sequence,
  SequenceLike,
  SequenceOptions,
  SeriesComponent,
  SeriesPattern,
  SetOptions,
  SetPattern,
} from "./types";
