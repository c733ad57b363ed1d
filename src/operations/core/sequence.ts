/**
 * Sequence construction and slicing
 *
 * A {@link Sequence} is an immutable symbol run tagged with its alphabet.
 * Matchers accept either a sequence or a plain string; strings are taken as
 * they are, without alphabet checks.
 *
 * @module sequence
 * @since v0.1.0
 *
 * @example
 * ```typescript
 * const seq = createSequence("ACGTACGT", Alphabet.DNA, { id: "chr1:100-108" });
 * const tail = suffix(seq, 4);   // symbols "ACGT", same alphabet
 * const tagged = dna`ACGTNNACGT`; // template tag, validated
 * ```
 */

import { type } from "arktype";
import { AlphabetError, ValidationError } from "../../errors";
import {
  Alphabet,
  type Sequence,
  type SequenceLike,
  type SequenceOptions,
  SequenceOptionsSchema,
} from "../../types";
import { findInvalidSymbol } from "./alphabet";

/**
 * Build a sequence, checking every symbol against the alphabet unless
 * `validate` is false
 */
export function createSequence(
  symbols: string,
  alphabet: Alphabet = Alphabet.DNA,
  options: SequenceOptions = {}
): Sequence {
  const validated = SequenceOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid sequence options: ${validated.summary}`);
  }

  if (validated.validate !== false) {
    const invalid = findInvalidSymbol(alphabet, symbols);
    if (invalid !== undefined) {
      throw AlphabetError.forSymbol(
        symbols,
        invalid.symbol,
        invalid.position,
        alphabet,
        "sequence"
      );
    }
  }

  const sequence: Sequence = {
    ...(validated.id !== undefined ? { id: validated.id } : {}),
    alphabet,
    symbols,
    length: symbols.length,
  };
  return Object.freeze(sequence);
}

/**
 * Stringified view of a sequence
 */
export function toSymbols(input: SequenceLike): string {
  return typeof input === "string" ? input : input.symbols;
}

/**
 * Symbols in [start, end), keeping the source alphabet and id.
 * Indices are clamped the way `String.prototype.slice` clamps them.
 */
export function subsequence(input: Sequence, start: number, end?: number): Sequence {
  const symbols = input.symbols.slice(start, end);
  const sequence: Sequence = {
    ...(input.id !== undefined ? { id: input.id } : {}),
    alphabet: input.alphabet,
    symbols,
    length: symbols.length,
  };
  return Object.freeze(sequence);
}

/**
 * Suffix starting at `start`
 */
export function suffix(input: Sequence, start: number): Sequence {
  return subsequence(input, start);
}

// =============================================================================
// TEMPLATE LITERAL TAGS
// =============================================================================

function joinTemplate(template: TemplateStringsArray, substitutions: string[]): string {
  return template.reduce((acc, str, i) => acc + str + (substitutions[i] ?? ""), "");
}

/**
 * Template literal tag for DNA sequences (IUPAC codes allowed)
 *
 * @example
 * ```typescript
 * const seq = dna`ATCGRYN`;  // ✅
 * const bad = dna`ATCGU`;    // ❌ AlphabetError, U is not DNA
 * ```
 */
export function dna(template: TemplateStringsArray, ...substitutions: string[]): Sequence {
  return createSequence(joinTemplate(template, substitutions), Alphabet.DNA);
}

/**
 * Template literal tag for RNA sequences
 */
export function rna(template: TemplateStringsArray, ...substitutions: string[]): Sequence {
  return createSequence(joinTemplate(template, substitutions), Alphabet.RNA);
}

/**
 * Template literal tag for protein sequences
 */
export function protein(template: TemplateStringsArray, ...substitutions: string[]): Sequence {
  return createSequence(joinTemplate(template, substitutions), Alphabet.PROTEIN);
}
