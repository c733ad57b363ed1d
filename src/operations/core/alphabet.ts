/**
 * Alphabet membership and wildcard handling for single symbols
 *
 * Patterns check their literals here once, at construction. Matching never
 * re-validates input symbols.
 *
 * @module alphabet
 * @since v0.1.0
 *
 * @example
 * ```typescript
 * isValid(Alphabet.DNA, "g");            // true
 * isValid(Alphabet.RNA, "T");            // false
 * isValid(Alphabet.PROTEIN, "x");        // true, wildcard
 * checkAlphabet(Alphabet.DNA, "ACGTN");  // true
 * ```
 */

import { Alphabet } from "../../types";

// =============================================================================
// SYMBOL TABLES
// =============================================================================

/**
 * IUPAC nucleotide codes shared by DNA and RNA
 *
 * - R, Y, S, W, K, M: two-base ambiguity codes
 * - B, D, H, V: three-base ambiguity codes
 * - N: any base
 */
const NUCLEOTIDE_AMBIGUITY = "RYSWKMBDHVN";

/**
 * Valid upper-case symbols per alphabet; `-` is the gap character
 */
export const ALPHABET_SYMBOLS: Readonly<Record<Alphabet, ReadonlySet<string>>> = {
  [Alphabet.DNA]: new Set(`ACGT${NUCLEOTIDE_AMBIGUITY}-`),
  [Alphabet.RNA]: new Set(`ACGU${NUCLEOTIDE_AMBIGUITY}-`),
  // 20 standard amino acids, B/Z/J ambiguity, X unknown, U/O selenocysteine and
  // pyrrolysine, * stop
  [Alphabet.PROTEIN]: new Set("ACDEFGHIKLMNPQRSTVWYBZJXUO*-"),
};

// =============================================================================
// SYMBOL PREDICATES
// =============================================================================

/**
 * Wildcards match any symbol and pass every alphabet
 */
export function isWildcard(symbol: string): boolean {
  const lower = symbol.toLowerCase();
  return lower === "x" || lower === "n";
}

/**
 * True when the symbol is a wildcard or a member of the alphabet
 */
export function isValid(alphabet: Alphabet, symbol: string): boolean {
  return isWildcard(symbol) || ALPHABET_SYMBOLS[alphabet].has(symbol.toUpperCase());
}

/**
 * True when every symbol passes {@link isValid}. An empty run is valid.
 */
export function checkAlphabet(alphabet: Alphabet, symbols: string): boolean {
  return findInvalidSymbol(alphabet, symbols) === undefined;
}

/**
 * Locate the first symbol that fails {@link isValid}
 */
export function findInvalidSymbol(
  alphabet: Alphabet,
  symbols: string
): { symbol: string; position: number } | undefined {
  for (let i = 0; i < symbols.length; i++) {
    const symbol = symbols.charAt(i);
    if (!isValid(alphabet, symbol)) {
      return { symbol, position: i };
    }
  }
  return undefined;
}
