/**
 * Defaults shared by the pattern factories
 */

import { Alphabet } from "../types";

/** Motifs and sets require every literal position to match unless told otherwise */
export const DEFAULT_THRESHOLD = 1.0;

export const DEFAULT_ALPHABET: Alphabet = Alphabet.DNA;

export const DEFAULT_REPEAT_COUNT = 1;

/** Prosite token separator */
export const PROSITE_SEPARATOR = "-";
