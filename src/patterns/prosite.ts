/**
 * Prosite-style pattern compiler
 *
 * Tokens are separated by `-` and each compiles to a regular expression
 * fragment:
 *
 * | Token      | Meaning                         | Fragment   |
 * |------------|---------------------------------|------------|
 * | `[AC]`     | any of the listed symbols       | `[AC]`     |
 * | `{AC}`     | any symbol except those listed  | `[^AC]`    |
 * | `T(2,4)`   | symbol repeated 2 to 4 times    | `T{2,4}`   |
 * | `AT(2)`    | run whose last symbol repeats   | `AT{2}`    |
 * | `x` / `n`  | any symbol                      | `.`        |
 * | `ACG`      | literal run, taken as written   | `ACG`      |
 *
 * A leading `<` anchors the pattern at the start of the sequence, a trailing
 * `>` at its end, and a terminating `.` is ignored. An empty token compiles to
 * nothing. The fragments are joined without separator and wrapped in a regex
 * pattern.
 *
 * @module prosite
 * @since v0.1.0
 *
 * @example
 * ```typescript
 * compileProsite("A-x-T(2,3)");        // "A.T{2,3}"
 * compileProsite("<A-{CG}-[AT]>.");     // "^A[^CG][AT]$"
 * matchPattern(prosite("A-x-T(2,3)"), "GACTTG"); // true
 * ```
 */

import { type } from "arktype";
import { PrositeError, ValidationError } from "../errors";
import { checkAlphabet, isWildcard } from "../operations/core/alphabet";
import {
  type Alphabet,
  type PrositeOptions,
  PrositeOptionsSchema,
  type RegexPattern,
} from "../types";
import { DEFAULT_ALPHABET, PROSITE_SEPARATOR } from "./constants";
import { regexPattern } from "./regex";

const EXCLUSION_TOKEN = /^\{([a-zA-Z]+)\}$/;
const REPEAT_TOKEN = /^([a-zA-Z]+)\((\d+)(?:,(\d+))?\)$/;
const REGEX_METACHARACTERS = /[.*+?^${}()|[\]\\]/g;

function compileExclusion(token: string, alphabet: Alphabet): string | undefined {
  const match = EXCLUSION_TOKEN.exec(token);
  if (match === null) return undefined;

  const inner = match[1];
  return checkAlphabet(alphabet, inner) ? `[^${inner}]` : undefined;
}

function compileRepeat(token: string, alphabet: Alphabet): string | undefined {
  const match = REPEAT_TOKEN.exec(token);
  if (match === null) return undefined;

  const [, prefix, lower, upper] = match;
  if (!checkAlphabet(alphabet, prefix)) return undefined;
  if (upper !== undefined && Number(upper) < Number(lower)) return undefined;

  // The bounds apply to the last symbol of the prefix
  const atom = isWildcard(prefix) ? "." : prefix;
  return upper === undefined ? `${atom}{${lower}}` : `${atom}{${lower},${upper}}`;
}

function compileLiteral(token: string, alphabet: Alphabet): string | undefined {
  if (!checkAlphabet(alphabet, token)) return undefined;
  return token.replace(REGEX_METACHARACTERS, "\\$&");
}

/**
 * Rewrite one token; `undefined` when it fits no token class
 */
function compileToken(token: string, alphabet: Alphabet): string | undefined {
  if (token.includes("[")) return token;
  if (token.includes("{")) return compileExclusion(token, alphabet);
  if (token.includes("(")) return compileRepeat(token, alphabet);
  if (isWildcard(token)) return ".";
  return compileLiteral(token, alphabet);
}

/**
 * Compile a Prosite expression to regular expression source
 *
 * @throws {PrositeError} When a token cannot be compiled
 */
export function compileProsite(expression: string, options: PrositeOptions = {}): string {
  const validated = PrositeOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid Prosite options: ${validated.summary}`);
  }
  const alphabet = validated.alphabet ?? DEFAULT_ALPHABET;

  let body = expression.endsWith(".") ? expression.slice(0, -1) : expression;
  let prefix = "";
  let suffix = "";
  if (body.startsWith("<")) {
    prefix = "^";
    body = body.slice(1);
  }
  if (body.endsWith(">")) {
    suffix = "$";
    body = body.slice(0, -1);
  }

  const fragments = body.split(PROSITE_SEPARATOR).map((token, index) => {
    const fragment = compileToken(token, alphabet);
    if (fragment === undefined) {
      throw PrositeError.forToken(expression, token, index);
    }
    return fragment;
  });

  return prefix + fragments.join("") + suffix;
}

/**
 * Compile a Prosite expression into a regex pattern
 *
 * @throws {PrositeError} When a token cannot be compiled
 * @throws {ExpressionError} When a pass-through `[...]` token is not valid regex syntax
 */
export function prosite(expression: string, options: PrositeOptions = {}): RegexPattern {
  return regexPattern(compileProsite(expression, options), expression);
}
