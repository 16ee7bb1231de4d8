// Query shape signatures
import { createHash } from "crypto";
import { SIGNATURE_LENGTH } from "../config/constants";
import { InputError } from "../errors";
import type { Signature } from "../../../shared/types";

/**
 * One left-to-right pass over three token kinds:
 *  - double-quoted identifier (`""` escapes a quote), kept as written
 *  - single-quoted string literal, ending at the first quote that is
 *    neither doubled (`''`) nor backslash-escaped
 *  - numeric literal: `42`, `1.5`, `.5`, `1.`, with an optional exponent
 * An apostrophe inside a quoted identifier never opens a string literal.
 */
const SQL_TOKEN =
  /("(?:[^"]|"")*")|'(?:[^'\\]|\\.|'')*'|(?<![\w.])(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?(?![\w.])/g;

export const LITERAL_PLACEHOLDER = "?";

export function normalizeSql(sql: string): string {
  return sql
    .replace(SQL_TOKEN, (_token: string, identifier: string | undefined) =>
      identifier ?? LITERAL_PLACEHOLDER
    )
    .replace(/\s+/g, " ")
    .trim()
    .toUpperCase();
}

/**
 * Stable identifier for a query shape: SHA-256 of the normalized text,
 * truncated to `length` hex characters. Shorter ids read better in reports
 * but raise the collision probability; collisions are not detected.
 */
export function computeSignature(sql: string, length = SIGNATURE_LENGTH): Signature {
  if (!Number.isInteger(length) || length < 8 || length > 64) {
    throw new InputError(`Signature length must be an integer in [8, 64], got ${length}`);
  }
  return createHash("sha256").update(normalizeSql(sql)).digest("hex").slice(0, length);
}
