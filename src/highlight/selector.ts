/**
 * Selector parsing.
 *
 * Grammar: FIELD[:RANGE][:STYLE]
 *
 *   FIELD  integer, negative counts from the last field (-1 = last)
 *   RANGE  N | N-M | N- | N+LEN   character offsets inside the field
 *   STYLE  color name, fixed(N), rgb(R,G,B), size or marker
 *
 * Offsets are 0-based unless `oneBased` is set.
 */

import type { CharRange, Selector } from "../types.js";
import { MARKER_STYLE, parseStyle } from "./color.js";
import { SelectorParseError } from "./errors.js";

export interface SelectorOptions {
  oneBased?: boolean;
}

const RANGE_PATTERN = /^(\d+)(?:(-)(\d*)|\+(\d+))?$/;

function parseField(token: string, oneBased: boolean): number {
  if (!/^-?\d+$/.test(token)) {
    throw new SelectorParseError(`invalid field index '${token}'`, token);
  }
  const index = parseInt(token, 10);
  if (index < 0) return index;
  if (oneBased) {
    if (index === 0) {
      throw new SelectorParseError(
        `field index '${token}' must be at least 1 with --one-based`,
        token,
      );
    }
    return index - 1;
  }
  return index;
}

function isRangeToken(token: string): boolean {
  return RANGE_PATTERN.test(token);
}

function parseRange(token: string, oneBased: boolean): CharRange {
  const match = RANGE_PATTERN.exec(token);
  if (!match) {
    throw new SelectorParseError(`invalid character range '${token}'`, token);
  }
  const [, startStr, dash, endStr, lengthStr] = match;
  const shift = oneBased ? 1 : 0;
  const first = parseInt(startStr, 10);
  if (first < shift) {
    throw new SelectorParseError(
      `character offset '${startStr}' must be at least 1 with --one-based`,
      token,
    );
  }
  const start = first - shift;

  if (lengthStr !== undefined) {
    const length = parseInt(lengthStr, 10);
    if (length === 0) {
      throw new SelectorParseError(`empty character range '${token}'`, token);
    }
    return { start, end: start + length };
  }

  if (dash === undefined) {
    return { start, end: start + 1 };
  }

  if (endStr === "") {
    return { start, end: null };
  }

  const last = parseInt(endStr, 10) - shift;
  if (last < start) {
    throw new SelectorParseError(
      `character range '${token}' ends before it starts`,
      token,
    );
  }
  return { start, end: last + 1 };
}

/**
 * Parse one `-f` argument into a Selector.
 * Throws SelectorParseError naming the offending token.
 */
export function parseSelector(
  input: string,
  options: SelectorOptions = {},
): Selector {
  const oneBased = options.oneBased ?? false;
  const tokens = input.split(":");

  if (tokens.length > 3) {
    throw new SelectorParseError(
      `too many ':' separated parts in selector '${input}'`,
      input,
    );
  }
  if (tokens.some((token) => token === "")) {
    throw new SelectorParseError(`empty part in selector '${input}'`, input);
  }

  const field = parseField(tokens[0], oneBased);
  let chars: CharRange | null = null;
  let style = MARKER_STYLE;

  if (tokens.length >= 2) {
    if (isRangeToken(tokens[1])) {
      chars = parseRange(tokens[1], oneBased);
      if (tokens.length === 3) {
        style = parseStyle(tokens[2]);
      }
    } else if (tokens.length === 3) {
      throw new SelectorParseError(
        `expected a character range, got '${tokens[1]}'`,
        tokens[1],
      );
    } else {
      style = parseStyle(tokens[1]);
    }
  }

  return { field, chars, style, source: input };
}
