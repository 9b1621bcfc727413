import type { FieldSpan } from "../types.js";

const WHITESPACE_FIELD = /[^ \t]+/g;

/**
 * Locate the fields of `text`.
 *
 * With `delimiter === null` every run of characters other than spaces and
 * tabs is a field and whitespace never yields an empty field. With an
 * explicit delimiter the fields match `text.split(delimiter)`, empty ones
 * included. Delimiters are never part of a span.
 */
export function splitFields(
  text: string,
  delimiter: string | null,
): FieldSpan[] {
  const spans: FieldSpan[] = [];

  if (delimiter === null) {
    for (const match of text.matchAll(WHITESPACE_FIELD)) {
      const start = match.index ?? 0;
      spans.push({ start, end: start + match[0].length });
    }
    return spans;
  }

  if (delimiter === "") {
    throw new Error("field delimiter must not be empty");
  }

  let start = 0;
  for (;;) {
    const next = text.indexOf(delimiter, start);
    if (next === -1) {
      spans.push({ start, end: text.length });
      return spans;
    }
    spans.push({ start, end: next });
    start = next + delimiter.length;
  }
}
