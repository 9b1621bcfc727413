import type {
  FieldSpan,
  HighlightConfig,
  MarkerPair,
  Selector,
  Style,
} from "../types.js";
import { ANSI_RESET } from "./color.js";
import { splitFields } from "./fields.js";
import { DEFAULT_SIZE_THRESHOLDS, parseByteSize, sizeStyle } from "./size.js";

export const DEFAULT_MARKER: MarkerPair = { open: "(", close: ")" };

export function createHighlightConfig(
  overrides: Partial<HighlightConfig> = {},
): HighlightConfig {
  return {
    selectors: [],
    delimiter: null,
    skip: null,
    marker: DEFAULT_MARKER,
    color: false,
    sizes: DEFAULT_SIZE_THRESHOLDS,
    ...overrides,
  };
}

interface Insertion {
  start: number;
  end: number;
  open: string;
  close: string;
}

function resolveIndex(field: number, count: number): number {
  return field < 0 ? count + field : field;
}

/** The first selector naming field `index` wins. */
function selectorFor(
  selectors: Selector[],
  index: number,
  count: number,
): Selector | undefined {
  return selectors.find((s) => resolveIndex(s.field, count) === index);
}

function clipToRange(span: FieldSpan, selector: Selector): FieldSpan | null {
  if (selector.chars === null) return span;
  const length = span.end - span.start;
  const { start, end } = selector.chars;
  if (start >= length) return null;
  const stop = end === null ? length : Math.min(end, length);
  return { start: span.start + start, end: span.start + stop };
}

function wrapperFor(
  style: Style,
  text: string,
  config: HighlightConfig,
): MarkerPair | null {
  if (style.kind === "marker" || !config.color) {
    return config.marker;
  }
  if (style.kind === "ansi") {
    return { open: style.open, close: ANSI_RESET };
  }
  const bytes = parseByteSize(text);
  if (bytes === undefined) {
    config.logger?.debug("not a size, left unhighlighted", { text });
    return null;
  }
  const resolved = sizeStyle(bytes, config.sizes);
  return resolved.kind === "ansi"
    ? { open: resolved.open, close: ANSI_RESET }
    : config.marker;
}

/**
 * Highlight one line (without its line terminator).
 *
 * Characters outside the selected spans, delimiters included, are copied
 * unchanged. Empty lines and lines with too few fields come back as they
 * went in.
 */
export function highlightLine(line: string, config: HighlightConfig): string {
  let offset = 0;
  if (config.skip !== null) {
    const at = line.indexOf(config.skip);
    if (at === -1) {
      config.logger?.debug("skip string not found, line passed through", {
        skip: config.skip,
      });
      return line;
    }
    offset = at + config.skip.length;
  }

  const rest = line.slice(offset);
  if (rest === "") return line;

  const spans = splitFields(rest, config.delimiter);
  const insertions: Insertion[] = [];

  for (let i = 0; i < spans.length; i++) {
    const selector = selectorFor(config.selectors, i, spans.length);
    if (!selector) continue;

    const target = clipToRange(spans[i], selector);
    if (!target) continue;

    const wrapper = wrapperFor(
      selector.style,
      rest.slice(target.start, target.end),
      config,
    );
    if (!wrapper) continue;

    insertions.push({ ...target, ...wrapper });
  }

  if (insertions.length === 0) return line;

  let out = line.slice(0, offset);
  let cursor = 0;
  for (const { start, end, open, close } of insertions) {
    out += rest.slice(cursor, start) + open + rest.slice(start, end) + close;
    cursor = end;
  }
  return out + rest.slice(cursor);
}

/** Drops one trailing `\r` so CRLF input reads like LF input. */
export function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Highlight a whole text block.
 * A trailing newline does not count as an extra empty line; every output
 * line is newline-terminated.
 */
export function highlightText(text: string, config: HighlightConfig): string {
  if (text === "") return "";
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  let output = "";
  for (const line of lines) {
    output += `${highlightLine(stripCarriageReturn(line), config)}\n`;
  }
  return output;
}
