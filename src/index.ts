export { hlCommand, parseHlArgs, detectColor } from "./commands/hl/hl.js";
export type { ColorWhen, HlArgsResult } from "./commands/hl/hl.js";
export { readLines, runCli } from "./cli/run.js";
export type { CliIO } from "./cli/run.js";
export { ANSI_RESET, parseStyle } from "./highlight/color.js";
export { SelectorParseError } from "./highlight/errors.js";
export { splitFields } from "./highlight/fields.js";
export {
  createHighlightConfig,
  DEFAULT_MARKER,
  highlightLine,
  highlightText,
  stripCarriageReturn,
} from "./highlight/highlight.js";
export { parseSelector } from "./highlight/selector.js";
export type { SelectorOptions } from "./highlight/selector.js";
export {
  DEFAULT_SIZE_THRESHOLDS,
  parseByteSize,
  sizeStyle,
} from "./highlight/size.js";
export { createLineLogger } from "./utils/logger.js";
export type {
  CharRange,
  Command,
  CommandContext,
  ExecResult,
  FieldSpan,
  HighlightConfig,
  HighlightLogger,
  MarkerPair,
  Selector,
  SizeThresholds,
  Style,
} from "./types.js";
