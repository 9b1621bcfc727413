export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Logger interface for highlight tracing.
 * Implement this interface to receive per-line diagnostics.
 */
export interface HighlightLogger {
  /** Log informational messages (configuration, run summary) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (lines passed through, unparseable sizes) */
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * Context provided to commands during execution.
 */
export interface CommandContext {
  /** Standard input content */
  stdin: string;
  /** Environment variables, consulted for NO_COLOR / FORCE_COLOR */
  env: Record<string, string | undefined>;
  /** Whether stdout is a terminal (drives `--color auto`) */
  isTTY?: boolean;
  logger?: HighlightLogger;
}

export interface Command {
  name: string;
  execute(args: string[], ctx: CommandContext): Promise<ExecResult>;
}

/**
 * Character range inside a field: 0-based, `end` exclusive.
 * `end === null` runs to the end of the field.
 */
export interface CharRange {
  start: number;
  end: number | null;
}

export type Style =
  | { kind: "marker" }
  | { kind: "ansi"; name: string; open: string }
  | { kind: "size" };

export interface Selector {
  /** 0-based field index; negative values count from the last field */
  field: number;
  chars: CharRange | null;
  style: Style;
  /** Raw selector argument, kept for diagnostics */
  source: string;
}

export interface FieldSpan {
  start: number;
  end: number;
}

export interface MarkerPair {
  open: string;
  close: string;
}

export interface SizeThresholds {
  /** Sizes strictly above this many bytes are yellow */
  yellow: number;
  /** Sizes strictly above this many bytes are red */
  red: number;
}

export interface HighlightConfig {
  selectors: Selector[];
  /** Explicit split string; `null` splits on runs of whitespace */
  delimiter: string | null;
  skip: string | null;
  marker: MarkerPair;
  /** When false, ANSI and size styles fall back to the marker pair */
  color: boolean;
  sizes: SizeThresholds;
  logger?: HighlightLogger;
}
