import { COLOR_NAMES } from "../../highlight/color.js";
import { getErrorMessage, SelectorParseError } from "../../highlight/errors.js";
import {
  createHighlightConfig,
  DEFAULT_MARKER,
  highlightText,
} from "../../highlight/highlight.js";
import { parseSelector } from "../../highlight/selector.js";
import {
  DEFAULT_SIZE_THRESHOLDS,
  parseByteSize,
} from "../../highlight/size.js";
import type {
  Command,
  CommandContext,
  ExecResult,
  HighlightConfig,
  Selector,
} from "../../types.js";
import { parseArgs } from "../../utils/args.js";
import { createLineLogger } from "../../utils/logger.js";
import { hasHelpFlag, showHelp, usageError } from "../help.js";

export const HL_VERSION = "0.1.0";

export const hlHelp = {
  name: "hl",
  summary: "highlight fields of each input line",
  usage: "hl -f FIELD[:RANGE][:STYLE] [OPTION]...",
  description: [
    "Reads lines from standard input, splits them into fields and wraps the",
    "selected fields in a marker pair or terminal colors.",
  ],
  options: [
    "-f, --field SEL       highlight field SEL (repeatable)",
    "-s, --split STR       split fields on STR instead of whitespace",
    "-d, --delimiter STR   same as --split",
    "    --skip STR        count fields only after the first STR",
    "    --one-based       field and character offsets start at 1",
    "    --open STR        opening marker (default '(')",
    "    --close STR       closing marker (default ')')",
    "    --color WHEN      auto, always or never (default auto)",
    "    --yellow-size N   size style turns yellow above N (default 20MB)",
    "    --red-size N      size style turns red above N (default 100MB)",
    "-v, --verbose         log diagnostics to stderr",
    "    --help            display this help and exit",
    "    --version         output version information and exit",
  ],
  examples: [
    "hl -f1                 linux 126M   ->  linux (126M)",
    "hl -f-1:red            color the last field",
    "hl -f0:0-2:green       color the first three characters of field 0",
    "hl -s, -f2:size        color a byte-size column of a CSV",
    "hl --skip ': ' -f0     highlight the value after 'key: '",
  ],
  notes: [
    `Styles: ${COLOR_NAMES.join(", ")}`,
    "Ranges: N, N-M (inclusive), N- (to end), N+LEN",
    "Lines with too few fields are printed unchanged.",
  ],
};

const argDefs = {
  fields: { short: "f", long: "field", type: "list" as const },
  split: { short: "s", long: "split", type: "string" as const },
  delimiter: { short: "d", long: "delimiter", type: "string" as const },
  skip: { long: "skip", type: "string" as const },
  oneBased: { long: "one-based", type: "boolean" as const },
  open: { long: "open", type: "string" as const, default: DEFAULT_MARKER.open },
  close: {
    long: "close",
    type: "string" as const,
    default: DEFAULT_MARKER.close,
  },
  color: { long: "color", type: "string" as const, default: "auto" },
  yellowSize: { long: "yellow-size", type: "string" as const },
  redSize: { long: "red-size", type: "string" as const },
  verbose: { short: "v", long: "verbose", type: "boolean" as const },
  version: { long: "version", type: "boolean" as const },
};

export type ColorWhen = "auto" | "always" | "never";

function isColorWhen(value: string): value is ColorWhen {
  return value === "auto" || value === "always" || value === "never";
}

/**
 * Decide whether ANSI styles are emitted.
 * FORCE_COLOR (other than "0") wins, then NO_COLOR, then the TTY check.
 */
export function detectColor(
  when: ColorWhen,
  env: Record<string, string | undefined>,
  isTTY: boolean,
): boolean {
  if (when !== "auto") return when === "always";
  const force = env.FORCE_COLOR;
  if (force !== undefined && force !== "0") return true;
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") return false;
  return isTTY;
}

function parseThreshold(
  flag: string,
  value: string | undefined,
  fallback: number,
): number {
  if (value === undefined) return fallback;
  const bytes = parseByteSize(value);
  if (bytes === undefined) {
    throw new SelectorParseError(`invalid size '${value}' for ${flag}`, value);
  }
  return bytes;
}

export type HlArgsResult =
  | { ok: true; config: HighlightConfig; verbose: boolean }
  | { ok: false; error: ExecResult };

/**
 * Turn hl's argv into a HighlightConfig.
 * Help and version requests come back as an `ok: false` result with exit
 * code 0. The config carries no logger; callers attach one.
 */
export function parseHlArgs(
  args: string[],
  ctx: Pick<CommandContext, "env" | "isTTY">,
): HlArgsResult {
  if (hasHelpFlag(args)) {
    return { ok: false, error: showHelp(hlHelp) };
  }

  const parsed = parseArgs("hl", args, argDefs);
  if (!parsed.ok) {
    return {
      ok: false,
      error: {
        ...parsed.error,
        stderr: `${parsed.error.stderr}Try 'hl --help' for more information.\n`,
      },
    };
  }
  const { flags, positional } = parsed.result;

  if (flags.version) {
    return {
      ok: false,
      error: { stdout: `hl ${HL_VERSION}\n`, stderr: "", exitCode: 0 },
    };
  }
  if (positional.length > 0) {
    return {
      ok: false,
      error: usageError("hl", `unexpected argument '${positional[0]}'`),
    };
  }
  if (flags.fields.length === 0) {
    return {
      ok: false,
      error: usageError("hl", "you must specify at least one field with -f"),
    };
  }

  const delimiter = flags.split ?? flags.delimiter ?? null;
  if (delimiter === "") {
    return {
      ok: false,
      error: usageError("hl", "the field delimiter must not be empty"),
    };
  }
  if (flags.skip === "") {
    return {
      ok: false,
      error: usageError("hl", "the skip string must not be empty"),
    };
  }
  if (!isColorWhen(flags.color)) {
    return {
      ok: false,
      error: usageError(
        "hl",
        `invalid argument '${flags.color}' for --color (expected auto, always or never)`,
      ),
    };
  }

  let selectors: Selector[];
  let yellow: number;
  let red: number;
  try {
    selectors = flags.fields.map((field) =>
      parseSelector(field, { oneBased: flags.oneBased }),
    );
    yellow = parseThreshold(
      "--yellow-size",
      flags.yellowSize,
      DEFAULT_SIZE_THRESHOLDS.yellow,
    );
    red = parseThreshold("--red-size", flags.redSize, DEFAULT_SIZE_THRESHOLDS.red);
  } catch (e) {
    if (e instanceof SelectorParseError) {
      return { ok: false, error: usageError("hl", e.message) };
    }
    throw e;
  }

  const config = createHighlightConfig({
    selectors,
    delimiter,
    skip: flags.skip ?? null,
    marker: { open: flags.open, close: flags.close },
    color: detectColor(flags.color, ctx.env, ctx.isTTY ?? false),
    sizes: { yellow, red },
  });

  return { ok: true, config, verbose: flags.verbose };
}

/** Log the effective configuration once, before any input is read. */
export function logConfig(config: HighlightConfig): void {
  config.logger?.info("config", {
    selectors: config.selectors.map((s) => s.source),
    delimiter: config.delimiter,
    skip: config.skip,
    color: config.color,
  });
}

export const hlCommand: Command = {
  name: "hl",
  async execute(args: string[], ctx: CommandContext): Promise<ExecResult> {
    const parsed = parseHlArgs(args, ctx);
    if (!parsed.ok) return parsed.error;

    let stderr = "";
    const logger =
      ctx.logger ??
      (parsed.verbose
        ? createLineLogger("hl", (line) => {
            stderr += line;
          })
        : undefined);
    const config = { ...parsed.config, logger };
    logConfig(config);

    try {
      const stdout = highlightText(ctx.stdin, config);
      return { stdout, stderr, exitCode: 0 };
    } catch (e) {
      return {
        stdout: "",
        stderr: `${stderr}hl: ${getErrorMessage(e)}\n`,
        exitCode: 1,
      };
    }
  },
};
