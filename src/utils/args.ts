/**
 * Lightweight argument parser for the hl command.
 *
 * Handles:
 * - Boolean flags: -v, --verbose
 * - Combined short flags: -vf1 (same as -v -f 1)
 * - Value options: -f VALUE, -fVALUE, --field=VALUE, --field VALUE
 * - Repeatable options collected into a list (`type: "list"`)
 * - Positional arguments and the `--` terminator
 * - Unknown option detection
 */

import { unknownOption } from "../commands/help.js";
import type { ExecResult } from "../types.js";

export type ArgType = "boolean" | "string" | "list";

export interface ArgDef {
  /** Short form without dash, e.g., "f" for -f */
  short?: string;
  /** Long form without dashes, e.g., "field" for --field */
  long?: string;
  type: ArgType;
  default?: boolean | string;
}

type FlagValue<D extends ArgDef> = D["type"] extends "boolean"
  ? boolean
  : D["type"] extends "list"
    ? string[]
    : D["default"] extends string
      ? string
      : string | undefined;

export interface ParsedArgs<T extends Record<string, ArgDef>> {
  flags: { [K in keyof T]: FlagValue<T[K]> };
  positional: string[];
}

export type ParseResult<T extends Record<string, ArgDef>> =
  | { ok: true; result: ParsedArgs<T> }
  | { ok: false; error: ExecResult };

type RawValue = boolean | string | string[] | undefined;

interface OptionInfo {
  name: string;
  type: ArgType;
}

function missingArgument(cmdName: string, option: string): ExecResult {
  const stderr = option.startsWith("--")
    ? `${cmdName}: option '${option}' requires an argument\n`
    : `${cmdName}: option requires an argument -- '${option.slice(1)}'\n`;
  return { stdout: "", stderr, exitCode: 1 };
}

function store(
  flags: Map<string, RawValue>,
  info: OptionInfo,
  value: string,
): void {
  if (info.type === "list") {
    const current = flags.get(info.name);
    flags.set(info.name, [...(Array.isArray(current) ? current : []), value]);
  } else {
    flags.set(info.name, value);
  }
}

/**
 * Parse command arguments according to the provided definitions.
 *
 * @example
 * const defs = {
 *   fields: { short: "f", long: "field", type: "list" as const },
 *   verbose: { short: "v", long: "verbose", type: "boolean" as const },
 * };
 * const parsed = parseArgs("hl", args, defs);
 * if (!parsed.ok) return parsed.error;
 * const { flags } = parsed.result; // flags.fields: string[]
 */
export function parseArgs<T extends Record<string, ArgDef>>(
  cmdName: string,
  args: string[],
  defs: T,
): ParseResult<T> {
  const shortToInfo = new Map<string, OptionInfo>();
  const longToInfo = new Map<string, OptionInfo>();
  const flags = new Map<string, RawValue>();

  for (const [name, def] of Object.entries(defs)) {
    const info = { name, type: def.type };
    if (def.short) shortToInfo.set(def.short, info);
    if (def.long) longToInfo.set(def.long, info);

    if (def.default !== undefined) {
      flags.set(name, def.default);
    } else if (def.type === "boolean") {
      flags.set(name, false);
    } else if (def.type === "list") {
      flags.set(name, []);
    }
  }

  const positional: string[] = [];
  let stopParsing = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (stopParsing || !arg.startsWith("-") || arg === "-") {
      positional.push(arg);
      continue;
    }

    if (arg === "--") {
      stopParsing = true;
      continue;
    }

    if (arg.startsWith("--")) {
      const eqIndex = arg.indexOf("=");
      const optName = eqIndex === -1 ? arg.slice(2) : arg.slice(2, eqIndex);
      let optValue = eqIndex === -1 ? undefined : arg.slice(eqIndex + 1);

      const info = longToInfo.get(optName);
      if (!info) {
        return { ok: false, error: unknownOption(cmdName, arg) };
      }

      if (info.type === "boolean") {
        flags.set(info.name, true);
        continue;
      }
      if (optValue === undefined) {
        if (i + 1 >= args.length) {
          return { ok: false, error: missingArgument(cmdName, `--${optName}`) };
        }
        optValue = args[++i];
      }
      store(flags, info, optValue);
      continue;
    }

    // Short option cluster; a value option consumes the rest of it
    const chars = arg.slice(1);
    for (let j = 0; j < chars.length; j++) {
      const c = chars[j];
      const info = shortToInfo.get(c);
      if (!info) {
        return { ok: false, error: unknownOption(cmdName, `-${c}`) };
      }

      if (info.type === "boolean") {
        flags.set(info.name, true);
        continue;
      }

      let optValue: string;
      if (j + 1 < chars.length) {
        optValue = chars.slice(j + 1);
      } else if (i + 1 < args.length) {
        optValue = args[++i];
      } else {
        return { ok: false, error: missingArgument(cmdName, `-${c}`) };
      }
      store(flags, info, optValue);
      break;
    }
  }

  return {
    ok: true,
    result: {
      flags: Object.fromEntries(flags) as ParsedArgs<T>["flags"],
      positional,
    },
  };
}
