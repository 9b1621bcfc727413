import type { ExecResult } from "../types.js";

export interface HelpInfo {
  name: string;
  summary: string;
  usage: string;
  description?: string[];
  options?: string[];
  examples?: string[];
  notes?: string[];
}

function section(title: string, lines: string[] | undefined): string {
  if (!lines || lines.length === 0) return "";
  let output = `\n${title}:\n`;
  for (const line of lines) {
    output += line ? `  ${line}\n` : "\n";
  }
  return output;
}

export function showHelp(info: HelpInfo): ExecResult {
  let output = `${info.name} - ${info.summary}\n\n`;
  output += `Usage: ${info.usage}\n`;
  output += section("Description", info.description);
  output += section("Options", info.options);
  output += section("Examples", info.examples);
  output += section("Notes", info.notes);
  return { stdout: output, stderr: "", exitCode: 0 };
}

export function hasHelpFlag(args: string[]): boolean {
  return args.includes("--help");
}

/**
 * Returns an error result for an unknown option
 */
export function unknownOption(cmdName: string, option: string): ExecResult {
  // For single-char options, use "invalid option -- 'x'" format
  // For long options, use "unrecognized option '--xxx'" format
  const msg = option.startsWith("--")
    ? `${cmdName}: unrecognized option '${option}'\n`
    : `${cmdName}: invalid option -- '${option.replace(/^-/, "")}'\n`;
  return { stdout: "", stderr: msg, exitCode: 1 };
}

/**
 * Returns an error result for a malformed argument, with a usage hint.
 */
export function usageError(cmdName: string, message: string): ExecResult {
  return {
    stdout: "",
    stderr: `${cmdName}: ${message}\nTry '${cmdName} --help' for more information.\n`,
    exitCode: 1,
  };
}
