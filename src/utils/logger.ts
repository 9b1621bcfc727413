import type { HighlightLogger } from "../types.js";

/**
 * Logger that formats each entry as one line and hands it to `write`.
 *
 *   hl: debug: skip string not found, line passed through {"skip":": "}
 */
export function createLineLogger(
  cmdName: string,
  write: (line: string) => void,
): HighlightLogger {
  const emit = (
    level: string,
    message: string,
    data?: Record<string, unknown>,
  ): void => {
    const suffix = data ? ` ${JSON.stringify(data)}` : "";
    write(`${cmdName}: ${level}: ${message}${suffix}\n`);
  };
  return {
    info: (message, data) => emit("info", message, data),
    debug: (message, data) => emit("debug", message, data),
  };
}
