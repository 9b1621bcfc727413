/**
 * Error raised while parsing a selector, color or size argument.
 * Carries the offending token so the command can name it.
 */
export class SelectorParseError extends Error {
  readonly name = "SelectorParseError";

  constructor(
    message: string,
    public readonly token: string,
  ) {
    super(message);
  }
}

/**
 * Extract message from an unknown error value.
 * Handles both Error instances and other thrown values.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
