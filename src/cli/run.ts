import type { Readable, Writable } from "node:stream";
import { StringDecoder } from "node:string_decoder";
import { logConfig, parseHlArgs } from "../commands/hl/hl.js";
import { getErrorMessage } from "../highlight/errors.js";
import {
  highlightLine,
  stripCarriageReturn,
} from "../highlight/highlight.js";
import type { HighlightLogger } from "../types.js";
import { createLineLogger } from "../utils/logger.js";

export interface CliIO {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
  env: Record<string, string | undefined>;
  isTTY: boolean;
}

/** Resolves once the chunk is handed to the underlying resource. */
function writeChunk(stream: Writable, chunk: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(chunk, (err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Yield the lines of `input` without their terminators.
 * Only `\n` ends a line; one trailing `\r` is dropped. A final line without
 * a newline is still yielded.
 */
export async function* readLines(input: Readable): AsyncGenerator<string> {
  const decoder = new StringDecoder("utf-8");
  let pending = "";
  for await (const chunk of input) {
    pending +=
      typeof chunk === "string" ? chunk : decoder.write(Buffer.from(chunk));
    let newline = pending.indexOf("\n");
    while (newline !== -1) {
      yield stripCarriageReturn(pending.slice(0, newline));
      pending = pending.slice(newline + 1);
      newline = pending.indexOf("\n");
    }
  }
  pending += decoder.end();
  if (pending !== "") {
    yield stripCarriageReturn(pending);
  }
}

/**
 * Run hl over `io.stdin`, one line at a time.
 * Returns the process exit code.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  const parsed = parseHlArgs(argv, { env: io.env, isTTY: io.isTTY });
  if (!parsed.ok) {
    const { stdout, stderr, exitCode } = parsed.error;
    if (stdout) await writeChunk(io.stdout, stdout);
    if (stderr) await writeChunk(io.stderr, stderr);
    return exitCode;
  }

  const logger: HighlightLogger | undefined = parsed.verbose
    ? createLineLogger("hl", (line) => {
        io.stderr.write(line);
      })
    : undefined;
  const config = { ...parsed.config, logger };
  logConfig(config);

  const lines = readLines(io.stdin);
  let count = 0;
  try {
    for (;;) {
      let next: IteratorResult<string>;
      try {
        next = await lines.next();
      } catch (e) {
        await writeChunk(io.stderr, `hl: read error: ${getErrorMessage(e)}\n`);
        return 1;
      }
      if (next.done) break;

      try {
        await writeChunk(io.stdout, `${highlightLine(next.value, config)}\n`);
      } catch (e) {
        if (isBrokenPipe(e)) throw e;
        await writeChunk(io.stderr, `hl: write error: ${getErrorMessage(e)}\n`);
        return 1;
      }
      count++;
    }
  } finally {
    await lines.return(undefined);
  }

  logger?.info("done", { lines: count });
  return 0;
}

export function isBrokenPipe(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "EPIPE" || error.code === "ERR_STREAM_DESTROYED")
  );
}
