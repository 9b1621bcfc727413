import { PassThrough, Readable, Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import { isBrokenPipe, runCli } from "./run.js";

async function collect(stream: PassThrough): Promise<string> {
  stream.end();
  let text = "";
  for await (const chunk of stream) {
    text += String(chunk);
  }
  return text;
}

/**
 * Helper to run the CLI against in-memory streams and capture output
 */
async function runWith(
  args: string[],
  input: Readable | string,
  options: { env?: Record<string, string>; isTTY?: boolean } = {},
): Promise<{ stdout: string; stderr: string; exitCode: number }> {
  const stdout = new PassThrough();
  const stderr = new PassThrough();

  const exitCode = await runCli(args, {
    stdin: typeof input === "string" ? Readable.from([input]) : input,
    stdout,
    stderr,
    env: options.env ?? {},
    isTTY: options.isTTY ?? false,
  });
  return {
    stdout: await collect(stdout),
    stderr: await collect(stderr),
    exitCode,
  };
}

describe("hl CLI", () => {
  it("highlights each input line", async () => {
    const result = await runWith(["-f1"], "linux 126M\nbase 0\n");
    expect(result).toEqual({
      stdout: "linux (126M)\nbase (0)\n",
      stderr: "",
      exitCode: 0,
    });
  });

  it("terminates a final line without a newline", async () => {
    const result = await runWith(["-f0"], "a b");
    expect(result.stdout).toBe("(a) b\n");
  });

  it("handles lines split across chunks", async () => {
    const result = await runWith(
      ["-s", ",", "-f1"],
      Readable.from(["x,y", "y,z\nq,", "r\n"]),
    );
    expect(result.stdout).toBe("x,(yy),z\nq,(r)\n");
  });

  it("strips CRLF line endings", async () => {
    const result = await runWith(["-f1"], "a b\r\nc d\r\n");
    expect(result.stdout).toBe("a (b)\nc (d)\n");
  });

  it("keeps a carriage return inside a line", async () => {
    const result = await runWith(["-f1"], "a\rb c\n");
    expect(result.stdout).toBe("a\rb (c)\n");
  });

  it("keeps empty lines empty with an explicit delimiter", async () => {
    const result = await runWith(["-s,", "-f0"], "\na,b\n\r\n");
    expect(result.stdout).toBe("\n(a),b\n\n");
  });

  it("decodes multi-byte characters split across chunks", async () => {
    const bytes = Buffer.from("é ü\n", "utf-8");
    const result = await runWith(
      ["-f1"],
      Readable.from([bytes.subarray(0, 1), bytes.subarray(1)]),
    );
    expect(result.stdout).toBe("é (ü)\n");
  });

  it("produces no output for empty input", async () => {
    const result = await runWith(["-f0"], "");
    expect(result).toEqual({ stdout: "", stderr: "", exitCode: 0 });
  });

  it("enables color in auto mode on a TTY", async () => {
    const result = await runWith(["-f1:green"], "a b\n", { isTTY: true });
    expect(result.stdout).toBe("a \x1b[32mb\x1b[39m\n");
  });

  it("disables color in auto mode when NO_COLOR is set", async () => {
    const result = await runWith(["-f1:green"], "a b\n", {
      isTTY: true,
      env: { NO_COLOR: "1" },
    });
    expect(result.stdout).toBe("a (b)\n");
  });

  it("writes nothing to stdout for a malformed selector", async () => {
    const result = await runWith(["-f1:nope"], "a b\n");
    expect(result).toEqual({
      stdout: "",
      stderr:
        "hl: unknown color 'nope'\nTry 'hl --help' for more information.\n",
      exitCode: 1,
    });
  });

  it("prints help to stdout", async () => {
    const result = await runWith(["--help"], "");
    expect(result.stdout).toContain("hl - highlight fields of each input line");
    expect(result.exitCode).toBe(0);
  });

  it("logs progress with --verbose", async () => {
    const result = await runWith(["--verbose", "-f0"], "a\nb\n");
    expect(result.stdout).toBe("(a)\n(b)\n");
    expect(result.stderr).toBe(
      'hl: info: config {"selectors":["0"],"delimiter":null,"skip":null,"color":false}\n' +
        'hl: info: done {"lines":2}\n',
    );
  });

  it("reports read errors", async () => {
    const broken = new Readable({
      read() {
        this.destroy(new Error("disk on fire"));
      },
    });
    const result = await runWith(["-f0"], broken);
    expect(result.stdout).toBe("");
    expect(result.stderr).toBe("hl: read error: disk on fire\n");
    expect(result.exitCode).toBe(1);
  });

  it("stops with a broken-pipe error when stdout closes", async () => {
    const stdout = new Writable({
      write(_chunk, _encoding, callback) {
        const error = Object.assign(new Error("write EPIPE"), {
          code: "EPIPE",
        });
        callback(error);
      },
    });
    stdout.on("error", () => {});
    const run = runCli(["-f0"], {
      stdin: Readable.from(["a\nb\n"]),
      stdout,
      stderr: new PassThrough(),
      env: {},
      isTTY: false,
    });
    await expect(run).rejects.toThrow("write EPIPE");
  });

  it("reports other write failures as write errors", async () => {
    const stdout = new Writable({
      write(_chunk, _encoding, callback) {
        const error = Object.assign(new Error("no space left on device"), {
          code: "ENOSPC",
        });
        callback(error);
      },
    });
    stdout.on("error", () => {});
    const stderr = new PassThrough();
    const exitCode = await runCli(["-f0"], {
      stdin: Readable.from(["a\nb\n"]),
      stdout,
      stderr,
      env: {},
      isTTY: false,
    });
    expect(exitCode).toBe(1);
    expect(await collect(stderr)).toBe(
      "hl: write error: no space left on device\n",
    );
  });
});

describe("isBrokenPipe", () => {
  it("recognizes EPIPE errors", () => {
    const error = Object.assign(new Error("write EPIPE"), { code: "EPIPE" });
    expect(isBrokenPipe(error)).toBe(true);
  });

  it("ignores other errors and non-errors", () => {
    expect(isBrokenPipe(new Error("boom"))).toBe(false);
    expect(isBrokenPipe({ code: "EPIPE" })).toBe(false);
    expect(isBrokenPipe("EPIPE")).toBe(false);
  });
});
