#!/usr/bin/env node
/**
 * hl CLI - highlight fields of each input line
 *
 * Usage:
 *   <command> | hl -f FIELD[:RANGE][:STYLE] [options]
 *
 * Examples:
 *   # Wrap the second column in parentheses
 *   printf 'linux 126M\n' | hl -f1
 *
 *   # Color sizes by magnitude
 *   du -sh * | hl -f0:size
 *
 *   # Highlight the value after "key : "
 *   hl --skip ': ' -f0:red < /proc/cpuinfo
 *
 * Run `hl --help` for every option.
 */

import { isBrokenPipe, runCli } from "./run.js";

// A closed downstream pipe (e.g. `hl ... | head`) ends the run quietly
process.stdout.on("error", (e) => {
  if (isBrokenPipe(e)) process.exit(0);
  console.error(`hl: write error: ${e.message}`);
  process.exit(1);
});

runCli(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
  isTTY: process.stdout.isTTY === true,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    if (isBrokenPipe(e)) process.exit(0);
    console.error("Fatal error:", e);
    process.exit(1);
  });
