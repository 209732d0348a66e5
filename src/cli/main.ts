#!/usr/bin/env node
/**
 * uac-analyzer entry point
 */

import { runCli } from "./run";

async function main(): Promise<number> {
  return runCli(process.argv.slice(2), {
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
    stdin: process.stdin,
  });
}

main()
  // exitCode rather than exit() so piped stdout is flushed
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Analyzer failed:", err);
    process.exitCode = 1;
  });
