#!/usr/bin/env node

import path from "node:path";
import { fileURLToPath } from "node:url";

import { runCompileCommand } from "./commands/compile.js";

const usage = [
  "autoscript",
  "  compile --defs-dir <path> --entry <name> [--lang <code>] [--log-level <0-4>] [--out <file>]",
].join("\n");

export const runAutoscriptCli = async (argv: string[]): Promise<number> => {
  const [mode, ...rest] = argv;
  if (!mode || mode === "--help" || mode === "-h") {
    process.stdout.write(`${usage}\n`);
    return 0;
  }
  if (mode === "compile") {
    return runCompileCommand(rest);
  }
  process.stderr.write(`Unknown mode: ${mode}\n${usage}\n`);
  return 1;
};

const currentPath = fileURLToPath(import.meta.url);
const entryPath = process.argv[1] ? path.resolve(process.argv[1]) : "";

if (entryPath && currentPath === entryPath) {
  runAutoscriptCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : "Unknown CLI crash.";
      process.stderr.write(`${message}\n`);
      process.exitCode = 1;
    });
}
