import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { test } from "vitest";

import { runCompileCommand } from "../../../src/cli/commands/compile.js";

const defsDir = path.resolve("test", "fixtures", "defs");

const runWithCapture = (argv: string[]) => {
  const lines: string[] = [];
  const code = runCompileCommand(argv, (line) => lines.push(line));
  return { code, lines };
};

const EXPECTED_PROGRAM = [
  "const {",
  "STR0 = `Demo`",
  "STR1 = `hello #who#`",
  'STR2 = `["a","b"]`',
  "}",
  "const IOTA { LOG_DISABLE LOG_ERROR LOG_WARN LOG_INFO LOG_DEBUG }",
  "func log(str msg) {",
  "initcmd(`log`,msg)",
  "int prevLog = SetLogLevel(2)",
  "LogOutput(LOG_WARN, msg)",
  "SetLogLevel(prevLog)",
  "}",
  "func collect(str items) {",
  "initcmd(`collect`,items)",
  "SetVariable(`items`, items)",
  "}",
  "run {",
  "str title = STR0",
  "SetLogLevel(3)",
  "init()",
  "Println(title)",
  "   log(macro(STR1))",
  "   collect(STR2)",
  "deinit()",
  "}",
];

test("compile prints the program for a definitions directory", () => {
  const result = runWithCapture(["--defs-dir", defsDir, "--entry", "main"]);
  assert.equal(result.code, 0);
  assert.deepEqual(result.lines, ["RESULT:OK", ...EXPECTED_PROGRAM]);
});

test("compile writes the program to --out", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "autoscript-compile-"));
  const out = path.join(dir, "build", "main.g");
  const result = runWithCapture(["--defs-dir", defsDir, "--entry", "main", "--log-level", "4", "--out", out]);
  assert.equal(result.code, 0);
  assert.deepEqual(result.lines, ["RESULT:OK", `PROGRAM_OUT:${out}`]);
  const written = fs.readFileSync(out, "utf8");
  assert.ok(written.includes("\nSetLogLevel(4)\ninit()\n"));
});

test("compile reports argument and source errors", () => {
  const cases: Array<[string[], string]> = [
    [["--defs-dir", defsDir], "CLI_ARG_REQUIRED"],
    [["stray"], "CLI_ARG_FORMAT"],
    [["--defs-dir"], "CLI_ARG_MISSING"],
    [["--defs-dir", path.join(defsDir, "missing"), "--entry", "main"], "CLI_DEFS_DIR_NOT_FOUND"],
    [["--defs-dir", path.join(defsDir, "log.def.xml"), "--entry", "main"], "CLI_DEFS_DIR_NOT_FOUND"],
    [["--defs-dir", defsDir, "--entry", "main", "--log-level", "5"], "CLI_LOG_LEVEL_INVALID"],
    [["--defs-dir", defsDir, "--entry", "ghost"], "SCRIPT_NOT_FOUND"],
  ];
  for (const [argv, code] of cases) {
    const result = runWithCapture(argv);
    assert.equal(result.code, 1);
    assert.equal(result.lines[0], "RESULT:ERROR");
    assert.equal(result.lines[1], `ERROR_CODE:${code}`);
    assert.ok(result.lines[2]?.startsWith("ERROR_MSG_JSON:"));
  }
});

test("compile reports a failed --out write as the only result", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "autoscript-compile-"));
  const result = runWithCapture(["--defs-dir", defsDir, "--entry", "main", "--out", dir]);
  assert.equal(result.code, 1);
  assert.deepEqual(result.lines.slice(0, 2), ["RESULT:ERROR", "ERROR_CODE:EISDIR"]);
  assert.equal(result.lines.length, 3);
});
