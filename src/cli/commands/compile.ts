import fs from "node:fs";
import path from "node:path";

import { compileProjectFromXmlMap } from "../../api.js";
import { AutoScriptError } from "../../core/errors.js";
import { DEFAULT_LANG, LogLevel } from "../../core/types.js";
import { makeCliError, readDefinitionsXmlFromDir } from "../core/source-loader.js";

type WriteLine = (line: string) => void;

const parseFlags = (args: string[]): Record<string, string> => {
  const flags: Record<string, string> = {};
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token.startsWith("--")) {
      throw makeCliError("CLI_ARG_FORMAT", `Unexpected argument: ${token}`);
    }
    const name = token.slice(2);
    const value = args[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw makeCliError("CLI_ARG_MISSING", `Missing value for --${name}`);
    }
    flags[name] = value;
    i += 1;
  }
  return flags;
};

const getRequiredFlag = (flags: Record<string, string>, name: string): string => {
  const value = flags[name];
  if (value === undefined) {
    throw makeCliError("CLI_ARG_REQUIRED", `Missing required argument --${name}`);
  }
  return value;
};

const parseLogLevel = (raw: string | undefined): LogLevel => {
  if (raw === undefined) {
    return LogLevel.Info;
  }
  const level = Number(raw);
  if (!Number.isInteger(level) || level < LogLevel.Disable || level > LogLevel.Debug) {
    throw makeCliError("CLI_LOG_LEVEL_INVALID", `--log-level must be an integer from 0 to 4, got "${raw}".`);
  }
  return level;
};

const errorCode = (error: unknown): string => {
  if (error instanceof AutoScriptError) {
    return error.code;
  }
  if (typeof error === "object" && error !== null && "code" in error) {
    return String(error.code);
  }
  return "CLI_ERROR";
};

const emitError = (writeLine: WriteLine, error: unknown): number => {
  const message = error instanceof Error ? error.message : "Unknown CLI error.";
  writeLine("RESULT:ERROR");
  writeLine(`ERROR_CODE:${errorCode(error)}`);
  writeLine(`ERROR_MSG_JSON:${JSON.stringify(message)}`);
  return 1;
};

export const runCompileCommand = (
  argv: string[],
  writeLine: WriteLine = (line) => {
    process.stdout.write(`${line}\n`);
  }
): number => {
  try {
    const flags = parseFlags(argv);
    const defsDir = getRequiredFlag(flags, "defs-dir");
    const entryScript = getRequiredFlag(flags, "entry");
    const program = compileProjectFromXmlMap({
      xmlByPath: readDefinitionsXmlFromDir(defsDir),
      entryScript,
      header: {
        lang: flags.lang ?? DEFAULT_LANG,
        logLevel: parseLogLevel(flags["log-level"]),
      },
    });
    const out = flags.out;
    if (out === undefined) {
      writeLine("RESULT:OK");
      for (const line of program.split("\n")) {
        writeLine(line);
      }
      return 0;
    }
    fs.mkdirSync(path.dirname(path.resolve(out)), { recursive: true });
    fs.writeFileSync(out, program, "utf8");
    writeLine("RESULT:OK");
    writeLine(`PROGRAM_OUT:${out}`);
    return 0;
  } catch (error) {
    return emitError(writeLine, error);
  }
};
