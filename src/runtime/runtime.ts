import { parse } from "yaml";

import { AutoScriptError } from "../core/errors.js";
import { LogLevel } from "../core/types.js";
import { LogChannel, LogQueue } from "./log-channel.js";
import type { LogSink, SinkErrorHandler } from "./log-channel.js";
import { RuntimeLock } from "./lock.js";
import { expandMacros } from "./macro.js";
import { ScopeStack } from "./scopes.js";

export type HostFunctionMap = Record<string, (...args: unknown[]) => unknown>;

export interface EmbeddedFunction {
  name: string;
  prototype: string;
  fn: (...args: unknown[]) => unknown;
}

export interface ScriptRuntimeOptions {
  sink: LogSink;
  /** Receives sink failures from scheduled flushes; defaults to a line on stderr. */
  onSinkError?: SinkErrorHandler;
  logLevel?: LogLevel;
  now?: () => Date;
}

const EMPTY_SCOPE: ReadonlyMap<string, string> = new Map();

const isPlainRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseYamlVars = (text: string): Array<[string, string]> => {
  let data: unknown;
  try {
    data = parse(text);
  } catch (error) {
    const cause = error instanceof Error ? error.message : String(error);
    throw new AutoScriptError("YAML_VARS_INVALID", `Cannot parse predefined variables: ${cause}`, { cause });
  }
  if (data === null || data === undefined) {
    return [];
  }
  if (!isPlainRecord(data)) {
    throw new AutoScriptError("YAML_VARS_INVALID", "Predefined variables must be a YAML mapping.");
  }
  return Object.entries(data).map(([name, value]) => {
    if (value !== null && typeof value === "object") {
      throw new AutoScriptError("YAML_VARS_INVALID", `Predefined variable "${name}" must be a scalar.`, { name });
    }
    return [name, value === null ? "" : String(value)];
  });
};

/**
 * Process-wide state a generated program works against while it runs: the scope
 * stack behind init/deinit/macro and the log channel behind the logging calls.
 */
export class ScriptRuntime {
  readonly log: LogChannel;
  private readonly queue: LogQueue;
  private readonly scopes = new ScopeStack();
  private readonly scopeLock = new RuntimeLock("scopes");

  constructor(options: ScriptRuntimeOptions) {
    this.queue = new LogQueue(options.sink, options.onSinkError);
    this.log = new LogChannel({ queue: this.queue, level: options.logLevel, now: options.now });
  }

  get depth(): number {
    return this.scopeLock.run(() => this.scopes.depth);
  }

  /** Opens a scope and binds the given name/value pairs in it. */
  init(...pairs: unknown[]): void {
    this.scopeLock.run(() => {
      this.scopes.enter();
      for (let i = 0; i + 1 < pairs.length; i += 2) {
        this.scopes.setVariable(String(pairs[i]), String(pairs[i + 1]));
      }
    });
  }

  deinit(): void {
    this.scopeLock.run(() => this.scopes.exit());
  }

  initcmd(name: string, ...args: unknown[]): boolean {
    return this.log.trace(name, args);
  }

  logOutput(level: number, message: string): void {
    this.log.emit(level, message);
  }

  macro(text: string): string {
    return this.scopeLock.run(() => expandMacros(text, this.scopes.top() ?? EMPTY_SCOPE, []));
  }

  setLogLevel(level: number): LogLevel {
    return this.log.setLevel(level);
  }

  setVariable(name: string, value: string): void {
    this.scopeLock.run(() => this.scopes.setVariable(name, value));
  }

  setYamlVars(text: string): void {
    const vars = parseYamlVars(text);
    this.scopeLock.run(() => {
      for (const [name, value] of vars) {
        this.scopes.setVariable(name, value);
      }
    });
  }

  flush(): void {
    this.queue.flush();
  }

  /** Delivers pending log lines and checks that every init() was closed. */
  finish(): void {
    this.queue.flush();
    const open = this.depth;
    if (open > 0) {
      throw new AutoScriptError("SCOPE_LEAK", `${open} scope(s) still open after the program finished.`);
    }
  }
}

export const embeddedFunctions = (runtime: ScriptRuntime): EmbeddedFunction[] => [
  { name: "init", prototype: "init(...)", fn: (...pairs) => runtime.init(...pairs) },
  {
    name: "initcmd",
    prototype: "initcmd(str,...)",
    fn: (name, ...args) => runtime.initcmd(String(name), ...args),
  },
  { name: "deinit", prototype: "deinit()", fn: () => runtime.deinit() },
  {
    name: "LogOutput",
    prototype: "LogOutput(int,str)",
    fn: (level, message) => runtime.logOutput(Number(level), String(message)),
  },
  { name: "macro", prototype: "macro(str) str", fn: (text) => runtime.macro(String(text)) },
  { name: "SetLogLevel", prototype: "SetLogLevel(int) int", fn: (level) => runtime.setLogLevel(Number(level)) },
  {
    name: "SetVariable",
    prototype: "SetVariable(str,str)",
    fn: (name, value) => runtime.setVariable(String(name), String(value)),
  },
  { name: "SetYamlVars", prototype: "SetYamlVars(str)", fn: (text) => runtime.setYamlVars(String(text)) },
];

export const hostFunctions = (runtime: ScriptRuntime): HostFunctionMap =>
  Object.fromEntries(embeddedFunctions(runtime).map((item) => [item.name, item.fn]));
