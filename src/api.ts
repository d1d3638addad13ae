import { compileProgram } from "./compiler/index.js";
import { AutoScriptError } from "./core/errors.js";
import { DEFAULT_LANG, LogLevel } from "./core/types.js";
import type { CompileHeader, ScriptResolver } from "./core/types.js";
import { loadDefinitionsFromXmlMap } from "./definitions/index.js";

export const DEFAULT_HEADER: CompileHeader = {
  lang: DEFAULT_LANG,
  logLevel: LogLevel.Info,
};

export interface CompileScriptByNameOptions {
  resolve: ScriptResolver;
  entryScript: string;
  header?: Partial<CompileHeader>;
}

export const compileScriptByName = (options: CompileScriptByNameOptions): string => {
  const root = options.resolve(options.entryScript);
  if (!root) {
    throw new AutoScriptError(
      "SCRIPT_NOT_FOUND",
      `Entry script "${options.entryScript}" is not registered.`,
      { script: options.entryScript }
    );
  }
  return compileProgram(root, {
    resolve: options.resolve,
    header: { ...DEFAULT_HEADER, ...options.header },
  });
};

export interface CompileProjectFromXmlMapOptions {
  xmlByPath: Record<string, string>;
  entryScript: string;
  header?: Partial<CompileHeader>;
}

export const compileProjectFromXmlMap = (options: CompileProjectFromXmlMapOptions): string => {
  const registry = loadDefinitionsFromXmlMap(options.xmlByPath);
  return compileScriptByName({
    resolve: registry.resolve,
    entryScript: options.entryScript,
    header: options.header,
  });
};
