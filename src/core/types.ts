export enum LogLevel {
  Disable = 0,
  Error = 1,
  Warn = 2,
  Info = 3,
  Debug = 4,
  Inherit = 5,
}

export const LOG_SEVERITY_NAMES = ["LOG_DISABLE", "LOG_ERROR", "LOG_WARN", "LOG_INFO", "LOG_DEBUG"] as const;

export const DEFAULT_LANG = "en";
export const SOURCE_CODE_SCRIPT = "source-code";
export const BODY_PLACEHOLDER = "%body%";
export const VAR_CHAR = "#";
export const INTERNAL_KEY_PREFIX = "_";

export type ParamKind = "checkbox" | "textarea" | "singletext" | "select" | "number" | "list";

export interface ParamOptions {
  required: boolean;
  default: string;
  /** Select only: pass the raw value through unconverted as this type. */
  type?: string;
}

export interface ParamSpec {
  name: string;
  title: string;
  kind: ParamKind;
  options: ParamOptions;
}

export interface ScriptNode {
  name: string;
  disabled: boolean;
  values: Record<string, unknown>;
  children: ScriptNode[];
}

export type LangTable = Record<string, string>;

export interface ScriptDefinition {
  name: string;
  title: string;
  logLevel: LogLevel;
  code: string;
  params: ParamSpec[];
  tree: ScriptNode[];
  langs: Record<string, LangTable>;
}

export type ScriptResolver = (name: string) => ScriptDefinition | undefined;

export interface CompileHeader {
  lang: string;
  /** Effective level for definitions that declare `LogLevel.Inherit`. */
  logLevel: LogLevel;
  localize?: (text: string, definition: ScriptDefinition, lang: string) => string;
}

export interface SourceLocation {
  line: number;
  column: number;
}

export interface SourceSpan {
  start: SourceLocation;
  end: SourceLocation;
}
