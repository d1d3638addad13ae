import type { SourceSpan } from "./types.js";

export class AutoScriptError extends Error {
  readonly code: string;
  readonly details?: Record<string, string>;
  readonly span?: SourceSpan;

  constructor(code: string, message: string, details?: Record<string, string>, span?: SourceSpan) {
    super(message);
    this.name = "AutoScriptError";
    this.code = code;
    this.details = details;
    this.span = span;
  }
}
