import { AutoScriptError } from "../core/errors.js";
import { SOURCE_CODE_SCRIPT, VAR_CHAR } from "../core/types.js";
import type { ParamSpec, ScriptDefinition } from "../core/types.js";
import type { StringPool } from "./string-pool.js";

export type ParamLiteral =
  | { kind: "bool"; value: boolean }
  | { kind: "int"; value: string }
  | { kind: "str"; ref: string; macro: boolean }
  | { kind: "raw"; type: string; text: string }
  | { kind: "source"; text: string };

export interface CoercedParam {
  name: string;
  type: string;
  literal: ParamLiteral;
}

export interface CoercionContext {
  pool: StringPool;
  localize: (text: string, definition: ScriptDefinition) => string;
}

const INTEGER_PATTERN = /^-?\d+$/;
const FALSE_TEXTS = new Set(["", "0", "false"]);

const serializeList = (value: unknown[]): string => {
  try {
    return JSON.stringify(value);
  } catch (error) {
    const cause = error instanceof Error ? error.message : String(error);
    throw new AutoScriptError("SERIALIZATION_FAILED", `Cannot encode list value: ${cause}`, { cause });
  }
};

const rawText = (value: unknown): string => {
  if (value === undefined || value === null) {
    return "";
  }
  if (typeof value === "string") {
    return value.trim();
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (Array.isArray(value)) {
    return serializeList(value);
  }
  return String(value).trim();
};

const fieldRequired = (param: ParamSpec, definition: ScriptDefinition, context: CoercionContext): AutoScriptError => {
  const field = context.localize(param.title || param.name, definition);
  const script = context.localize(definition.title || definition.name, definition);
  return new AutoScriptError(
    "FIELD_REQUIRED",
    `Field "${field}" of "${script}" is required.`,
    { field, script }
  );
};

const textOrDefault = (
  text: string,
  param: ParamSpec,
  definition: ScriptDefinition,
  context: CoercionContext
): string => {
  if (text.length > 0) {
    return text;
  }
  if (param.options.required) {
    throw fieldRequired(param, definition, context);
  }
  return param.options.default;
};

const coerceNumber = (
  text: string,
  param: ParamSpec,
  definition: ScriptDefinition,
  context: CoercionContext
): ParamLiteral => {
  const value = textOrDefault(text, param, definition, context).trim() || "0";
  if (!INTEGER_PATTERN.test(value)) {
    const field = context.localize(param.title || param.name, definition);
    const script = context.localize(definition.title || definition.name, definition);
    throw new AutoScriptError(
      "FIELD_NUMBER_INVALID",
      `Field "${field}" of "${script}" must be an integer, got "${value}".`,
      { field, script, value }
    );
  }
  return { kind: "int", value };
};

const coerceList = (
  raw: unknown,
  param: ParamSpec,
  definition: ScriptDefinition,
  context: CoercionContext
): ParamLiteral => {
  if (Array.isArray(raw) && raw.length > 0) {
    return { kind: "str", ref: context.pool.intern(serializeList(raw)), macro: false };
  }
  if (param.options.required) {
    throw fieldRequired(param, definition, context);
  }
  return { kind: "str", ref: context.pool.intern("[]"), macro: false };
};

export const coerceParam = (
  param: ParamSpec,
  raw: unknown,
  definition: ScriptDefinition,
  context: CoercionContext
): CoercedParam => {
  switch (param.kind) {
    case "checkbox":
      return {
        name: param.name,
        type: "bool",
        literal: { kind: "bool", value: !FALSE_TEXTS.has(rawText(raw)) },
      };
    case "textarea":
    case "singletext": {
      const text = textOrDefault(rawText(raw), param, definition, context);
      if (definition.name === SOURCE_CODE_SCRIPT) {
        return { name: param.name, type: "str", literal: { kind: "source", text } };
      }
      return {
        name: param.name,
        type: "str",
        literal: { kind: "str", ref: context.pool.intern(text), macro: text.includes(VAR_CHAR) },
      };
    }
    case "select": {
      const text = rawText(raw) || param.options.default;
      if (param.options.type) {
        return {
          name: param.name,
          type: param.options.type,
          literal: { kind: "raw", type: param.options.type, text },
        };
      }
      return { name: param.name, type: "str", literal: { kind: "str", ref: context.pool.intern(text), macro: false } };
    }
    case "number":
      return { name: param.name, type: "int", literal: coerceNumber(rawText(raw), param, definition, context) };
    case "list":
      return { name: param.name, type: "str", literal: coerceList(raw, param, definition, context) };
  }
};

export const coerceParams = (
  definition: ScriptDefinition,
  values: Record<string, unknown>,
  context: CoercionContext
): CoercedParam[] => {
  return definition.params.map((param) => coerceParam(param, values[param.name], definition, context));
};

export const renderLiteral = (literal: ParamLiteral): string => {
  switch (literal.kind) {
    case "bool":
      return literal.value ? "true" : "false";
    case "int":
      return literal.value;
    case "str":
      return literal.macro ? `macro(${literal.ref})` : literal.ref;
    case "raw":
      return literal.text;
    case "source":
      return literal.text;
  }
};
