import { stringify } from "yaml";

import { AutoScriptError } from "../core/errors.js";
import { DEFAULT_LANG, INTERNAL_KEY_PREFIX } from "../core/types.js";
import type { LangTable, ScriptDefinition } from "../core/types.js";
import type { StringPool } from "./string-pool.js";

const copyPublic = (source: LangTable | undefined, target: Record<string, string>): void => {
  for (const [key, value] of Object.entries(source ?? {})) {
    if (!key.startsWith(INTERNAL_KEY_PREFIX)) {
      target[key] = value;
    }
  }
};

export const mergePredefined = (definition: ScriptDefinition, lang: string): Record<string, string> => {
  const merged: Record<string, string> = {};
  copyPublic(definition.langs[DEFAULT_LANG], merged);
  if (lang !== DEFAULT_LANG) {
    copyPublic(definition.langs[lang], merged);
  }
  return merged;
};

export const serializePredefined = (vars: Record<string, string>): string => {
  try {
    return stringify(vars, { sortMapEntries: true });
  } catch (error) {
    const cause = error instanceof Error ? error.message : String(error);
    throw new AutoScriptError("SERIALIZATION_FAILED", `Cannot encode predefined variables: ${cause}`, { cause });
  }
};

/** Returns the statement loading the definition's predefined variables, or null when it has none. */
export const buildPredefined = (definition: ScriptDefinition, lang: string, pool: StringPool): string | null => {
  const vars = mergePredefined(definition, lang);
  if (Object.keys(vars).length === 0) {
    return null;
  }
  return `SetYamlVars(${pool.intern(serializePredefined(vars))})`;
};
