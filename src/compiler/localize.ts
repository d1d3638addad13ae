import { AutoScriptError } from "../core/errors.js";
import { DEFAULT_LANG } from "../core/types.js";
import type { ScriptDefinition } from "../core/types.js";
import { expandMacros } from "../runtime/macro.js";

/** Resolves `#key#` references in a title against the definition's language tables. */
export const localizeText = (text: string, definition: ScriptDefinition, lang: string): string => {
  const vars = new Map<string, string>(Object.entries(definition.langs[DEFAULT_LANG] ?? {}));
  if (lang !== DEFAULT_LANG) {
    for (const [key, value] of Object.entries(definition.langs[lang] ?? {})) {
      vars.set(key, value);
    }
  }
  try {
    return expandMacros(text, vars);
  } catch (error) {
    // A broken language table leaves the title unexpanded.
    if (error instanceof AutoScriptError) {
      return text;
    }
    throw error;
  }
};
