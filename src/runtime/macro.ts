import { AutoScriptError } from "../core/errors.js";
import { VAR_CHAR } from "../core/types.js";

export const MAX_VAR_NAME_LENGTH = 32;
export const MAX_EXPANSION_DEPTH = 16;

export type VariableLookup = ReadonlyMap<string, string>;

/**
 * Replaces `#name#` placeholders with values from `vars`, expanding those values
 * recursively. `stack` holds the names currently being expanded.
 */
export const expandMacros = (text: string, vars: VariableLookup, stack: string[] = []): string => {
  if (!text.includes(VAR_CHAR)) {
    return text;
  }
  const input = Array.from(text);
  let result = "";
  let name: string[] = [];
  let readingName = false;

  for (let i = 0; i < input.length; i += 1) {
    const char = input[i];
    if (char !== VAR_CHAR) {
      if (!readingName) {
        result += char;
        continue;
      }
      name.push(char);
      if (name.length > MAX_VAR_NAME_LENGTH) {
        result += VAR_CHAR + name.join("");
        readingName = false;
        name = [];
      }
      continue;
    }
    if (readingName) {
      const key = name.join("");
      const value = vars.get(key);
      if (value !== undefined) {
        if (stack.includes(key)) {
          throw new AutoScriptError("MACRO_VAR_LOOP", `${key} variable refers to itself`, { name: key });
        }
        if (stack.length >= MAX_EXPANSION_DEPTH) {
          throw new AutoScriptError("MACRO_VAR_TOO_DEEP", "maximum depth reached");
        }
        stack.push(key);
        result += expandMacros(value, vars, stack);
        stack.pop();
      } else {
        // The closing sigil may open the next placeholder.
        result += VAR_CHAR + key;
        i -= 1;
      }
      name = [];
    }
    readingName = !readingName;
  }
  if (readingName) {
    result += VAR_CHAR + name.join("");
  }
  return result;
};
