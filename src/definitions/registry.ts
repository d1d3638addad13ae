import { AutoScriptError } from "../core/errors.js";
import type { ScriptDefinition, ScriptResolver } from "../core/types.js";

export class ScriptRegistry {
  private readonly definitions = new Map<string, ScriptDefinition>();

  constructor(definitions: ScriptDefinition[] = []) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  get size(): number {
    return this.definitions.size;
  }

  register(definition: ScriptDefinition): void {
    if (this.definitions.has(definition.name)) {
      throw new AutoScriptError(
        "DEFINITION_DUPLICATE",
        `Script "${definition.name}" is registered twice.`,
        { script: definition.name }
      );
    }
    this.definitions.set(definition.name, definition);
  }

  get(name: string): ScriptDefinition | undefined {
    return this.definitions.get(name);
  }

  names(): string[] {
    return [...this.definitions.keys()].sort();
  }

  readonly resolve: ScriptResolver = (name) => this.get(name);
}
