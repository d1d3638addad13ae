import { AutoScriptError } from "../core/errors.js";

export class ScopeStack {
  private readonly scopes: Map<string, string>[] = [];

  get depth(): number {
    return this.scopes.length;
  }

  enter(): void {
    this.scopes.push(new Map());
  }

  exit(): void {
    if (this.scopes.length === 0) {
      throw new AutoScriptError("SCOPE_UNDERFLOW", "deinit() called without a matching init().");
    }
    this.scopes.pop();
  }

  setVariable(name: string, value: string): void {
    const scope = this.scopes[this.scopes.length - 1];
    if (!scope) {
      throw new AutoScriptError("SCOPE_EMPTY", `Cannot set "${name}": no scope is open.`);
    }
    scope.set(name, value);
  }

  top(): ReadonlyMap<string, string> | null {
    return this.scopes[this.scopes.length - 1] ?? null;
  }
}
