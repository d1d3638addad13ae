import { AutoScriptError } from "../core/errors.js";

/**
 * Non-reentrant mutual exclusion for the runtime's shared state. Every runtime
 * call is synchronous, so a held lock observed on entry means a critical section
 * is calling back into itself.
 */
export class RuntimeLock {
  private held = false;

  constructor(private readonly name: string) {}

  get locked(): boolean {
    return this.held;
  }

  run<T>(critical: () => T): T {
    if (this.held) {
      throw new AutoScriptError("RUNTIME_LOCK_REENTRY", `Lock "${this.name}" is already held.`);
    }
    this.held = true;
    try {
      return critical();
    } finally {
      this.held = false;
    }
  }
}
