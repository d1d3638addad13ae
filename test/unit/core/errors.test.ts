import assert from "node:assert/strict";
import { test } from "vitest";

import { AutoScriptError } from "../../../src/core/errors.js";

test("AutoScriptError carries code, details and span", () => {
  const span = {
    start: { line: 1, column: 1 },
    end: { line: 1, column: 2 },
  };
  const error = new AutoScriptError("X_CODE", "boom", { field: "f" }, span);
  assert.ok(error instanceof Error);
  assert.equal(error.name, "AutoScriptError");
  assert.equal(error.code, "X_CODE");
  assert.equal(error.message, "boom");
  assert.deepEqual(error.details, { field: "f" });
  assert.deepEqual(error.span, span);
});
