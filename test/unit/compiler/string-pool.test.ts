import assert from "node:assert/strict";
import { test } from "vitest";

import { crc64Iso } from "../../../src/compiler/crc64.js";
import { StringPool, toLiteral } from "../../../src/compiler/string-pool.js";

test("crc64Iso matches the ISO polynomial check value", () => {
  assert.equal(crc64Iso("123456789"), 0xb90956c775a41001n);
  assert.equal(crc64Iso(""), 0n);
});

test("intern returns the same reference for identical text", () => {
  const pool = new StringPool();
  assert.equal(pool.intern("hello"), "STR0");
  assert.equal(pool.intern("world"), "STR1");
  assert.equal(pool.intern("hello"), "STR0");
  assert.equal(pool.size, 2);
});

test("distinct strings are kept in first-seen order", () => {
  const pool = new StringPool();
  const refs = ["c", "a", "b", "a", "c"].map((value) => pool.intern(value));
  assert.deepEqual(refs, ["STR0", "STR1", "STR2", "STR1", "STR0"]);
  assert.deepEqual(pool.strings(), ["c", "a", "b"]);
});

test("strings sharing a hash still get their own constants", () => {
  const pool = new StringPool({ hash: () => 7n });
  assert.equal(pool.intern("first"), "STR0");
  assert.equal(pool.intern("second"), "STR1");
  assert.equal(pool.intern("first"), "STR0");
  assert.equal(pool.intern("second"), "STR1");
  assert.deepEqual(pool.strings(), ["first", "second"]);
});

test("toLiteral picks backticks for safe text and escapes the rest", () => {
  assert.equal(toLiteral("plain text"), "`plain text`");
  assert.equal(toLiteral('say "hi"'), '`say "hi"`');
  assert.equal(toLiteral("100%"), '"100%"');
  assert.equal(toLiteral('a\\b "$x"'), '"a\\\\b \\"$x\\""');
  assert.equal(toLiteral("tick`"), '"tick`"');
});
