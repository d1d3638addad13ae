import assert from "node:assert/strict";
import { test } from "vitest";

import { localizeText } from "../../../src/compiler/localize.js";
import { buildPredefined, mergePredefined } from "../../../src/compiler/predefined.js";
import { StringPool } from "../../../src/compiler/string-pool.js";
import { definition } from "../../helpers/definitions.js";

const greeter = definition("greeter", {
  title: "#title#",
  langs: {
    en: { greeting: "Hello", name: "World", _title: "internal" },
    fr: { greeting: "Bonjour", _hidden: "x" },
  },
});

test("current language overrides the default table and internal keys are dropped", () => {
  assert.deepEqual(mergePredefined(greeter, "en"), { greeting: "Hello", name: "World" });
  assert.deepEqual(mergePredefined(greeter, "fr"), { greeting: "Bonjour", name: "World" });
  assert.deepEqual(mergePredefined(greeter, "de"), { greeting: "Hello", name: "World" });
});

test("buildPredefined interns the YAML table and emits one load statement", () => {
  const pool = new StringPool();
  assert.equal(buildPredefined(greeter, "fr", pool), "SetYamlVars(STR0)");
  assert.deepEqual(pool.strings(), ["greeting: Bonjour\nname: World\n"]);
});

test("buildPredefined returns null for an empty table", () => {
  const pool = new StringPool();
  const empty = definition("empty", { langs: { en: { _only: "internal" } } });
  assert.equal(buildPredefined(empty, "en", pool), null);
  assert.equal(pool.size, 0);
});

test("localizeText resolves references against the language tables", () => {
  const titled = definition("titled", {
    langs: { en: { title: "Copy", field: "Target" }, fr: { title: "Copier" } },
  });
  assert.equal(localizeText("#title#: #field#", titled, "fr"), "Copier: Target");
  assert.equal(localizeText("#title#", titled, "en"), "Copy");
  assert.equal(localizeText("#unknown#", titled, "en"), "#unknown#");
});
