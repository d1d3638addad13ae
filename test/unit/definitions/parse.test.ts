import assert from "node:assert/strict";
import { test } from "vitest";

import { LogLevel } from "../../../src/core/types.js";
import { loadDefinitionsFromXmlMap, parseDefinitionXml } from "../../../src/definitions/parse.js";
import { ScriptRegistry } from "../../../src/definitions/registry.js";
import { parseXmlDocument } from "../../../src/definitions/xml.js";
import { definition } from "../../helpers/definitions.js";
import { expectCode } from "../../helpers/errors.js";

test("parseXmlDocument keeps text verbatim and merges CDATA", () => {
  const doc = parseXmlDocument(`<code>  a &lt; b <![CDATA[%body% & more]]></code>`);
  assert.equal(doc.root.name, "code");
  assert.deepEqual(
    doc.root.children.map((child) => (child.kind === "text" ? child.value : child.name)),
    ["  a < b ", "%body% & more"]
  );
});

test("parseXmlDocument throws parse and empty errors", () => {
  expectCode(() => parseXmlDocument("<script"), "XML_PARSE_ERROR");
  expectCode(() => parseXmlDocument(""), "XML_EMPTY");
});

test("parseDefinitionXml reads params, languages, code and tree", () => {
  const parsed = parseDefinitionXml(`
<script name="copy" title="#title#" logLevel="debug">
  <param name="from" kind="singletext" title="From" required="true"/>
  <param name="mode" kind="select" type="int" default="1"/>
  <lang code="en"><var name="title">Copy</var></lang>
  <lang code="fr"><var name="title">Copier</var></lang>
  <code><![CDATA[Copy(from)
%body%]]></code>
  <tree>
    <node name="log" disabled="true">
      <value name="msg">done</value>
      <value name="tags"><item>x</item> <item>y</item></value>
      <node name="inner"/>
    </node>
  </tree>
</script>`);

  assert.equal(parsed.name, "copy");
  assert.equal(parsed.title, "#title#");
  assert.equal(parsed.logLevel, LogLevel.Debug);
  assert.equal(parsed.code, "Copy(from)\n%body%");
  assert.deepEqual(parsed.params, [
    { name: "from", title: "From", kind: "singletext", options: { required: true, default: "" } },
    { name: "mode", title: "mode", kind: "select", options: { required: false, default: "1", type: "int" } },
  ]);
  assert.deepEqual(parsed.langs, { en: { title: "Copy" }, fr: { title: "Copier" } });
  assert.deepEqual(parsed.tree, [
    {
      name: "log",
      disabled: true,
      values: { msg: "done", tags: ["x", "y"] },
      children: [{ name: "inner", disabled: false, values: {}, children: [] }],
    },
  ]);
});

test("parseDefinitionXml defaults to inherit and rejects bad input", () => {
  assert.equal(parseDefinitionXml(`<script name="a"/>`).logLevel, LogLevel.Inherit);
  expectCode(() => parseDefinitionXml(`<script/>`), "XML_MISSING_ATTR");
  expectCode(() => parseDefinitionXml(`<script name="a" logLevel="loud"/>`), "XML_ENUM_INVALID");
  expectCode(() => parseDefinitionXml(`<script name="a"><param name="p" kind="slider"/></script>`), "XML_ENUM_INVALID");
  expectCode(
    () => parseDefinitionXml(`<script name="a"><param name="p" kind="number" required="yes"/></script>`),
    "XML_ATTR_BOOL_INVALID"
  );
  expectCode(() => parseDefinitionXml(`<script name="a"><extra/></script>`), "XML_UNKNOWN_NODE");
  expectCode(() => parseDefinitionXml(`<macro name="a"/>`), "XML_UNKNOWN_NODE");
  expectCode(() => parseDefinitionXml(`<script name="a"><tree><step/></tree></script>`), "XML_UNKNOWN_NODE");
});

test("loadDefinitionsFromXmlMap registers definition files only", () => {
  const registry = loadDefinitionsFromXmlMap({
    "b.def.xml": `<script name="b"/>`,
    "a.def.xml": `<script name="a"/>`,
    "notes.xml": `<not-a-script/>`,
  });
  assert.deepEqual(registry.names(), ["a", "b"]);
  assert.equal(registry.resolve("a")?.name, "a");
  assert.equal(registry.resolve("notes"), undefined);
});

test("ScriptRegistry rejects duplicate names", () => {
  const registry = new ScriptRegistry([definition("a")]);
  assert.equal(registry.size, 1);
  const error = expectCode(() => registry.register(definition("a")), "DEFINITION_DUPLICATE");
  assert.deepEqual(error.details, { script: "a" });
});
