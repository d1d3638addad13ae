import { AutoScriptError } from "../core/errors.js";
import { LogLevel } from "../core/types.js";
import type { LangTable, ParamKind, ParamSpec, ScriptDefinition, ScriptNode } from "../core/types.js";
import { ScriptRegistry } from "./registry.js";
import { elementChildren, parseXmlDocument, textContent } from "./xml.js";
import type { XmlElementNode } from "./xml.js";

const PARAM_KINDS: readonly ParamKind[] = ["checkbox", "textarea", "singletext", "select", "number", "list"];

const LOG_LEVELS = new Map<string, LogLevel>([
  ["disable", LogLevel.Disable],
  ["error", LogLevel.Error],
  ["warn", LogLevel.Warn],
  ["info", LogLevel.Info],
  ["debug", LogLevel.Debug],
  ["inherit", LogLevel.Inherit],
]);

const isParamKind = (value: string): value is ParamKind => PARAM_KINDS.some((kind) => kind === value);

const getRequiredAttr = (node: XmlElementNode, name: string): string => {
  const value = node.attributes[name];
  if (value === undefined || value.trim() === "") {
    throw new AutoScriptError(
      "XML_MISSING_ATTR",
      `Missing required attribute "${name}" on <${node.name}>.`,
      undefined,
      node.location
    );
  }
  return value.trim();
};

const parseBooleanAttr = (node: XmlElementNode, name: string, defaultValue = false): boolean => {
  const raw = node.attributes[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim();
  if (normalized === "true") {
    return true;
  }
  if (normalized === "false") {
    return false;
  }
  throw new AutoScriptError(
    "XML_ATTR_BOOL_INVALID",
    `Attribute "${name}" on <${node.name}> must be "true" or "false".`,
    undefined,
    node.location
  );
};

const unknownNode = (node: XmlElementNode, parent: string): AutoScriptError =>
  new AutoScriptError("XML_UNKNOWN_NODE", `Unexpected <${node.name}> inside <${parent}>.`, undefined, node.location);

const parseLogLevel = (node: XmlElementNode): LogLevel => {
  const raw = (node.attributes.logLevel ?? "inherit").trim().toLowerCase();
  const level = LOG_LEVELS.get(raw);
  if (level === undefined) {
    throw new AutoScriptError(
      "XML_ENUM_INVALID",
      `Attribute "logLevel" on <${node.name}> must be one of ${[...LOG_LEVELS.keys()].join(", ")}.`,
      undefined,
      node.location
    );
  }
  return level;
};

const parseParam = (node: XmlElementNode): ParamSpec => {
  const name = getRequiredAttr(node, "name");
  const kind = getRequiredAttr(node, "kind");
  if (!isParamKind(kind)) {
    throw new AutoScriptError(
      "XML_ENUM_INVALID",
      `Attribute "kind" on <param> must be one of ${PARAM_KINDS.join(", ")}.`,
      undefined,
      node.location
    );
  }
  const type = node.attributes.type?.trim();
  return {
    name,
    title: node.attributes.title ?? name,
    kind,
    options: {
      required: parseBooleanAttr(node, "required"),
      default: node.attributes.default ?? "",
      ...(type ? { type } : {}),
    },
  };
};

const parseLang = (node: XmlElementNode): LangTable => {
  const table: LangTable = {};
  for (const child of elementChildren(node)) {
    if (child.name !== "var") {
      throw unknownNode(child, node.name);
    }
    table[getRequiredAttr(child, "name")] = textContent(child);
  }
  return table;
};

const parseValue = (node: XmlElementNode): unknown => {
  const items = elementChildren(node);
  if (items.length === 0) {
    return textContent(node);
  }
  return items.map((item) => {
    if (item.name !== "item") {
      throw unknownNode(item, node.name);
    }
    return textContent(item);
  });
};

const parseNode = (node: XmlElementNode): ScriptNode => {
  const values: Record<string, unknown> = {};
  const children: ScriptNode[] = [];
  for (const part of elementChildren(node)) {
    if (part.name === "value") {
      values[getRequiredAttr(part, "name")] = parseValue(part);
    } else if (part.name === "node") {
      children.push(parseNode(part));
    } else {
      throw unknownNode(part, node.name);
    }
  }
  return {
    name: getRequiredAttr(node, "name"),
    disabled: parseBooleanAttr(node, "disabled"),
    values,
    children,
  };
};

export const parseTreeNodes = (parent: XmlElementNode): ScriptNode[] => {
  return elementChildren(parent).map((child) => {
    if (child.name !== "node") {
      throw unknownNode(child, parent.name);
    }
    return parseNode(child);
  });
};

export const parseDefinitionXml = (source: string): ScriptDefinition => {
  const { root } = parseXmlDocument(source);
  if (root.name !== "script") {
    throw new AutoScriptError(
      "XML_UNKNOWN_NODE",
      `Root element must be <script>, got <${root.name}>.`,
      undefined,
      root.location
    );
  }
  const name = getRequiredAttr(root, "name");
  const definition: ScriptDefinition = {
    name,
    title: root.attributes.title ?? name,
    logLevel: parseLogLevel(root),
    code: "",
    params: [],
    tree: [],
    langs: {},
  };
  for (const child of elementChildren(root)) {
    switch (child.name) {
      case "param":
        definition.params.push(parseParam(child));
        break;
      case "lang":
        definition.langs[getRequiredAttr(child, "code")] = parseLang(child);
        break;
      case "code":
        definition.code = textContent(child);
        break;
      case "tree":
        definition.tree = parseTreeNodes(child);
        break;
      default:
        throw unknownNode(child, "script");
    }
  }
  return definition;
};

const isDefinitionFile = (filePath: string): boolean => filePath.endsWith(".def.xml");

export const loadDefinitionsFromXmlMap = (xmlByPath: Record<string, string>): ScriptRegistry => {
  const registry = new ScriptRegistry();
  for (const filePath of Object.keys(xmlByPath).sort()) {
    if (!isDefinitionFile(filePath)) {
      continue;
    }
    registry.register(parseDefinitionXml(xmlByPath[filePath]));
  }
  return registry;
};
