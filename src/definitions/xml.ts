import { SaxesParser } from "saxes";

import { AutoScriptError } from "../core/errors.js";
import type { SourceSpan } from "../core/types.js";

export interface XmlTextNode {
  kind: "text";
  value: string;
  location: SourceSpan;
}

export interface XmlElementNode {
  kind: "element";
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
  location: SourceSpan;
}

export type XmlNode = XmlElementNode | XmlTextNode;

export interface XmlDocument {
  root: XmlElementNode;
}

const normalizeLoc = (line: number, column: number) => {
  return {
    line: Math.max(1, line),
    column: Math.max(1, column),
  };
};

/**
 * Parses a definition file. Text is kept verbatim, whitespace included, since
 * code templates and parameter values are whitespace sensitive; CDATA sections
 * become ordinary text nodes.
 */
export const parseXmlDocument = (source: string): XmlDocument => {
  const parser = new SaxesParser({ xmlns: false });
  const stack: XmlElementNode[] = [];
  let root: XmlElementNode | null = null;
  let parseErrorMessage: string | null = null;

  const pushText = (value: string): void => {
    const parent = stack[stack.length - 1];
    if (!parent) {
      return;
    }
    const at = normalizeLoc(parser.line, parser.column);
    parent.children.push({ kind: "text", value, location: { start: at, end: at } });
  };

  parser.on("error", (error) => {
    parseErrorMessage ??= String(error);
  });

  parser.on("opentag", (tag) => {
    const start = normalizeLoc(parser.line, parser.column);
    stack.push({
      kind: "element",
      name: tag.name,
      attributes: Object.fromEntries(
        Object.entries(tag.attributes).map(([k, v]) => [k, String(v)])
      ),
      children: [],
      location: { start, end: start },
    });
  });

  parser.on("text", pushText);
  parser.on("cdata", pushText);

  parser.on("closetag", () => {
    const node = stack.pop();
    if (!node) {
      return;
    }
    node.location.end = normalizeLoc(parser.line, parser.column);
    const parent = stack[stack.length - 1];
    if (!parent) {
      root = node;
      return;
    }
    parent.children.push(node);
  });

  parser.write(source).close();

  if (parseErrorMessage) {
    throw new AutoScriptError("XML_PARSE_ERROR", parseErrorMessage);
  }

  if (!root) {
    throw new AutoScriptError("XML_EMPTY", "XML document has no root element.");
  }

  return { root };
};

export const elementChildren = (node: XmlElementNode): XmlElementNode[] => {
  return node.children.filter((child): child is XmlElementNode => child.kind === "element");
};

export const textContent = (node: XmlElementNode): string => {
  return node.children.map((child) => (child.kind === "text" ? child.value : textContent(child))).join("");
};
