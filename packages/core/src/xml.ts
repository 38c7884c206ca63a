import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { structuralViolation } from "./errors.js";
import type { XmlElement, XmlNode } from "./types.js";

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const ATTR_PREFIX = "@_";
const ATTRS_KEY = ":@";
const TEXT_KEY = "#text";

type OrderedEntry = Record<string, unknown>;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  preserveOrder: true,
  textNodeName: TEXT_KEY,
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
});

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  preserveOrder: true,
  textNodeName: TEXT_KEY,
  suppressEmptyNode: true,
  format: false,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toAttrs(raw: unknown): Record<string, string> {
  const attrs: Record<string, string> = {};
  if (!isRecord(raw)) {
    return attrs;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (key.startsWith(ATTR_PREFIX)) {
      attrs[key.slice(ATTR_PREFIX.length)] = String(value);
    }
  }
  return attrs;
}

function toNodes(raw: unknown): XmlNode[] {
  const nodes: XmlNode[] = [];
  if (!Array.isArray(raw)) {
    return nodes;
  }
  for (const entry of raw) {
    if (!isRecord(entry)) {
      continue;
    }
    if (TEXT_KEY in entry) {
      const text = String(entry[TEXT_KEY]);
      // whitespace-only text between elements is formatting
      if (text.trim() !== "") {
        appendText(nodes, text);
      }
      continue;
    }
    const tag = Object.keys(entry).find((key) => key !== ATTRS_KEY);
    // processing instructions and doctype entries carry no document content
    if (!tag || tag.startsWith("?") || tag.startsWith("!")) {
      continue;
    }
    nodes.push({ tag, attrs: toAttrs(entry[ATTRS_KEY]), children: toNodes(entry[tag]) });
  }
  return nodes;
}

function toOrdered(node: XmlNode): OrderedEntry {
  if (typeof node === "string") {
    return { [TEXT_KEY]: node };
  }
  const entry: OrderedEntry = { [node.tag]: node.children.map(toOrdered) };
  const attrEntries = Object.entries(node.attrs);
  if (attrEntries.length > 0) {
    entry[ATTRS_KEY] = Object.fromEntries(attrEntries.map(([key, value]) => [`${ATTR_PREFIX}${key}`, value]));
  }
  return entry;
}

/** Parses an XML string into its root element. */
export function parseXml(source: string): XmlElement {
  const validation = XMLValidator.validate(source);
  if (validation !== true) {
    throw structuralViolation(`Malformed XML at line ${validation.err.line}: ${validation.err.msg}`, {
      code: validation.err.code,
      line: validation.err.line,
      col: validation.err.col,
    });
  }
  const roots = toNodes(parser.parse(source)).filter(isElement);
  const root = roots[0];
  if (!root) {
    throw structuralViolation("XML document has no root element.");
  }
  return root;
}

/** Parses a fragment that may contain several top-level nodes. */
export function parseFragment(source: string): XmlNode[] {
  const wrapped = parseXml(`<fragment>${source}</fragment>`);
  return wrapped.children;
}

export function serializeXml(node: XmlNode): string {
  const out: string = builder.build([toOrdered(node)]);
  return out;
}

export function serializeDocument(root: XmlElement): string {
  return `${XML_DECLARATION}\n${serializeXml(root)}\n`;
}

export function unescapeMarkup(text: string): string {
  return text.replace(/&lt;/g, "<").replace(/&gt;/g, ">").replace(/&quot;/g, '"');
}

export function isElement(node: XmlNode): node is XmlElement {
  return typeof node !== "string";
}

export function localName(tag: string): string {
  const idx = tag.indexOf(":");
  return idx === -1 ? tag : tag.slice(idx + 1);
}

export function hasTag(node: XmlNode, tag: string): node is XmlElement {
  return isElement(node) && localName(node.tag) === tag;
}

export function getAttr(element: XmlElement, name: string): string | undefined {
  return element.attrs[name];
}

export function getXmlId(element: XmlElement): string | undefined {
  return element.attrs["xml:id"] ?? element.attrs["id"];
}

export function createElement(tag: string, attrs: Record<string, string> = {}, children: XmlNode[] = []): XmlElement {
  return { tag, attrs: { ...attrs }, children };
}

export function withAttrs(element: XmlElement, attrs: Record<string, string>): XmlElement {
  return { ...element, attrs: { ...element.attrs, ...attrs } };
}

export function withChildren(element: XmlElement, children: XmlNode[]): XmlElement {
  return { ...element, children };
}

export function elementChildren(element: XmlElement): XmlElement[] {
  return element.children.filter(isElement);
}

/** Appends text, merging with a trailing text node so adjacent strings never accumulate. */
export function appendText(nodes: XmlNode[], text: string): void {
  const last = nodes[nodes.length - 1];
  if (typeof last === "string") {
    nodes[nodes.length - 1] = last + text;
    return;
  }
  nodes.push(text);
}

export function textContent(node: XmlNode): string {
  if (typeof node === "string") {
    return node;
  }
  return node.children.map(textContent).join("");
}

/** Descendants of `root` (not `root` itself) matching `tag`, in document order. */
export function findAll(root: XmlElement, tag: string): XmlElement[] {
  const found: XmlElement[] = [];
  const visit = (element: XmlElement): void => {
    for (const child of element.children) {
      if (!isElement(child)) {
        continue;
      }
      if (localName(child.tag) === tag) {
        found.push(child);
      }
      visit(child);
    }
  };
  visit(root);
  return found;
}

export function findFirst(root: XmlElement, tag: string): XmlElement | undefined {
  for (const child of root.children) {
    if (!isElement(child)) {
      continue;
    }
    if (localName(child.tag) === tag) {
      return child;
    }
    const nested = findFirst(child, tag);
    if (nested) {
      return nested;
    }
  }
  return undefined;
}

export function requireFirst(root: XmlElement, tag: string, context: string): XmlElement {
  const found = findFirst(root, tag);
  if (!found) {
    throw structuralViolation(`${context} has no <${tag}/> element.`, { tag });
  }
  return found;
}

export function requireBody(document: XmlElement): XmlElement {
  const text = requireFirst(document, "text", "Document");
  return requireFirst(text, "body", "<text/>");
}

/**
 * Returns a copy of `root` in which `target` (compared by identity) is replaced.
 * Only the ancestors of `target` are copied; untouched subtrees are shared.
 */
export function replaceElement(root: XmlElement, target: XmlElement, replacement: XmlElement): XmlElement {
  if (root === target) {
    return replacement;
  }
  let changed = false;
  const children = root.children.map((child) => {
    if (!isElement(child)) {
      return child;
    }
    const next = replaceElement(child, target, replacement);
    if (next !== child) {
      changed = true;
    }
    return next;
  });
  return changed ? { ...root, children } : root;
}

export function replaceBody(document: XmlElement, children: XmlNode[]): XmlElement {
  const body = requireBody(document);
  return replaceElement(document, body, withChildren(body, children));
}
