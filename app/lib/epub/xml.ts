import { XMLParser, XMLValidator } from "fast-xml-parser";
import { EpubError } from "./errors";

export type XmlNode = Record<string, unknown>;

const ATTRIBUTE_PREFIX = "@_";

// Elements that may repeat and must always decode to arrays
const REPEATED_ELEMENTS = new Set(["rootfile", "item", "itemref", "navPoint"]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  removeNSPrefix: true,
  parseTagValue: false,
  isArray: (name, _jpath, _isLeafNode, isAttribute) =>
    !isAttribute && REPEATED_ELEMENTS.has(name),
});

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decode XML bytes into a plain object tree.
 * Namespace prefixes are dropped, so `dc:title` decodes as `title`.
 */
export function decodeXml(bytes: Buffer, documentName: string): XmlNode {
  const xml = bytes.toString("utf-8").replace(/^\uFEFF/, "");

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new EpubError("decode", `Malformed ${documentName}: ${msg} (line ${line})`, {
      cause: validation.err,
    });
  }

  const doc: unknown = parser.parse(xml);
  if (!isXmlNode(doc)) {
    throw new EpubError("decode", `Malformed ${documentName}: no root element`);
  }
  return doc;
}

/** Named child of an element; a repeated element is read from its first occurrence. */
export function child(node: unknown, name: string): unknown {
  const element = Array.isArray(node) ? node[0] : node;
  return isXmlNode(element) ? element[name] : undefined;
}

export function children(node: unknown, name: string): unknown[] {
  const value = child(node, name);
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/** Character data of an element; the first occurrence when it repeats. */
export function text(node: unknown): string {
  if (typeof node === "string") return node;
  if (typeof node === "number" || typeof node === "boolean") return String(node);
  if (Array.isArray(node)) return node.length > 0 ? text(node[0]) : "";
  if (isXmlNode(node)) return text(node["#text"]);
  return "";
}

export function attr(node: unknown, name: string): string {
  return text(child(node, ATTRIBUTE_PREFIX + name));
}
