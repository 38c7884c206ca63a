import { structuralViolation } from "./errors.js";
import type { CollationLevel, Token, TokensByUnit, XmlElement, XmlNode } from "./types.js";
import { elementChildren, getAttr, hasTag, localName, requireBody, serializeXml, textContent } from "./xml.js";

/** Stands in for a unit with no content so the alignment engine never receives an empty witness. */
export const OMIT_TOKEN: Readonly<Token> = Object.freeze({ t: "", n: "omit" });

/** Divisions that always open a collation unit, whatever the level. */
export const FRAME_DIVISIONS: ReadonlySet<string> = new Set(["incipit", "explicit"]);

export function isDivisionMarker(node: XmlNode): node is XmlElement {
  return hasTag(node, "divGen");
}

export function isUnitMarker(node: XmlNode, level: CollationLevel): node is XmlElement {
  if (!isDivisionMarker(node)) {
    return false;
  }
  const type = getAttr(node, "type");
  return getAttr(node, "n") !== undefined && type !== undefined && (type === level || FRAME_DIVISIONS.has(type));
}

export function createToken(formatted: XmlElement, normalized: XmlElement): Token {
  const text = textContent(normalized);
  return {
    t: serializeXml(formatted),
    n: text !== "" ? text : localName(normalized.tag),
  };
}

/**
 * Walks a formatted and a fully-normalized rendering of the same flattened
 * document in lockstep and groups their tokens by collation unit.
 * Division markers are not tokens; content before the first unit is not collated.
 */
export function tokenizeUnits(formatted: XmlElement, normalized: XmlElement, level: CollationLevel): TokensByUnit {
  const formattedElements = elementChildren(requireBody(formatted));
  const normalizedElements = elementChildren(requireBody(normalized));
  if (formattedElements.length !== normalizedElements.length) {
    throw structuralViolation("Formatted and normalized bodies do not have the same elements.", {
      formatted: formattedElements.length,
      normalized: normalizedElements.length,
    });
  }

  const units: TokensByUnit = new Map();
  let current: Token[] | null = null;
  for (let i = 0; i < formattedElements.length; i += 1) {
    const element = formattedElements[i];
    const normalizedElement = normalizedElements[i];
    if (isUnitMarker(element, level)) {
      const n = getAttr(element, "n") ?? "";
      current = units.get(n) ?? [];
      units.set(n, current);
      continue;
    }
    if (current === null || isDivisionMarker(element)) {
      continue;
    }
    current.push(createToken(element, normalizedElement));
  }

  for (const [n, tokens] of units) {
    if (tokens.length === 0) {
      units.set(n, [{ ...OMIT_TOKEN }]);
    }
  }
  return units;
}
