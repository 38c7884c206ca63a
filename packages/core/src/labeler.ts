import {
  type CitationContext,
  EMPTY_CITATION_CONTEXT,
  advanceWord,
  citationLabel,
  enterDivision,
  ensureWordLevel,
} from "./citation.js";
import { requireLemma, variantReadings } from "./collation-editor.js";
import type { ApparatusType, XmlElement, XmlNode } from "./types.js";
import { HEBREW_LETTER_RE, stripAllAccents, stripPlene } from "./unicode.js";
import { elementChildren, findAll, getAttr, hasTag, localName, serializeXml, textContent, withAttrs } from "./xml.js";

/** A reading as words: each element's text, or its tag name when it has none. */
export function readingTokens(reading: XmlElement): string[] {
  return elementChildren(reading).map((element) => {
    const text = textContent(element);
    return text !== "" ? text : localName(element.tag);
  });
}

function normalized(tokens: string[]): string {
  return stripAllAccents(tokens.join(" "));
}

function pleneReduced(tokens: string[]): string {
  return tokens
    .map((token) => (HEBREW_LETTER_RE.test(token) ? stripAllAccents(stripPlene(token)) : stripAllAccents(token)))
    .join(" ");
}

function sortedNormalized(tokens: string[]): string {
  return tokens
    .map((token) => stripAllAccents(token))
    .sort()
    .join(" ");
}

/** First matching rule wins; with no variants at all the apparatus is vocalic. */
export function classifyReadings(lemma: string[], variants: string[][]): ApparatusType {
  if (variants.every((variant) => normalized(variant) === normalized(lemma))) {
    return "vocalic";
  }
  if (variants.every((variant) => pleneReduced(variant) === pleneReduced(lemma))) {
    return "orthographic";
  }
  if (variants.every((variant) => sortedNormalized(variant) === sortedNormalized(lemma))) {
    return "transposition";
  }
  if (lemma.length === 0 && variants.every((variant) => variant.length > 0)) {
    return "addition";
  }
  if (lemma.length > 0 && variants.every((variant) => variant.length === 0)) {
    return "omission";
  }
  return "substitution";
}

function contentKey(reading: XmlElement): string {
  return reading.children.map((child) => serializeXml(child)).join("");
}

export function classifyApparatus(app: XmlElement): ApparatusType {
  const lem = requireLemma(app);
  const lemmaKey = contentKey(lem);
  const variants = variantReadings(app).filter((rdg) => contentKey(rdg) !== lemmaKey);
  return classifyReadings(readingTokens(lem), variants.map(readingTokens));
}

function mapApparatus(node: XmlNode, fn: (app: XmlElement) => XmlElement): XmlNode {
  if (typeof node === "string") {
    return node;
  }
  const mapped = { ...node, children: node.children.map((child) => mapApparatus(child, fn)) };
  return hasTag(mapped, "app") ? fn(mapped) : mapped;
}

export function addTypes(document: XmlElement): XmlElement {
  return {
    ...document,
    children: document.children.map((child) =>
      mapApparatus(child, (app) => withAttrs(app, { type: classifyApparatus(app) })),
    ),
  };
}

interface IndexStep {
  element: XmlElement;
  context: CitationContext;
}

function indexElement(element: XmlElement, context: CitationContext): IndexStep {
  const tag = localName(element.tag);

  if (tag === "divGen") {
    const type = getAttr(element, "type");
    return {
      element,
      context: type === undefined ? context : enterDivision(context, type, getAttr(element, "n") ?? ""),
    };
  }
  if (tag === "w") {
    return { element, context: advanceWord(context) };
  }
  if (tag === "app") {
    // divisions that open the lemma precede its first word
    let opening = context;
    let end: CitationContext | undefined;
    for (const child of elementChildren(requireLemma(element))) {
      if (end === undefined && hasTag(child, "divGen")) {
        opening = indexElement(child, opening).context;
        continue;
      }
      end = indexElement(child, end ?? ensureWordLevel(opening)).context;
    }
    const start = ensureWordLevel(opening);
    const label = citationLabel(start, end ?? start, findAll(element, "w").length > 0);
    return { element: withAttrs(element, { n: label }), context: end ?? start };
  }

  let current = context;
  const children = element.children.map((child) => {
    if (typeof child === "string") {
      return child;
    }
    const step = indexElement(child, current);
    current = step.context;
    return step.element;
  });
  return { element: { ...element, children }, context: current };
}

/** Sets a citation `n` on every apparatus from the divisions and lemma words that precede it. */
export function addIndices(document: XmlElement, context: CitationContext = EMPTY_CITATION_CONTEXT): XmlElement {
  return indexElement(document, context).element;
}

export function labelDocument(document: XmlElement): XmlElement {
  return addIndices(addTypes(document));
}
