import type { WordFinding, XmlElement } from "./types.js";
import { HEBREW_LETTER_RE, HOLAM_HASER_FOR_VAV, isPointed } from "./unicode.js";
import { getAttr, hasTag, isElement, localName, requireBody, textContent } from "./xml.js";

const DIVISION_TAGS: ReadonlySet<string> = new Set(["divGen", "milestone"]);

const INVALID_HOLAM_RE = new RegExp(`(^|[^\\u05D5])${HOLAM_HASER_FOR_VAV}`);

/** Runs `predicate` over the body's top-level words, tracking the most recent division `n`. */
function scanWords(document: XmlElement, predicate: (word: string) => boolean): WordFinding[] {
  const findings: WordFinding[] = [];
  let division = "";
  for (const child of requireBody(document).children) {
    if (isElement(child) && DIVISION_TAGS.has(localName(child.tag))) {
      division = getAttr(child, "n") ?? division;
      continue;
    }
    if (!hasTag(child, "w")) {
      continue;
    }
    const word = textContent(child);
    if (predicate(word)) {
      findings.push({ word, division });
    }
  }
  return findings;
}

export function findUnpointedWords(document: XmlElement): WordFinding[] {
  return scanWords(document, (word) => HEBREW_LETTER_RE.test(word) && !isPointed(word));
}

/** Holam haser belongs only on a vav. */
export function findInvalidHolam(document: XmlElement): WordFinding[] {
  return scanWords(document, (word) => INVALID_HOLAM_RE.test(word));
}
