import { formatWitnessRefs, parseWitnessRefs } from "./alignment.js";
import { ApparatusError, structuralViolation } from "./errors.js";
import { countSegmentMarkers, segmentAtMarkers } from "./segmenter.js";
import type { ResegmentationIssue, ResegmentationReport, XmlElement, XmlNode } from "./types.js";
import {
  createElement,
  elementChildren,
  findAll,
  getAttr,
  getXmlId,
  hasTag,
  replaceBody,
  requireBody,
  requireFirst,
  serializeXml,
} from "./xml.js";

/** Best-effort identifier of an apparatus: its `n`, or its 1-based position in the document. */
export function apparatusLabel(app: XmlElement, ordinal: number): string {
  const n = getAttr(app, "n");
  return n !== undefined && n !== "" ? n : `#${ordinal + 1}`;
}

export function requireLemma(app: XmlElement): XmlElement {
  const lem = elementChildren(app).find((child) => hasTag(child, "lem"));
  if (!lem) {
    throw structuralViolation("Apparatus has no <lem/> reading.", { n: getAttr(app, "n") ?? null });
  }
  return lem;
}

export function variantReadings(app: XmlElement): XmlElement[] {
  return elementChildren(app).filter((child) => hasTag(child, "rdg"));
}

/**
 * Checks that every reading of every apparatus has as many segment markers
 * as its lemma. Scans the whole document and reports every mismatch.
 */
export function validateResegmentation(document: XmlElement): ResegmentationReport {
  const issues: ResegmentationIssue[] = [];
  findAll(requireBody(document), "app").forEach((app, ordinal) => {
    const appLabel = apparatusLabel(app, ordinal);
    const expected = countSegmentMarkers(requireLemma(app));
    variantReadings(app).forEach((rdg, readingIndex) => {
      const actual = countSegmentMarkers(rdg);
      if (actual === expected) {
        return;
      }
      const wit = getAttr(rdg, "wit");
      issues.push({
        appLabel,
        readingIndex,
        expected,
        actual,
        message:
          `The apparatus ${appLabel} has a reading${wit ? ` (${wit})` : ""} with ${actual} segment ` +
          `division marker(s), but its lemma has ${expected}.`,
      });
    });
  });
  return { valid: issues.length === 0, issues };
}

/** Witness ids declared in the collation's `<listWit/>`, in order. */
export function getWitnessIds(document: XmlElement): string[] {
  const listWit = requireFirst(document, "listWit", "Collation");
  return findAll(listWit, "witness").flatMap((witness) => {
    const id = getXmlId(witness);
    return id === undefined ? [] : [id];
  });
}

function project(document: XmlElement, readingOf: (app: XmlElement, ordinal: number) => XmlElement): XmlElement {
  const body = requireBody(document);
  const children: XmlNode[] = [];
  let ordinal = 0;
  for (const child of body.children) {
    if (hasTag(child, "app")) {
      children.push(...readingOf(child, ordinal).children);
      ordinal += 1;
    } else {
      children.push(child);
    }
  }
  return replaceBody(document, children);
}

/** The document with each apparatus replaced by the content of its lemma. */
export function getLemmaDocument(document: XmlElement): XmlElement {
  return project(document, (app) => requireLemma(app));
}

/** The document as the given witness reads it: each apparatus replaced by the one reading that lists the witness. */
export function getWitnessDocument(document: XmlElement, witnessId: string): XmlElement {
  return project(document, (app, ordinal) => {
    const matches = variantReadings(app).filter((rdg) => parseWitnessRefs(getAttr(rdg, "wit")).includes(witnessId));
    if (matches.length === 1 && matches[0]) {
      return matches[0];
    }
    const reason = matches.length === 0 ? "missing" : "ambiguous";
    throw new ApparatusError(
      "UNKNOWN_WITNESS_MEMBERSHIP",
      matches.length === 0
        ? `Witness ${witnessId} is not listed by any reading of apparatus ${apparatusLabel(app, ordinal)}.`
        : `Witness ${witnessId} is listed by ${matches.length} readings of apparatus ${apparatusLabel(app, ordinal)}.`,
      { witnessId, apparatus: apparatusLabel(app, ordinal), reason },
    );
  });
}

/**
 * Rebuilds the apparatus at segment granularity. The lemma and every witness
 * are projected and cut at the segment markers; at each segment index the
 * witnesses are grouped by the serialization of their segment. A single group
 * needs no apparatus; several become one `<rdg/>` each, in first-witness order.
 */
export function updateBoundaries(document: XmlElement): XmlElement {
  const witnessIds = getWitnessIds(document);
  const lemmaSegments = segmentAtMarkers(requireBody(getLemmaDocument(document)).children);
  const witnessSegments = witnessIds.map((id) => {
    const segments = segmentAtMarkers(requireBody(getWitnessDocument(document, id)).children);
    if (segments.length !== lemmaSegments.length) {
      throw structuralViolation(
        `Witness ${id} has ${segments.length} segment(s), but the lemma has ${lemmaSegments.length}.`,
        { witnessId: id, expected: lemmaSegments.length, actual: segments.length },
      );
    }
    return segments;
  });

  const children: XmlNode[] = [];
  lemmaSegments.forEach((lemmaSegment, index) => {
    const groups = new Map<string, { segment: XmlElement; witnesses: string[] }>();
    witnessIds.forEach((id, w) => {
      const segment = witnessSegments[w]?.[index];
      if (!segment) {
        return;
      }
      const key = serializeXml(segment);
      const group = groups.get(key);
      if (group) {
        group.witnesses.push(id);
      } else {
        groups.set(key, { segment, witnesses: [id] });
      }
    });

    if (groups.size <= 1) {
      children.push(...lemmaSegment.children);
      return;
    }
    const readings = [...groups.values()].map(({ segment, witnesses }) =>
      createElement("rdg", { wit: formatWitnessRefs(witnesses) }, segment.children),
    );
    children.push(createElement("app", {}, [createElement("lem", {}, lemmaSegment.children), ...readings]));
  });

  return replaceBody(document, children);
}
