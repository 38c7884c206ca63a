import { type AlignmentEngine, formatWitnessRefs, parseAlignmentOutput, parseWitnessRefs } from "./alignment.js";
import { ApparatusError, structuralViolation } from "./errors.js";
import { normalizeDocument, resolveNormalizerOptions } from "./normalizer.js";
import { segmentBody } from "./segmenter.js";
import { isDivisionMarker, isUnitMarker, tokenizeUnits } from "./tokens.js";
import {
  ACCENT_CLASSES,
  type AccentClass,
  type CollationLevel,
  type WitnessRecord,
  type XmlElement,
  type XmlNode,
} from "./types.js";
import {
  createElement,
  elementChildren,
  findAll,
  getAttr,
  hasTag,
  isElement,
  replaceBody,
  replaceElement,
  requireBody,
  requireFirst,
  textContent,
  withChildren,
} from "./xml.js";

export interface CollatorOptions {
  level?: CollationLevel;
  ignoredAccents?: Iterable<AccentClass>;
  ignoredTags?: Iterable<string>;
}

export interface CollationUnit {
  n: string;
  /** Witnesses extant at this unit, in the order they were read. */
  witnesses: string[];
  items: XmlNode[];
}

/** The siglum is the `n` attribute, or else the text, of the second `<title/>`. */
export function witnessSiglum(document: XmlElement): string {
  const title = findAll(document, "title")[1];
  if (!title) {
    throw structuralViolation("Transcription has no witness title (expected a second <title/> element).");
  }
  const siglum = (getAttr(title, "n") ?? textContent(title)).trim();
  if (!siglum) {
    throw structuralViolation("Witness title is empty.");
  }
  return siglum;
}

/** Distinct `<rdg type/>` values, in document order. */
export function readingTypes(document: XmlElement): string[] {
  const types: string[] = [];
  for (const rdg of findAll(document, "rdg")) {
    const type = getAttr(rdg, "type");
    if (type !== undefined && !types.includes(type)) {
      types.push(type);
    }
  }
  return types;
}

/** Adds an empty reading for witnesses that are extant at the unit but listed by no reading. */
export function addOmissionReading(item: XmlNode, extantWitnesses: string[], lemmaId: string): XmlNode {
  if (!hasTag(item, "app")) {
    return item;
  }
  const covered = new Set(
    elementChildren(item)
      .filter((child) => hasTag(child, "rdg"))
      .flatMap((rdg) => parseWitnessRefs(getAttr(rdg, "wit"))),
  );
  const uncovered = extantWitnesses.filter((id) => !covered.has(id));
  if (uncovered.length === 0) {
    return item;
  }
  const omission = createElement("rdg", { wit: formatWitnessRefs(uncovered) });
  const children = uncovered.includes(lemmaId) ? [omission, ...item.children] : [...item.children, omission];
  return withChildren(item, children);
}

function lemmaReading(app: XmlElement, lemmaId: string): XmlElement {
  const reading = elementChildren(app).find(
    (child) => hasTag(child, "rdg") && parseWitnessRefs(getAttr(child, "wit")).includes(lemmaId),
  );
  if (!reading) {
    throw structuralViolation(`Aligned apparatus has no reading for the lemma witness ${lemmaId}.`, { lemmaId });
  }
  return reading;
}

function substantiveOf(segment: XmlElement): XmlElement | undefined {
  const type = getAttr(segment, "type");
  if (!type) {
    return undefined;
  }
  return elementChildren(segment).find((child) => child.tag === type || child.tag.endsWith(`:${type}`));
}

export class Collator {
  private readonly level: CollationLevel;
  private readonly ignoredAccents: ReadonlySet<AccentClass>;
  private readonly ignoredTags: ReadonlySet<string>;
  private readonly records: WitnessRecord[] = [];
  private lemma: { id: string; document: XmlElement } | null = null;

  constructor(options: CollatorOptions = {}) {
    const resolved = resolveNormalizerOptions({ ignoredAccents: options.ignoredAccents, ignoredTags: options.ignoredTags });
    if (resolved.ignoredTags.has("divGen")) {
      throw new ApparatusError(
        "CONFIGURATION_CONFLICT",
        '"divGen" cannot be ignored for collation: division markers delimit the collation units.',
        { tag: "divGen" },
      );
    }
    this.level = options.level ?? "verse";
    this.ignoredAccents = resolved.ignoredAccents;
    this.ignoredTags = resolved.ignoredTags;
  }

  get lemmaId(): string | null {
    return this.lemma?.id ?? null;
  }

  get witnessIds(): string[] {
    return this.records.map((record) => record.id);
  }

  witness(id: string): WitnessRecord | undefined {
    return this.records.find((record) => record.id === id);
  }

  /**
   * Registers a transcription. A transcription with typed readings (ketiv/qere)
   * yields one derived witness per reading type. The first witness read becomes the lemma.
   */
  readWitness(document: XmlElement): string[] {
    const siglum = witnessSiglum(document);
    const types = readingTypes(document);
    const variants: Array<string | null> = types.length === 0 ? [null] : types;
    const added: string[] = [];

    for (const readingType of variants) {
      const id = readingType === null ? siglum : `${siglum}-${readingType}`;
      if (this.witness(id)) {
        throw structuralViolation(`Witness ${id} has already been read.`, { id });
      }
      const formatted = normalizeDocument(document, {
        ignoredAccents: this.ignoredAccents,
        ignoredTags: this.ignoredTags,
        preferredReadingType: readingType,
      });
      const normalized = normalizeDocument(document, {
        ignoredAccents: ACCENT_CLASSES,
        ignoredTags: this.ignoredTags,
        preferredReadingType: readingType,
      });
      this.records.push({
        id,
        primaryId: siglum,
        readingType,
        tokensByUnit: tokenizeUnits(formatted, normalized, this.level),
      });
      added.push(id);
    }

    if (this.lemma === null) {
      this.lemma = {
        id: added[0] ?? siglum,
        document: normalizeDocument(document, { preferredReadingType: types[0] ?? null }),
      };
    }
    return added;
  }

  private requireLemma(): { id: string; document: XmlElement } {
    if (this.lemma === null) {
      throw structuralViolation("No lemma witness has been read.");
    }
    return this.lemma;
  }

  /** Aligns every lemma unit across the witnesses extant at it. */
  async collate(engine: AlignmentEngine): Promise<CollationUnit[]> {
    const lemma = this.requireLemma();
    const units: CollationUnit[] = [];
    const seen = new Set<string>();

    for (const marker of requireBody(lemma.document).children) {
      if (!isUnitMarker(marker, this.level)) {
        continue;
      }
      const n = getAttr(marker, "n") ?? "";
      if (seen.has(n)) {
        continue;
      }
      seen.add(n);

      const extant = this.records.filter((record) => record.tokensByUnit.has(n));
      const output = await engine.align({
        witnesses: extant.map((record) => ({ id: record.id, tokens: record.tokensByUnit.get(n) ?? [] })),
      });
      const witnesses = extant.map((record) => record.id);
      units.push({
        n,
        witnesses,
        items: parseAlignmentOutput(output).map((item) => addOmissionReading(item, witnesses, lemma.id)),
      });
    }
    return units;
  }

  /**
   * Places the aligned apparatus entries into the lemma text. Each plain item
   * stands for one lemma segment; each `<app/>` takes as many segments as its
   * lemma-witness reading has elements and wraps them in its `<lem/>`.
   */
  augmentLemma(units: CollationUnit[]): XmlElement {
    const lemma = this.requireLemma();
    const unitsByN = new Map(units.map((unit) => [unit.n, unit]));
    const segments = segmentBody(requireBody(lemma.document).children, this.ignoredTags);
    const out: XmlNode[] = [];
    let pending: XmlNode[] = [];

    const flushPending = (): void => {
      for (const item of pending) {
        if (hasTag(item, "app")) {
          out.push(withChildren(item, [createElement("lem"), ...item.children]));
        }
      }
      pending = [];
    };

    let i = 0;
    while (i < segments.length) {
      const segment = segments[i];
      const substantive = substantiveOf(segment);
      if (substantive && isUnitMarker(substantive, this.level)) {
        flushPending();
        pending = [...(unitsByN.get(getAttr(substantive, "n") ?? "")?.items ?? [])];
        out.push(...segment.children);
        i += 1;
        continue;
      }

      const isContent = substantive !== undefined && !isDivisionMarker(substantive);
      const item = isContent ? pending.shift() : undefined;
      if (item === undefined || !isElement(item) || !hasTag(item, "app")) {
        out.push(...segment.children);
        i += 1;
        continue;
      }

      const span = elementChildren(lemmaReading(item, lemma.id)).length;
      const lem: XmlNode[] = [];
      let consumed = 0;
      while (consumed < span && i < segments.length) {
        const next = segments[i];
        const nextSubstantive = substantiveOf(next);
        if (nextSubstantive && isDivisionMarker(nextSubstantive)) {
          break;
        }
        lem.push(...next.children);
        if (nextSubstantive) {
          consumed += 1;
        }
        i += 1;
      }
      out.push(withChildren(item, [createElement("lem", {}, lem), ...item.children]));
    }
    flushPending();

    return replaceBody(this.withWitnessList(lemma.document), out);
  }

  private withWitnessList(document: XmlElement): XmlElement {
    const sourceDesc = requireFirst(document, "sourceDesc", "Lemma transcription");
    const listWit = createElement(
      "listWit",
      {},
      this.records.map((record) => createElement("witness", { "xml:id": record.id })),
    );
    const children = [...sourceDesc.children.filter((child) => !hasTag(child, "listWit")), listWit];
    return replaceElement(document, sourceDesc, withChildren(sourceDesc, children));
  }
}
