import { ApparatusError, structuralViolation } from "./errors.js";
import { ACCENT_CLASSES, type AccentClass, type NormalizerOptions, type XmlElement, type XmlNode } from "./types.js";
import { formatText, isAccentClass } from "./unicode.js";
import { appendText, elementChildren, getAttr, localName, textContent } from "./xml.js";

/** Tags that carry the whole document; ignoring any of them would discard it. */
export const PROTECTED_TAGS: ReadonlySet<string> = new Set(["TEI", "text", "body"]);

/** Nested containers rewritten into flat `<divGen/>` division markers. */
export const DIVISION_CONTAINER_TAGS: ReadonlySet<string> = new Set(["div", "ab"]);

export interface ResolvedNormalizerOptions {
  ignoredAccents: ReadonlySet<AccentClass>;
  ignoredPunctuation: ReadonlySet<string>;
  preferredReadingType: string | null;
  ignoredTags: ReadonlySet<string>;
}

export interface Normalizer {
  readonly options: ResolvedNormalizerOptions;
  normalize(document: XmlElement): XmlElement;
  formatText(text: string): string;
}

/** Converts a hexadecimal codepoint such as `05C0` into its character. */
export function parsePunctuationCodepoint(hex: string): string {
  const trimmed = hex.trim().replace(/^(U\+|0x)/i, "");
  if (!/^[0-9A-Fa-f]{1,6}$/.test(trimmed)) {
    throw new ApparatusError("CONFIGURATION_CONFLICT", `Invalid punctuation codepoint: ${hex}`, { value: hex });
  }
  const codepoint = Number.parseInt(trimmed, 16);
  if (codepoint > 0x10ffff) {
    throw new ApparatusError("CONFIGURATION_CONFLICT", `Punctuation codepoint out of range: ${hex}`, { value: hex });
  }
  return String.fromCodePoint(codepoint);
}

export function resolveNormalizerOptions(options: NormalizerOptions = {}): ResolvedNormalizerOptions {
  const ignoredAccents = new Set<AccentClass>();
  for (const accentClass of options.ignoredAccents ?? []) {
    if (!isAccentClass(accentClass)) {
      throw new ApparatusError(
        "CONFIGURATION_CONFLICT",
        `Unknown accent class "${String(accentClass)}"; expected one of ${ACCENT_CLASSES.join(", ")}.`,
        { value: accentClass },
      );
    }
    ignoredAccents.add(accentClass);
  }

  const ignoredTags = new Set(options.ignoredTags ?? []);
  for (const tag of ignoredTags) {
    if (PROTECTED_TAGS.has(tag)) {
      throw new ApparatusError(
        "CONFIGURATION_CONFLICT",
        `"${tag}" cannot be an ignored element (the entire document would be ignored).`,
        { tag },
      );
    }
  }

  return {
    ignoredAccents,
    ignoredPunctuation: new Set(options.ignoredPunctuation ?? []),
    preferredReadingType: options.preferredReadingType ?? null,
    ignoredTags,
  };
}

function renameLocal(tag: string, local: string): string {
  const idx = tag.indexOf(":");
  return idx === -1 ? local : `${tag.slice(0, idx + 1)}${local}`;
}

function preferredReadingChildren(app: XmlElement, readingType: string): XmlNode[] {
  const rdg = elementChildren(app).find(
    (child) => localName(child.tag) === "rdg" && getAttr(child, "type") === readingType,
  );
  if (!rdg) {
    throw structuralViolation(`Apparatus has no <rdg type="${readingType}"/> to select.`, {
      readingType,
      readings: elementChildren(app).map((child) => getAttr(child, "type") ?? null),
    });
  }
  return rdg.children;
}

function pushAll(target: XmlNode[], nodes: XmlNode[]): void {
  for (const node of nodes) {
    if (typeof node === "string") {
      appendText(target, node);
    } else {
      target.push(node);
    }
  }
}

function isIgnoredPunctuation(element: XmlElement, options: ResolvedNormalizerOptions): boolean {
  return localName(element.tag) === "pc" && options.ignoredPunctuation.has(textContent(element));
}

function normalizeElement(element: XmlElement, options: ResolvedNormalizerOptions): XmlElement {
  const tag = localName(element.tag);
  const isContainer = DIVISION_CONTAINER_TAGS.has(tag);
  const attrs = tag === "ab" ? { type: "verse", ...element.attrs } : { ...element.attrs };
  const children: XmlNode[] = [];

  for (const child of element.children) {
    if (typeof child === "string") {
      appendText(children, formatText(child, options.ignoredAccents));
      continue;
    }
    // Dropped elements leave any following text in place, where it joins the preceding text.
    if (options.ignoredTags.has(localName(child.tag)) || isIgnoredPunctuation(child, options)) {
      continue;
    }

    const normalized = normalizeElement(child, options);
    const normalizedTag = localName(normalized.tag);
    if (normalizedTag === "app" && options.preferredReadingType !== null) {
      pushAll(children, preferredReadingChildren(normalized, options.preferredReadingType));
    } else if (normalizedTag === "divGen" && normalized.children.length > 0) {
      children.push({ ...normalized, children: [] });
      pushAll(children, normalized.children);
    } else {
      children.push(normalized);
    }
  }

  return {
    tag: isContainer ? renameLocal(element.tag, "divGen") : element.tag,
    attrs,
    children,
  };
}

export function createNormalizer(options: NormalizerOptions = {}): Normalizer {
  const resolved = resolveNormalizerOptions(options);
  return {
    options: resolved,
    normalize: (document) => normalizeElement(document, resolved),
    formatText: (text) => formatText(text, resolved.ignoredAccents),
  };
}

export function normalizeDocument(document: XmlElement, options: NormalizerOptions = {}): XmlElement {
  return createNormalizer(options).normalize(document);
}
