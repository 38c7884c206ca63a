import { ACCENT_CLASSES, type AccentClass } from "./types.js";

export const HEBREW_LETTER_RE = /[\u05D0-\u05EA]/;
export const POINTING_RE = /[\u05B0-\u05BC\u05BF\u05C1\u05C2\u05C7]/;

const ALEF = "\u05D0";
const VAV = "\u05D5";
const YOD = "\u05D9";
const SHEVA = "\u05B0";
const HIRIQ = "\u05B4";
const TSERE = "\u05B5";
const SEGOL = "\u05B6";
const HOLAM = "\u05B9";
const QUBUTS = "\u05BB";
const DAGESH = "\u05BC";
export const HOLAM_HASER_FOR_VAV = "\u05BA";

// Meteg (U+05BD) is named as a point but behaves as an accent.
export const ACCENT_CLASS_PATTERNS: ReadonlyMap<AccentClass, RegExp> = new Map([
  ["cantillation", /[\u0591-\u05AF\u05BD\u200C-\u200D]/g],
  ["pointing", /[\u05B0-\u05BC\u05BF\u05C1-\u05C2\u05C7]/g],
  ["extraordinaire", /[\u05C4-\u05C5]/g],
]);

export function isHebrewLetter(ch: string): boolean {
  return HEBREW_LETTER_RE.test(ch);
}

export function isPoint(ch: string): boolean {
  return POINTING_RE.test(ch);
}

export function isAccentClass(value: string): value is AccentClass {
  return (ACCENT_CLASSES as readonly string[]).includes(value);
}

/** Decomposes, removes every character of the given accent classes, and recomposes. */
export function formatText(text: string, ignored: Iterable<AccentClass>): string {
  let out = text.normalize("NFKD");
  for (const accentClass of ignored) {
    const pattern = ACCENT_CLASS_PATTERNS.get(accentClass);
    if (pattern) {
      out = out.replace(pattern, "");
    }
  }
  return out.normalize("NFC");
}

export function stripAllAccents(text: string): string {
  return formatText(text, ACCENT_CLASSES);
}

interface PleneContext {
  clusters: string[];
  index: number;
  /** The previous cluster as it was before any rewrite in this pass. */
  previous: string;
}

/** Rewrites `context.clusters` in place when the rule applies; returns whether it did. */
type PleneRule = (context: PleneContext) => boolean;

function hasFrontVowel(cluster: string): boolean {
  return cluster.includes(HIRIQ) || cluster.includes(TSERE) || cluster.includes(SEGOL);
}

function addPoint(clusters: string[], index: number, point: string): void {
  clusters[index] = `${clusters[index] ?? ""}${point}`;
}

const dropLetter: PleneRule = ({ clusters, index }) => {
  clusters[index] = "";
  return true;
};

const dropAfterFrontVowel: PleneRule = ({ clusters, index, previous }) => {
  if (!hasFrontVowel(previous)) {
    return false;
  }
  clusters[index] = "";
  return true;
};

/**
 * Plene (full) spellings reduced to their defective equivalents, keyed by the
 * interior letter-with-points cluster they start from.
 */
export const PLENE_RULES: ReadonlyMap<string, PleneRule> = new Map<string, PleneRule>([
  [ALEF, dropLetter],
  [
    VAV,
    ({ clusters, index, previous }) => {
      // alef-vav digraph standing for holam, not at the start of the word
      const beforeAlef = clusters[index - 2];
      if (previous !== ALEF || beforeAlef === undefined) {
        return false;
      }
      clusters[index] = "";
      clusters[index - 1] = "";
      if (!beforeAlef.includes(HOLAM)) {
        addPoint(clusters, index - 2, HOLAM);
      }
      return true;
    },
  ],
  [
    `${VAV}${HOLAM}`,
    ({ clusters, index }) => {
      clusters[index] = "";
      addPoint(clusters, index - 1, HOLAM);
      return true;
    },
  ],
  [
    `${VAV}${DAGESH}`,
    ({ clusters, index }) => {
      clusters[index] = "";
      addPoint(clusters, index - 1, QUBUTS);
      return true;
    },
  ],
  [YOD, dropAfterFrontVowel],
  [`${YOD}${SHEVA}`, dropAfterFrontVowel],
]);

/** Splits decomposed text into letter-with-points clusters and single spaces. */
export function letterClusters(text: string): string[] {
  const clusters: string[] = [];
  let current = "";
  for (const ch of text.normalize("NFKD")) {
    if (ch !== " " && !isHebrewLetter(ch) && !isPoint(ch)) {
      continue;
    }
    if (ch === " " || isHebrewLetter(ch)) {
      if (current !== "") {
        clusters.push(current);
      }
      current = "";
    }
    current += ch;
  }
  if (current !== "") {
    clusters.push(current);
  }
  return clusters;
}

const MATRES_LECTIONIS: ReadonlySet<string> = new Set([VAV, YOD]);

function stripWordPlene(word: string): string {
  const original = letterClusters(word);
  const clusters = [...original];
  // without points there is nothing to key on, so every interior vav and yod is read as a vowel letter
  const pointed = POINTING_RE.test(word.normalize("NFKD"));
  for (let i = 1; i < original.length - 1; i += 1) {
    const cluster = original[i] ?? "";
    const rule = PLENE_RULES.get(cluster);
    const applied = rule ? rule({ clusters, index: i, previous: original[i - 1] ?? "" }) : false;
    if (!applied && !pointed && MATRES_LECTIONIS.has(cluster)) {
      clusters[i] = "";
    }
  }
  return clusters.join("").normalize("NFC");
}

/** Replaces interior plene letters with defective vocalization; first and last letters of a word are kept. */
export function stripPlene(text: string): string {
  return text.split(" ").map(stripWordPlene).join(" ");
}

export function isPointed(word: string): boolean {
  return stripAllAccents(word) !== word.normalize("NFC");
}
