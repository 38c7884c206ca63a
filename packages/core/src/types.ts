export type XmlNode = XmlElement | string;

export interface XmlElement {
  tag: string;
  attrs: Record<string, string>;
  children: XmlNode[];
}

export type AccentClass = "cantillation" | "pointing" | "extraordinaire";

export const ACCENT_CLASSES: readonly AccentClass[] = ["cantillation", "pointing", "extraordinaire"];

export type DivisionType = "book" | "chapter" | "verse" | "incipit" | "explicit";

export type CollationLevel = "book" | "chapter" | "verse";

export type ReadingType = "ketiv" | "qere" | (string & {});

export type ApparatusType = "vocalic" | "orthographic" | "transposition" | "addition" | "omission" | "substitution";

export interface NormalizerOptions {
  ignoredAccents?: Iterable<AccentClass>;
  /** Characters (not codepoints) whose `<pc>` elements are dropped. */
  ignoredPunctuation?: Iterable<string>;
  preferredReadingType?: ReadingType | null;
  ignoredTags?: Iterable<string>;
}

export interface Token {
  /** Formatted form: canonical serialization of the element. */
  t: string;
  /** Normalized form: diacritic-free text, or the local tag name. */
  n: string;
}

export type TokensByUnit = Map<string, Token[]>;

export interface WitnessRecord {
  id: string;
  /** Primary siglum this witness was derived from (equal to `id` unless it is a ketiv/qere derivation). */
  primaryId: string;
  readingType: ReadingType | null;
  tokensByUnit: TokensByUnit;
}

export interface ResegmentationIssue {
  appLabel: string;
  readingIndex: number;
  expected: number;
  actual: number;
  message: string;
}

export interface ResegmentationReport {
  valid: boolean;
  issues: ResegmentationIssue[];
}

export interface WordFinding {
  word: string;
  division: string;
}
