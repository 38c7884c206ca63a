import type { Token, XmlNode } from "./types.js";
import { parseXml, unescapeMarkup } from "./xml.js";

export interface AlignmentWitness {
  id: string;
  tokens: Token[];
}

export interface AlignmentInput {
  witnesses: AlignmentWitness[];
}

/**
 * External multi-sequence aligner. Receives token lists keyed by witness and
 * answers with a TEI apparatus fragment whose `<rdg wit="#A #B">` readings hold
 * the formatted token markup.
 */
export interface AlignmentEngine {
  align(input: AlignmentInput): Promise<string>;
}

/** Parses engine output, whose token markup may come back entity-escaped, into the root's child nodes. */
export function parseAlignmentOutput(output: string): XmlNode[] {
  return parseXml(unescapeMarkup(output)).children;
}

export function parseWitnessRefs(wit: string | undefined): string[] {
  if (!wit) {
    return [];
  }
  return wit
    .split(/\s+/)
    .filter(Boolean)
    .map((ref) => (ref.startsWith("#") ? ref.slice(1) : ref));
}

export function formatWitnessRefs(witnessIds: string[]): string {
  return witnessIds.map((id) => `#${id}`).join(" ");
}
