import type { AlignmentEngine } from "./alignment.js";
import { type CollationUnit, Collator, type CollatorOptions } from "./collator.js";
import { updateBoundaries, validateResegmentation } from "./collation-editor.js";
import { ResegmentationError } from "./errors.js";
import { labelDocument } from "./labeler.js";
import type { XmlElement } from "./types.js";

export interface CollationBundle {
  document: XmlElement;
  witnessIds: string[];
  lemmaId: string;
  units: CollationUnit[];
}

/** Reads the lemma then each witness, aligns every unit and places the apparatus into the lemma text. */
export async function collateTranscriptions(
  lemma: XmlElement,
  witnesses: XmlElement[],
  engine: AlignmentEngine,
  options: CollatorOptions = {},
): Promise<CollationBundle> {
  const collator = new Collator(options);
  const [lemmaId = ""] = collator.readWitness(lemma);
  for (const witness of witnesses) {
    collator.readWitness(witness);
  }
  const units = await collator.collate(engine);
  return {
    document: collator.augmentLemma(units),
    witnessIds: collator.witnessIds,
    lemmaId,
    units,
  };
}

/** Validates the editor's segment markers, rebuilds the apparatus at those boundaries and labels it. */
export function finalizeCollation(document: XmlElement): XmlElement {
  const report = validateResegmentation(document);
  if (!report.valid) {
    throw new ResegmentationError(report.issues);
  }
  return labelDocument(updateBoundaries(document));
}
