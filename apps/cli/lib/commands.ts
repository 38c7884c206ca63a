import {
  type AlignmentEngine,
  ApparatusError,
  ResegmentationError,
  type WordFinding,
  type XmlElement,
  collateTranscriptions,
  finalizeCollation,
  findInvalidHolam,
  findUnpointedWords,
  normalizeDocument,
} from "@hebrew-apparatus/core";
import { readFlag, readFlags, resolveRunOptions } from "./args.js";
import type { NormalizationProfile } from "./config.js";
import { readDocument, suffixedPath, writeDocument } from "./documents.js";

export interface CommandContext {
  profile: NormalizationProfile;
  log: (line: string) => void;
}

function requireFlag(argv: readonly string[], name: string, usage: string): string {
  const value = readFlag(argv, name);
  if (!value) {
    throw new Error(`--${name}=<path> is required. Usage: ${usage}`);
  }
  return value;
}

export function runNormalize(argv: readonly string[], ctx: CommandContext): string {
  const file = requireFlag(argv, "file", "normalize --file=input.xml [--a=] [--p=] [--r=] [--t=] [--out=]");
  const output = readFlag(argv, "out") ?? suffixedPath(file, "_normalized");
  const { normalizer } = resolveRunOptions(argv, ctx.profile);

  ctx.log(`Normalizing ${file}...`);
  writeDocument(output, normalizeDocument(readDocument(file), normalizer));
  ctx.log(`Wrote ${output}`);
  return output;
}

export async function runCollate(
  argv: readonly string[],
  ctx: CommandContext,
  engine: AlignmentEngine,
): Promise<string> {
  const usage = "collate --lemma=lemma.xml --witness=a.xml [--witness=b.xml] [--a=] [--t=] [--l=] [--out=]";
  const lemmaFile = requireFlag(argv, "lemma", usage);
  const witnessFiles = readFlags(argv, "witness");
  if (witnessFiles.length === 0) {
    throw new Error(`At least one --witness=<path> is required. Usage: ${usage}`);
  }
  const output = readFlag(argv, "out") ?? "collation.xml";
  const { normalizer, level } = resolveRunOptions(argv, ctx.profile);

  ctx.log(`Reading lemma ${lemmaFile} and ${witnessFiles.length} witness(es)...`);
  const lemma = readDocument(lemmaFile);
  const witnesses = witnessFiles.map(readDocument);

  ctx.log(`Collating at the ${level} level...`);
  const result = await collateTranscriptions(lemma, witnesses, engine, {
    level,
    ignoredAccents: normalizer.ignoredAccents,
    ignoredTags: normalizer.ignoredTags,
  });
  ctx.log(`Collated ${result.units.length} unit(s) across witnesses ${result.witnessIds.join(", ")}`);

  writeDocument(output, result.document);
  ctx.log(`Wrote ${output}`);
  return output;
}

export function runFinalize(argv: readonly string[], ctx: CommandContext): string {
  const file = requireFlag(argv, "file", "finalize --file=collation.xml [--out=]");
  const output = readFlag(argv, "out") ?? suffixedPath(file, "_finalized");

  ctx.log("Validating resegmentation...");
  const finalized = finalizeCollation(readDocument(file));
  ctx.log("Resegmentation is valid; boundaries updated and apparatus labeled.");
  writeDocument(output, finalized);
  ctx.log(`Wrote ${output}`);
  return output;
}

function runWordCheck(
  argv: readonly string[],
  ctx: CommandContext,
  command: string,
  check: (document: XmlElement) => WordFinding[],
  describe: (finding: WordFinding) => string,
): WordFinding[] {
  const file = requireFlag(argv, "file", `${command} --file=input.xml`);
  const findings = check(normalizeDocument(readDocument(file)));
  for (const finding of findings) {
    ctx.log(describe(finding));
  }
  ctx.log(`${findings.length} finding(s) in ${file}`);
  return findings;
}

export function runFindUnpointed(argv: readonly string[], ctx: CommandContext): WordFinding[] {
  return runWordCheck(
    argv,
    ctx,
    "check:unpointed",
    findUnpointedWords,
    (finding) => `Unpointed word ${finding.word} in div ${finding.division}`,
  );
}

export function runFindInvalidHolam(argv: readonly string[], ctx: CommandContext): WordFinding[] {
  return runWordCheck(
    argv,
    ctx,
    "check:holam",
    findInvalidHolam,
    (finding) => `Invalid holam haser found at word ${finding.word} in div ${finding.division}`,
  );
}

/** One line per failure; a resegmentation failure lists each disagreeing reading. */
export function formatError(error: unknown): string {
  if (error instanceof ResegmentationError) {
    return [`[${error.code}] ${error.message}`, ...error.issues.map((issue) => `  ${issue.message}`)].join("\n");
  }
  if (error instanceof ApparatusError) {
    return `[${error.code}] ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
