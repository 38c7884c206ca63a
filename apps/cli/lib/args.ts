import {
  ApparatusError,
  type AccentClass,
  type CollationLevel,
  type NormalizerOptions,
  isAccentClass,
  parsePunctuationCodepoint,
} from "@hebrew-apparatus/core";
import type { NormalizationProfile } from "./config.js";

/** Value of the first `--name=value` argument. */
export function readFlag(argv: readonly string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = argv.find((a) => a.startsWith(prefix));
  return arg === undefined ? undefined : arg.slice(prefix.length);
}

/** Every non-empty value of a repeatable flag, in order. */
export function readFlags(argv: readonly string[], name: string): string[] {
  const prefix = `--${name}=`;
  return argv
    .filter((a) => a.startsWith(prefix))
    .map((a) => a.slice(prefix.length).trim())
    .filter(Boolean);
}

export function parseAccentClasses(values: readonly string[]): AccentClass[] {
  return values.map((value) => {
    if (!isAccentClass(value)) {
      throw new ApparatusError("CONFIGURATION_CONFLICT", `Unknown accent class "${value}".`, { value });
    }
    return value;
  });
}

const LEVELS: readonly CollationLevel[] = ["book", "chapter", "verse"];

export function parseCollationLevel(value: string): CollationLevel {
  const level = LEVELS.find((candidate) => candidate === value);
  if (level === undefined) {
    throw new ApparatusError("CONFIGURATION_CONFLICT", `Unknown collation level "${value}".`, { value });
  }
  return level;
}

export interface RunOptions {
  normalizer: NormalizerOptions;
  level: CollationLevel;
}

/** Flags given on the command line replace the profile's value for the same setting. */
export function resolveRunOptions(argv: readonly string[], profile: NormalizationProfile): RunOptions {
  const accents = readFlags(argv, "a");
  const punctuation = readFlags(argv, "p");
  const tags = readFlags(argv, "t");
  const level = readFlag(argv, "l");
  const readingType = readFlag(argv, "r");

  return {
    normalizer: {
      ignoredAccents: accents.length > 0 ? parseAccentClasses(accents) : profile.ignoredAccents,
      ignoredPunctuation: (punctuation.length > 0 ? punctuation : profile.ignoredPunctuation).map(
        parsePunctuationCodepoint,
      ),
      ignoredTags: tags.length > 0 ? tags : profile.ignoredTags,
      preferredReadingType: readingType !== undefined && readingType !== "" ? readingType : null,
    },
    level: level !== undefined ? parseCollationLevel(level) : profile.collationLevel,
  };
}
