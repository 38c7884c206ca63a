import fs from "node:fs";
import path from "node:path";
import { ApparatusError } from "@hebrew-apparatus/core";
import { z } from "zod";

export function resolveProjectRoot(cwd: string = process.cwd()): string {
  const cliSuffix = `${path.sep}apps${path.sep}cli`;
  if (cwd.endsWith(cliSuffix)) {
    return path.resolve(cwd, "../..");
  }
  return cwd;
}

const normalizationProfileSchema = z.object({
  ignoredAccents: z.array(z.enum(["cantillation", "pointing", "extraordinaire"])).default([]),
  /** Hexadecimal codepoints, e.g. "05C0". */
  ignoredPunctuation: z.array(z.string().regex(/^(U\+|0x)?[0-9A-Fa-f]{1,6}$/)).default([]),
  ignoredTags: z.array(z.string().min(1)).default([]),
  collationLevel: z.enum(["book", "chapter", "verse"]).default("verse"),
});

export type NormalizationProfile = z.infer<typeof normalizationProfileSchema>;

export function parseNormalizationProfile(raw: unknown): NormalizationProfile {
  const parsed = normalizationProfileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ApparatusError("CONFIGURATION_CONFLICT", "Invalid normalization profile.", {
      issues: parsed.error.flatten(),
    });
  }
  return parsed.data;
}

export function loadNormalizationProfile(root: string = resolveProjectRoot()): NormalizationProfile {
  const file = path.join(root, "config", "normalization.json");
  if (!fs.existsSync(file)) {
    return parseNormalizationProfile({});
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (error) {
    throw new ApparatusError("CONFIGURATION_CONFLICT", `Cannot read ${file}.`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return parseNormalizationProfile(raw);
}

const collatexEnvSchema = z.object({
  COLLATEX_URL: z.string().url().default("http://localhost:7369"),
  COLLATEX_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
});

export interface CollatexConfig {
  url: string;
  timeoutMs: number;
}

export function loadCollatexConfig(env: NodeJS.ProcessEnv = process.env): CollatexConfig {
  const parsed = collatexEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ApparatusError("CONFIGURATION_CONFLICT", "Invalid CollateX configuration.", {
      issues: parsed.error.flatten(),
    });
  }
  return {
    url: parsed.data.COLLATEX_URL.replace(/\/+$/, ""),
    timeoutMs: parsed.data.COLLATEX_TIMEOUT_MS,
  };
}
