import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  loadCollatexConfig,
  loadNormalizationProfile,
  parseNormalizationProfile,
  resolveProjectRoot,
} from "./config.js";

const dirs: string[] = [];

function projectWith(profile?: string): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "apparatus-config-"));
  dirs.push(root);
  if (profile !== undefined) {
    fs.mkdirSync(path.join(root, "config"));
    fs.writeFileSync(path.join(root, "config", "normalization.json"), profile, "utf8");
  }
  return root;
}

afterEach(() => {
  for (const dir of dirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("project root", () => {
  it("climbs out of the cli workspace", () => {
    const root = path.join(os.tmpdir(), "project");
    expect(resolveProjectRoot(path.join(root, "apps", "cli"))).toBe(root);
    expect(resolveProjectRoot(root)).toBe(root);
  });
});

describe("normalization profile", () => {
  it("defaults every setting", () => {
    expect(parseNormalizationProfile({})).toEqual({
      ignoredAccents: [],
      ignoredPunctuation: [],
      ignoredTags: [],
      collationLevel: "verse",
    });
  });

  it("loads the project's profile", () => {
    const root = projectWith('{"ignoredAccents":["pointing"],"ignoredPunctuation":["U+05C3"],"collationLevel":"chapter"}');
    expect(loadNormalizationProfile(root)).toEqual({
      ignoredAccents: ["pointing"],
      ignoredPunctuation: ["U+05C3"],
      ignoredTags: [],
      collationLevel: "chapter",
    });
  });

  it("uses the defaults when the project has no profile", () => {
    expect(loadNormalizationProfile(projectWith()).collationLevel).toBe("verse");
  });

  it("rejects malformed and invalid profiles", () => {
    expect(() => loadNormalizationProfile(projectWith("{"))).toThrowError(/Cannot read/);
    expect(() => loadNormalizationProfile(projectWith('{"ignoredAccents":["vowels"]}'))).toThrowError(
      "Invalid normalization profile.",
    );
    expect(() => parseNormalizationProfile({ ignoredPunctuation: ["not-hex"] })).toThrowError(
      "Invalid normalization profile.",
    );
  });
});

describe("CollateX settings", () => {
  it("defaults to a local server", () => {
    expect(loadCollatexConfig({})).toEqual({ url: "http://localhost:7369", timeoutMs: 60_000 });
  });

  it("reads the environment", () => {
    expect(loadCollatexConfig({ COLLATEX_URL: "http://collatex.test:8080//", COLLATEX_TIMEOUT_MS: "5000" })).toEqual({
      url: "http://collatex.test:8080",
      timeoutMs: 5000,
    });
  });

  it("rejects a timeout that is not a positive integer", () => {
    expect(() => loadCollatexConfig({ COLLATEX_TIMEOUT_MS: "soon" })).toThrowError("Invalid CollateX configuration.");
  });
});
