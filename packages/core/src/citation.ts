/** Citation abbreviation of each division level. */
export const DIVISION_ABBREVIATIONS: ReadonlyMap<string, string> = new Map([
  ["book", "B"],
  ["incipit", "incipit"],
  ["explicit", "explicit"],
  ["chapter", "K"],
  ["verse", "V"],
  ["w", "U"],
]);

export const WORD_LEVEL = "w";

/** Words are numbered in steps of two so later insertions can take the odd positions. */
export const WORD_STEP = 2;

/** Levels that take the chapter's place in the hierarchy while they are active. */
const CHAPTER_SLOT: ReadonlySet<string> = new Set(["chapter", "incipit", "explicit"]);
const FRAME_LEVELS: ReadonlySet<string> = new Set(["incipit", "explicit"]);

export interface CitationContext {
  /** Active levels, top-down. */
  readonly hierarchy: readonly string[];
  readonly indices: ReadonlyMap<string, string>;
}

export const EMPTY_CITATION_CONTEXT: CitationContext = { hierarchy: [], indices: new Map() };

/**
 * A division's own index. `n` values may embed their ancestors (`B04K21V2`
 * for a verse); only the component after the level's abbreviation is kept.
 * Frame divisions have no index.
 */
export function ownDivisionIndex(type: string, n: string): string {
  if (FRAME_LEVELS.has(type)) {
    return "";
  }
  const abbreviation = DIVISION_ABBREVIATIONS.get(type);
  if (abbreviation === undefined) {
    return n;
  }
  const idx = n.indexOf(abbreviation);
  return idx === -1 ? n : n.slice(idx + abbreviation.length);
}

function insertLevel(hierarchy: string[], level: string): void {
  const wordIdx = hierarchy.indexOf(WORD_LEVEL);
  if (wordIdx === -1) {
    hierarchy.push(level);
  } else {
    hierarchy.splice(wordIdx, 0, level);
  }
}

export function enterDivision(context: CitationContext, type: string, n: string): CitationContext {
  if (!DIVISION_ABBREVIATIONS.has(type) || type === WORD_LEVEL) {
    return context;
  }
  const hierarchy = [...context.hierarchy];
  if (CHAPTER_SLOT.has(type)) {
    const slot = hierarchy.findIndex((level) => CHAPTER_SLOT.has(level));
    if (slot === -1) {
      insertLevel(hierarchy, type);
    } else {
      hierarchy[slot] = type;
    }
  } else if (!hierarchy.includes(type)) {
    insertLevel(hierarchy, type);
  }

  const indices = new Map(context.indices);
  indices.set(type, ownDivisionIndex(type, n));
  for (const lower of hierarchy.slice(hierarchy.indexOf(type) + 1)) {
    indices.set(lower, "0");
  }
  return { hierarchy, indices };
}

export function ensureWordLevel(context: CitationContext): CitationContext {
  if (context.indices.has(WORD_LEVEL)) {
    return context;
  }
  return {
    hierarchy: [...context.hierarchy, WORD_LEVEL],
    indices: new Map(context.indices).set(WORD_LEVEL, "0"),
  };
}

export function offsetWord(context: CitationContext, by: number): CitationContext {
  const ensured = ensureWordLevel(context);
  const current = Number.parseInt(ensured.indices.get(WORD_LEVEL) ?? "0", 10);
  return {
    hierarchy: ensured.hierarchy,
    indices: new Map(ensured.indices).set(WORD_LEVEL, String(current + by)),
  };
}

export function advanceWord(context: CitationContext): CitationContext {
  return offsetWord(context, WORD_STEP);
}

export function sameIndices(a: CitationContext, b: CitationContext): boolean {
  const levels = new Set([...a.indices.keys(), ...b.indices.keys()]);
  for (const level of levels) {
    if (a.indices.get(level) !== b.indices.get(level)) {
      return false;
    }
  }
  return true;
}

/** Citation of `context` over `hierarchy`, from level `from` down. The verse is left out inside a frame division. */
export function formatCitation(
  context: CitationContext,
  hierarchy: readonly string[] = context.hierarchy,
  from = 0,
): string {
  const inFrame = hierarchy.some((level) => FRAME_LEVELS.has(level));
  return hierarchy
    .slice(from)
    .filter((level) => !(inFrame && level === "verse"))
    .map((level) => `${DIVISION_ABBREVIATIONS.get(level) ?? level}${context.indices.get(level) ?? ""}`)
    .join("");
}

/**
 * Label of a span whose lemma starts at `start` and leaves the indices at `end`.
 * `hasWords` tells whether any reading of the span contains a word.
 */
export function citationLabel(start: CitationContext, end: CitationContext, hasWords: boolean): string {
  const hierarchy = end.hierarchy;
  if (sameIndices(start, end)) {
    return formatCitation(hasWords ? offsetWord(start, 1) : start);
  }
  const first = offsetWord(start, WORD_STEP);
  if (sameIndices(first, end)) {
    return formatCitation(first);
  }
  const differing = Math.max(
    0,
    hierarchy.findIndex((level) => first.indices.get(level) !== end.indices.get(level)),
  );
  return `${formatCitation(first)}-${formatCitation(end, hierarchy, differing)}`;
}
