import { describe, expect, it } from "vitest";
import type { AlignmentEngine, AlignmentInput } from "./alignment.js";
import { Collator, addOmissionReading, readingTypes, witnessSiglum } from "./collator.js";
import { ApparatusError } from "./errors.js";
import type { XmlElement } from "./types.js";
import { findFirst, parseFragment, parseXml, requireBody, serializeXml } from "./xml.js";

function transcription(title: string, body: string): XmlElement {
  return parseXml(
    `<TEI><teiHeader><fileDesc><titleStmt><title>Test edition</title>${title}</titleStmt>` +
      `<sourceDesc><p>src</p></sourceDesc></fileDesc></teiHeader><text><body>${body}</body></text></TEI>`,
  );
}

function words(...texts: string[]): string {
  return texts.map((text) => `<w>${text}</w>`).join("");
}

/** Answers each unit with the next scripted output and records what it was asked. */
class ScriptedEngine implements AlignmentEngine {
  readonly inputs: AlignmentInput[] = [];

  constructor(private readonly outputs: string[]) {}

  async align(input: AlignmentInput): Promise<string> {
    this.inputs.push(input);
    return this.outputs.shift() ?? "<apparatus/>";
  }
}

function escaped(markup: string): string {
  return markup.replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

const LEMMA = transcription('<title n="A">Codex A</title>', `<div type="book" n="B01"><ab n="V1">${words("W1", "W2", "W3")}</ab></div>`);
const WITNESS_B = transcription("<title>B</title>", `<div type="book" n="B01"><ab n="V1">${words("W1", "X", "W3")}</ab></div>`);
const SUBSTITUTION_OUTPUT =
  `<apparatus>${escaped("<w>W1</w>")}<app><rdg wit="#A">${escaped("<w>W2</w>")}</rdg>` +
  `<rdg wit="#B">${escaped("<w>X</w>")}</rdg></app>${escaped("<w>W3</w>")}</apparatus>`;

function bodyOf(document: XmlElement): string {
  return serializeXml(requireBody(document));
}

describe("witness metadata", () => {
  it("reads the siglum from the second title", () => {
    expect(witnessSiglum(LEMMA)).toBe("A");
    expect(witnessSiglum(WITNESS_B)).toBe("B");
    expect(() => witnessSiglum(transcription("", ""))).toThrowError(ApparatusError);
  });

  it("lists reading types in document order", () => {
    const doc = transcription(
      "<title>C</title>",
      '<app><rdg type="ketiv"><w>K</w></rdg><rdg type="qere"><w>Q</w></rdg></app><app><rdg type="ketiv"/></app>',
    );
    expect(readingTypes(doc)).toEqual(["ketiv", "qere"]);
  });
});

describe("omission coverage", () => {
  const app = parseFragment('<app><rdg wit="#B"><w>X</w></rdg></app>')[0] ?? "";

  it("puts uncovered witnesses first when the lemma is among them", () => {
    expect(serializeXml(addOmissionReading(app, ["A", "B", "C"], "A"))).toBe(
      '<app><rdg wit="#A #C"/><rdg wit="#B"><w>X</w></rdg></app>',
    );
  });

  it("puts them last otherwise", () => {
    expect(serializeXml(addOmissionReading(app, ["A", "B", "C"], "B"))).toBe(
      '<app><rdg wit="#B"><w>X</w></rdg><rdg wit="#A #C"/></app>',
    );
  });

  it("leaves complete apparatus and plain tokens alone", () => {
    expect(addOmissionReading(app, ["B"], "B")).toBe(app);
    const token = parseFragment("<w>A</w>")[0] ?? "";
    expect(addOmissionReading(token, ["A", "B"], "A")).toBe(token);
  });
});

describe("Collator", () => {
  it("refuses to ignore division markers", () => {
    expect(() => new Collator({ ignoredTags: ["divGen"] })).toThrowError(/cannot be ignored for collation/);
  });

  it("derives one witness per reading type and makes the first the lemma", () => {
    const collator = new Collator();
    const doc = transcription(
      '<title n="C">Codex C</title>',
      `<ab n="V1"><w>W1</w><app><rdg type="ketiv"><w>K</w></rdg><rdg type="qere"><w>Q</w></rdg></app></ab>`,
    );
    expect(collator.readWitness(doc)).toEqual(["C-ketiv", "C-qere"]);
    expect(collator.lemmaId).toBe("C-ketiv");
    expect(collator.witness("C-qere")?.primaryId).toBe("C");
    expect(collator.witness("C-qere")?.tokensByUnit.get("V1")?.map((token) => token.n)).toEqual(["W1", "Q"]);
    expect(collator.witness("C-ketiv")?.tokensByUnit.get("V1")?.map((token) => token.n)).toEqual(["W1", "K"]);
  });

  it("rejects a witness read twice", () => {
    const collator = new Collator();
    collator.readWitness(LEMMA);
    expect(() => collator.readWitness(LEMMA)).toThrowError(/already been read/);
  });

  it("keeps formatted accents in tokens and strips them from normalized forms", () => {
    const collator = new Collator({ ignoredAccents: ["cantillation"] });
    collator.readWitness(transcription("<title>A</title>", '<ab n="V1"><w>בָ֑</w></ab>'));
    expect(collator.witness("A")?.tokensByUnit.get("V1")).toEqual([{ t: "<w>בָ</w>", n: "ב" }]);
  });

  it("sends each unit's tokens to the engine", async () => {
    const collator = new Collator();
    collator.readWitness(LEMMA);
    collator.readWitness(WITNESS_B);
    const engine = new ScriptedEngine([SUBSTITUTION_OUTPUT]);
    const units = await collator.collate(engine);

    expect(engine.inputs).toHaveLength(1);
    expect(engine.inputs[0]?.witnesses.map((witness) => witness.id)).toEqual(["A", "B"]);
    expect(engine.inputs[0]?.witnesses[1]?.tokens).toEqual([
      { t: "<w>W1</w>", n: "W1" },
      { t: "<w>X</w>", n: "X" },
      { t: "<w>W3</w>", n: "W3" },
    ]);
    expect(units.map((unit) => [unit.n, unit.witnesses])).toEqual([["V1", ["A", "B"]]]);
    expect(units[0]?.items.map((item) => serializeXml(item))).toEqual([
      "<w>W1</w>",
      '<app><rdg wit="#A"><w>W2</w></rdg><rdg wit="#B"><w>X</w></rdg></app>',
      "<w>W3</w>",
    ]);
  });

  it("aligns only the witnesses extant at a unit", async () => {
    const collator = new Collator();
    collator.readWitness(transcription("<title>A</title>", `<ab n="V1">${words("W1")}</ab><ab n="V2">${words("W2")}</ab>`));
    collator.readWitness(transcription("<title>B</title>", `<ab n="V2">${words("W2")}</ab>`));
    const engine = new ScriptedEngine([]);
    await collator.collate(engine);
    expect(engine.inputs.map((input) => input.witnesses.map((witness) => witness.id))).toEqual([["A"], ["A", "B"]]);
  });

  it("adds omission readings to the aligned apparatus", async () => {
    const collator = new Collator();
    collator.readWitness(LEMMA);
    collator.readWitness(WITNESS_B);
    const units = await collator.collate(
      new ScriptedEngine([`<apparatus><app><rdg wit="#A">${escaped("<w>W2</w>")}</rdg></app></apparatus>`]),
    );
    expect(units[0]?.items.map((item) => serializeXml(item))).toEqual([
      '<app><rdg wit="#A"><w>W2</w></rdg><rdg wit="#B"/></app>',
    ]);
  });

  it("places the apparatus into the lemma text and lists the witnesses", async () => {
    const collator = new Collator();
    collator.readWitness(LEMMA);
    collator.readWitness(WITNESS_B);
    const document = collator.augmentLemma(await collator.collate(new ScriptedEngine([SUBSTITUTION_OUTPUT])));

    expect(bodyOf(document)).toBe(
      '<body><divGen type="book" n="B01"/><divGen type="verse" n="V1"/><w>W1</w>' +
        '<app><lem><w>W2</w></lem><rdg wit="#A"><w>W2</w></rdg><rdg wit="#B"><w>X</w></rdg></app><w>W3</w></body>',
    );
    const sourceDesc = findFirst(document, "sourceDesc");
    expect(sourceDesc && serializeXml(sourceDesc)).toBe(
      '<sourceDesc><p>src</p><listWit><witness xml:id="A"/><witness xml:id="B"/></listWit></sourceDesc>',
    );
  });

  it("gives a lemma spanning several words all of their segments", async () => {
    const collator = new Collator();
    collator.readWitness(LEMMA);
    collator.readWitness(WITNESS_B);
    const output =
      `<apparatus><app><rdg wit="#A">${escaped("<w>W1</w><w>W2</w>")}</rdg>` +
      `<rdg wit="#B">${escaped("<w>W1</w><w>X</w>")}</rdg></app>${escaped("<w>W3</w>")}</apparatus>`;
    const document = collator.augmentLemma(await collator.collate(new ScriptedEngine([output])));
    expect(bodyOf(document)).toContain("<app><lem><w>W1</w><w>W2</w></lem>");
    expect(bodyOf(document)).toContain("</app><w>W3</w></body>");
  });

  it("emits additions with an empty lemma without consuming lemma text", async () => {
    const collator = new Collator();
    collator.readWitness(LEMMA);
    collator.readWitness(WITNESS_B);
    const output =
      `<apparatus>${escaped("<w>W1</w>")}<app><rdg wit="#A"/><rdg wit="#B">${escaped("<w>Y</w>")}</rdg></app>` +
      `${escaped("<w>W2</w><w>W3</w>")}<app><rdg wit="#A"/><rdg wit="#B">${escaped("<w>Z</w>")}</rdg></app></apparatus>`;
    const document = collator.augmentLemma(await collator.collate(new ScriptedEngine([output])));
    expect(bodyOf(document)).toBe(
      '<body><divGen type="book" n="B01"/><divGen type="verse" n="V1"/><w>W1</w>' +
        '<app><lem/><rdg wit="#A"/><rdg wit="#B"><w>Y</w></rdg></app><w>W2</w><w>W3</w>' +
        '<app><lem/><rdg wit="#A"/><rdg wit="#B"><w>Z</w></rdg></app></body>',
    );
  });

  it("requires a sourceDesc on the lemma", () => {
    const collator = new Collator();
    collator.readWitness(parseXml('<TEI><teiHeader><title/><title n="A"/></teiHeader><text><body/></text></TEI>'));
    expect(() => collator.augmentLemma([])).toThrowError(/has no <sourceDesc\/> element/);
  });
});
