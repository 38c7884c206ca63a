import { describe, expect, it } from "vitest";
import { formatWitnessRefs, parseAlignmentOutput, parseWitnessRefs } from "./alignment.js";
import { serializeXml } from "./xml.js";

describe("alignment output", () => {
  it("unescapes token markup and returns the apparatus items", () => {
    const output =
      '<?xml version="1.0" ?>\n<cx:apparatus xmlns:cx="http://interedition.eu/collatex/ns/1.0" ' +
      'xmlns="http://www.tei-c.org/ns/1.0">&lt;w&gt;A&lt;/w&gt; <app><rdg wit="#A">&lt;w&gt;B&lt;/w&gt;</rdg>' +
      '<rdg wit="#B">&lt;w&gt;C&lt;/w&gt;</rdg></app></cx:apparatus>';
    expect(parseAlignmentOutput(output).map((node) => serializeXml(node))).toEqual([
      "<w>A</w>",
      '<app><rdg wit="#A"><w>B</w></rdg><rdg wit="#B"><w>C</w></rdg></app>',
    ]);
  });

  it("reads and writes witness reference lists", () => {
    expect(parseWitnessRefs("#A  #B-ketiv")).toEqual(["A", "B-ketiv"]);
    expect(parseWitnessRefs(undefined)).toEqual([]);
    expect(formatWitnessRefs(["A", "B"])).toBe("#A #B");
  });
});
