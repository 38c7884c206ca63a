import { describe, expect, it } from "vitest";
import { ApparatusError } from "./errors.js";
import {
  appendText,
  createElement,
  findAll,
  getXmlId,
  parseFragment,
  parseXml,
  replaceBody,
  requireBody,
  serializeDocument,
  serializeXml,
  textContent,
  unescapeMarkup,
} from "./xml.js";

describe("xml model", () => {
  it("parses elements and attributes and drops formatting whitespace", () => {
    const root = parseXml('<?xml version="1.0"?>\n<TEI>\n  <text><body><w n="1">AB</w> <lb/></body></text>\n</TEI>');
    expect(root.tag).toBe("TEI");
    expect(requireBody(root).children).toEqual([
      { tag: "w", attrs: { n: "1" }, children: ["AB"] },
      { tag: "lb", attrs: {}, children: [] },
    ]);
  });

  it("keeps the spaces of mixed content", () => {
    expect(serializeXml(parseXml("<p>a <hi>b</hi> c</p>"))).toBe("<p>a <hi>b</hi> c</p>");
    expect(parseXml("<p>\n  <w>a</w>\n  x \n</p>").children).toEqual([{ tag: "w", attrs: {}, children: ["a"] }, "\n  x \n"]);
  });

  it("serializes compactly and self-closes empty elements", () => {
    expect(serializeXml(createElement("w", { n: "1" }, ["AB"]))).toBe('<w n="1">AB</w>');
    expect(serializeXml(createElement("lb"))).toBe("<lb/>");
    const source = '<app><lem><w>A</w></lem><rdg wit="#A"/></app>';
    expect(serializeXml(parseXml(source))).toBe(source);
  });

  it("rejects malformed markup as a structural violation", () => {
    expect(() => parseXml("<a><b></a>")).toThrowError(ApparatusError);
    try {
      parseXml("<a><b></a>");
    } catch (error) {
      expect(error instanceof ApparatusError && error.code).toBe("STRUCTURAL_VIOLATION");
    }
  });

  it("writes documents with an XML declaration that parse back", () => {
    const doc = parseXml("<TEI><text><body><w>A</w><w>B</w></body></text></TEI>");
    const out = serializeDocument(doc);
    expect(out.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<TEI>')).toBe(true);
    expect(parseXml(out)).toEqual(doc);
  });

  it("unescapes angle brackets and quotes", () => {
    expect(unescapeMarkup("&lt;w n=&quot;1&quot;&gt;A&lt;/w&gt;")).toBe('<w n="1">A</w>');
  });

  it("parses fragments with several top-level nodes", () => {
    expect(parseFragment("<w>A</w><w>B</w>").map((node) => serializeXml(node))).toEqual(["<w>A</w>", "<w>B</w>"]);
  });

  it("finds descendants in document order", () => {
    const root = parseXml('<a><w n="1"/><b><w n="2"/></b><w n="3"/></a>');
    expect(findAll(root, "w").map((w) => w.attrs.n)).toEqual(["1", "2", "3"]);
  });

  it("reads xml:id before id", () => {
    expect(getXmlId(createElement("witness", { "xml:id": "A", id: "B" }))).toBe("A");
    expect(getXmlId(createElement("witness", { id: "B" }))).toBe("B");
  });

  it("merges adjacent text and joins text content", () => {
    const nodes = [createElement("lb")];
    appendText(nodes, "A");
    appendText(nodes, "B");
    expect(nodes).toEqual([createElement("lb"), "AB"]);
    expect(textContent(parseXml("<w>A<hi>B</hi>C</w>"))).toBe("ABC");
  });

  it("replaces the body without touching the original document", () => {
    const doc = parseXml("<TEI><text><body><w>A</w></body></text></TEI>");
    const next = replaceBody(doc, [createElement("w", {}, ["B"])]);
    expect(serializeXml(next)).toBe("<TEI><text><body><w>B</w></body></text></TEI>");
    expect(serializeXml(doc)).toBe("<TEI><text><body><w>A</w></body></text></TEI>");
  });

  it("requires a text body", () => {
    expect(() => requireBody(parseXml("<TEI><teiHeader/></TEI>"))).toThrowError(/has no <text\/> element/);
  });
});
