import fs from "node:fs";
import path from "node:path";
import { type XmlElement, parseXml, serializeDocument } from "@hebrew-apparatus/core";

export function readDocument(file: string): XmlElement {
  return parseXml(fs.readFileSync(file, "utf8"));
}

export function writeDocument(file: string, document: XmlElement): void {
  fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
  fs.writeFileSync(file, serializeDocument(document), "utf8");
}

/** `text/gen1.xml` with suffix `_normalized` becomes `text/gen1_normalized.xml`. */
export function suffixedPath(file: string, suffix: string): string {
  const ext = path.extname(file);
  const base = ext === "" ? file : file.slice(0, -ext.length);
  return `${base}${suffix}${ext === "" ? ".xml" : ext}`;
}
