export * from "./types.js";
export * from "./errors.js";
export * from "./xml.js";
export * from "./unicode.js";
export * from "./normalizer.js";
export * from "./segmenter.js";
export * from "./tokens.js";
export * from "./alignment.js";
export * from "./collator.js";
export * from "./collation-editor.js";
export * from "./citation.js";
export * from "./labeler.js";
export * from "./diagnostics.js";
export * from "./workflow.js";
