/**
 * Parser module exports
 */

export { normalizeText, BULLET_GLYPHS } from "./normalizer.js";
export { readRecordFields, toSequence } from "./record-fields.js";
export {
  extractYears,
  extractRecordYears,
  collectReferenceYears,
  buildBreadcrumb,
  sectionString,
  extractMetadata,
} from "./metadata.js";
export { splitParagraphs, isBulletParagraph, chunkParagraphs, DEFAULT_MAX_CHARS } from "./chunker.js";
