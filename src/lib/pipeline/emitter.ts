/**
 * Record emitter: turns packed paragraphs plus record metadata into output records
 */

import { v5 as uuidv5 } from "uuid";

import type { ChunkOptions, OutputRecord, RecordMetadata } from "../../types.js";
import { chunkParagraphs, splitParagraphs } from "../parser/chunker.js";
import { extractMetadata } from "../parser/metadata.js";
import { normalizeText } from "../parser/normalizer.js";
import { readRecordFields } from "../parser/record-fields.js";
import { logger } from "../utils/logger.js";
import { takeChars } from "../utils/text.js";

/** Characters of chunk text that feed the identifier */
export const ID_TEXT_PREFIX = 120;

/**
 * Join a chunk's paragraphs with blank lines
 */
export function chunkText(paragraphs: readonly string[]): string {
  return paragraphs.join("\n\n").trim();
}

/**
 * Deterministic UUIDv5 (URL namespace) over breadcrumb, chunk index and text prefix
 *
 * The name is hashed as UTF-8 bytes; lone surrogates encode as U+FFFD.
 */
export function chunkId(breadcrumb: string, index: number, text: string): string {
  const name = `${breadcrumb}::${index}::${takeChars(text, ID_TEXT_PREFIX)}`;
  return uuidv5(Buffer.from(name, "utf8"), uuidv5.URL);
}

export function emitRecord(
  paragraphs: readonly string[],
  index: number,
  metadata: RecordMetadata,
  sourceName: string
): OutputRecord {
  const text = chunkText(paragraphs);

  return {
    id: chunkId(metadata.breadcrumb, index, text),
    source: sourceName,
    section: metadata.section,
    breadcrumb: metadata.breadcrumb,
    page_start: metadata.pageStart,
    page_end: metadata.pageEnd,
    side_labels: [...metadata.sideLabels],
    refs: [...metadata.years],
    text,
    highlighted_text: text,
  };
}

/**
 * Run one parsed input record through normalization, metadata extraction,
 * paragraph chunking and emission
 */
export function* recordToChunks(
  record: Record<string, unknown>,
  options: ChunkOptions
): Generator<OutputRecord> {
  const fields = readRecordFields(record);
  const text = normalizeText(fields.text);
  const metadata = extractMetadata(fields, text);
  const chunks = chunkParagraphs(splitParagraphs(text), options.maxChars);

  logger.logChunking(metadata.breadcrumb, chunks.length, {
    max_chars: options.maxChars,
  });

  for (const [index, paragraphs] of chunks.entries()) {
    yield emitRecord(paragraphs, index, metadata, options.sourceName);
  }
}
