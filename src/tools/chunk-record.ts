/**
 * MCP Tool: chunk_record
 * Run a single extraction record through the pipeline and return its chunks
 */

import type { ErrorPayload, OutputRecord } from "../types.js";
import { getConfig } from "../config.js";
import { isPlainRecord } from "../lib/pipeline/driver.js";
import { recordToChunks } from "../lib/pipeline/emitter.js";
import { invalidInputError, internalError, malformedRecordError } from "../lib/utils/errors.js";
import { logger } from "../lib/utils/logger.js";

interface ChunkRecordInput {
  record: unknown;
  max_chars?: number;
  source?: string;
}

/**
 * Chunk one record
 *
 * @param args - The record plus optional chunk size and source label
 * @returns Output records in document order, or an error payload
 */
export function chunkRecord(args: ChunkRecordInput): OutputRecord[] | ErrorPayload {
  try {
    const { record } = args;
    if (!isPlainRecord(record)) {
      return malformedRecordError("record must be a JSON object", {
        received: Array.isArray(record) ? "array" : typeof record,
      });
    }

    const config = getConfig();
    const maxChars = args.max_chars ?? config.maxChars;
    if (!Number.isInteger(maxChars) || maxChars <= 0) {
      return invalidInputError("max_chars", maxChars, "must be a positive integer");
    }

    logger.logToolInvocation("chunk_record", { max_chars: maxChars, source: args.source });

    return [
      ...recordToChunks(record, {
        maxChars,
        sourceName: args.source || config.sourceName,
      }),
    ];
  } catch (error) {
    logger.error("Error in chunk_record", {
      error: error instanceof Error ? error.message : String(error),
    });
    return internalError("Failed to chunk record", {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
