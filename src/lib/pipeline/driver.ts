/**
 * Pipeline driver: streams a JSON Lines file through the chunking pipeline
 */

import { mkdir, open } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { createInterface } from "node:readline";

import type { ChunkOptions, LineParseResult, PipelineStats } from "../../types.js";
import { DEFAULT_CONFIG } from "../../config.js";
import { logger } from "../utils/logger.js";
import { recordToChunks } from "./emitter.js";

/**
 * Parse one input line. Malformed lines come back as a skip, never a throw.
 */
export function parseLine(line: string): LineParseResult {
  const trimmed = line.trim();
  if (!trimmed) {
    return { status: "blank" };
  }

  let value: unknown;
  try {
    value = JSON.parse(trimmed);
  } catch (error) {
    return {
      status: "skip",
      reason: "invalid-json",
      error: error instanceof Error ? error.message : String(error),
    };
  }

  if (!isPlainRecord(value)) {
    return {
      status: "skip",
      reason: "not-an-object",
      error: `Expected a JSON object, got ${value === null ? "null" : Array.isArray(value) ? "array" : typeof value}`,
    };
  }

  return { status: "record", record: value };
}

/**
 * Whether a parsed JSON value is an object (not an array or null)
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Process one JSON Lines file into chunk records, one JSON object per line
 *
 * Filesystem errors reject; malformed lines are counted and skipped.
 */
export async function processJsonl(
  inputPath: string,
  outputPath: string,
  options: Partial<ChunkOptions> = {}
): Promise<PipelineStats> {
  const chunkOptions: ChunkOptions = {
    maxChars: options.maxChars ?? DEFAULT_CONFIG.maxChars,
    sourceName: options.sourceName ?? DEFAULT_CONFIG.sourceName,
  };
  const resolvedOutput = resolve(outputPath);

  await mkdir(dirname(resolvedOutput), { recursive: true });

  const input = await open(inputPath, "r");
  const stats: PipelineStats = {
    readItems: 0,
    skippedLines: 0,
    wroteChunks: 0,
    outputPath,
  };

  try {
    const output = await open(resolvedOutput, "w");
    try {
      const lines = createInterface({
        input: input.createReadStream({ encoding: "utf8", autoClose: false }),
        crlfDelay: Infinity,
      });

      let lineNumber = 0;
      for await (const line of lines) {
        lineNumber++;
        const parsed = parseLine(line);

        if (parsed.status === "blank") {
          continue;
        }
        if (parsed.status === "skip") {
          stats.skippedLines++;
          logger.logSkippedLine(lineNumber, parsed.reason, { error: parsed.error });
          continue;
        }

        stats.readItems++;
        let block = "";
        for (const chunk of recordToChunks(parsed.record, chunkOptions)) {
          block += `${JSON.stringify(chunk)}\n`;
          stats.wroteChunks++;
        }
        if (block) {
          await output.write(block, null, "utf8");
        }
      }
    } finally {
      await output.close();
    }
  } finally {
    await input.close();
  }

  logger.info("Pipeline finished", {
    input: inputPath,
    output: outputPath,
    read_items: stats.readItems,
    skipped_lines: stats.skippedLines,
    wrote_chunks: stats.wroteChunks,
  });

  return stats;
}

/**
 * Human-readable completion line
 */
export function formatSummary(stats: PipelineStats): string {
  const skipped = stats.skippedLines > 0 ? `, skipped_lines=${stats.skippedLines}` : "";
  return `Done. read_items=${stats.readItems}, wrote_chunks=${stats.wroteChunks}${skipped}, out=${stats.outputPath}`;
}
