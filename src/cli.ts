#!/usr/bin/env node
/**
 * Command-line entry point: prepare a raw guideline JSONL file for embedding
 *
 * Usage:
 *   guideline-rag-prep --input raw.jsonl --output out/chunks.jsonl [--max-chars 1000]
 *                      [--source adhd_guideline] [--log-level info]
 */

import { run } from "./commands/prepare.js";
import { logger } from "./lib/utils/logger.js";

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error("Unhandled error in main", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
  });
