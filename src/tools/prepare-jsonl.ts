/**
 * MCP Tool: prepare_jsonl
 * Convert a JSON Lines extraction file into embedding-ready chunks on disk
 */

import type { ErrorPayload, PipelineStats } from "../types.js";
import { getConfig } from "../config.js";
import { formatSummary, processJsonl } from "../lib/pipeline/driver.js";
import { errorToPayload, fileError, invalidInputError, isSystemError } from "../lib/utils/errors.js";
import { logger } from "../lib/utils/logger.js";

interface PrepareJsonlInput {
  input_path: string;
  output_path: string;
  max_chars?: number;
  source?: string;
}

export interface PrepareJsonlResult extends PipelineStats {
  summary: string;
}

export async function prepareJsonl(
  args: PrepareJsonlInput
): Promise<PrepareJsonlResult | ErrorPayload> {
  if (!args.input_path) {
    return invalidInputError("input_path", args.input_path, "must be a non-empty string");
  }
  if (!args.output_path) {
    return invalidInputError("output_path", args.output_path, "must be a non-empty string");
  }

  const config = getConfig();
  const maxChars = args.max_chars ?? config.maxChars;
  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    return invalidInputError("max_chars", maxChars, "must be a positive integer");
  }

  logger.logToolInvocation("prepare_jsonl", args);

  try {
    const stats = await processJsonl(args.input_path, args.output_path, {
      maxChars,
      sourceName: args.source || config.sourceName,
    });
    return { ...stats, summary: formatSummary(stats) };
  } catch (error) {
    logger.error("Error in prepare_jsonl", {
      error: error instanceof Error ? error.message : String(error),
      args,
    });
    if (isSystemError(error)) {
      return fileError(error.path ?? args.input_path, error.syscall ?? "read", error.message);
    }
    return errorToPayload(error, { input_path: args.input_path, output_path: args.output_path });
  }
}
