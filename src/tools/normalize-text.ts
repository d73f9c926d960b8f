/**
 * MCP Tool: normalize_text
 * Clean a raw extracted string the same way the pipeline does
 */

import type { ErrorPayload } from "../types.js";
import { normalizeText } from "../lib/parser/normalizer.js";
import { invalidInputError, internalError } from "../lib/utils/errors.js";
import { logger } from "../lib/utils/logger.js";

interface NormalizeTextInput {
  text: string;
}

export interface NormalizeTextResult {
  text: string;
}

export function normalizeTextTool(args: NormalizeTextInput): NormalizeTextResult | ErrorPayload {
  try {
    if (typeof args.text !== "string") {
      return invalidInputError("text", args.text, "must be a string");
    }

    logger.logToolInvocation("normalize_text", { length: args.text.length });

    return { text: normalizeText(args.text) };
  } catch (error) {
    logger.error("Error in normalize_text", {
      error: error instanceof Error ? error.message : String(error),
    });
    return internalError("Failed to normalize text", {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
