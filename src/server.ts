/**
 * MCP server entry point exposing the chunking pipeline over stdio
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { ErrorCode as McpErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import * as z from "zod";
import { parseServerArgs } from "./commands/server-args.js";
import { initializeConfig } from "./config.js";
import { ErrorCode, isErrorPayload } from "./lib/utils/errors.js";
import { logger } from "./lib/utils/logger.js";
import type { ErrorPayload } from "./types.js";

// Tool handlers
import { normalizeTextTool, chunkRecord, prepareJsonl } from "./tools/index.js";

/**
 * Convert ErrorPayload to a throwable MCP error
 */
function throwMcpError(error: ErrorPayload): never {
  const codeMap: Record<string, McpErrorCode> = {
    [ErrorCode.INVALID_INPUT]: McpErrorCode.InvalidParams,
    [ErrorCode.MALFORMED_RECORD]: McpErrorCode.InvalidParams,
    [ErrorCode.FILE_ERROR]: McpErrorCode.InternalError,
    [ErrorCode.INTERNAL_ERROR]: McpErrorCode.InternalError,
  };

  throw new McpError(codeMap[error.code] ?? McpErrorCode.InternalError, error.message, error.details);
}

function textResult(result: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(result, null, 2),
      },
    ],
  };
}

/**
 * Initialize and start the MCP server
 */
async function main(): Promise<void> {
  let server: McpServer | null = null;

  try {
    const { logLevel } = parseServerArgs(process.argv.slice(2));
    const config = initializeConfig({ logLevel });
    logger.info("guideline-rag-prep MCP server starting...", {
      version: "0.1.0",
      maxChars: config.maxChars,
      source: config.sourceName,
    });

    server = new McpServer({
      name: "guideline-rag-prep",
      version: "0.1.0",
    });

    server.registerTool(
      "normalize_text",
      {
        title: "Normalize Text",
        description: "Clean raw PDF-extracted text: join hyphenated line breaks, collapse whitespace, unify bullets, quotes and dashes.",
        inputSchema: {
          text: z.string().describe("Raw extracted text"),
        },
      },
      async ({ text }) => {
        const result = normalizeTextTool({ text });
        if (isErrorPayload(result)) {
          throwMcpError(result);
        }
        return textResult(result);
      }
    );

    server.registerTool(
      "chunk_record",
      {
        title: "Chunk Record",
        description: "Run one extraction record through normalization, metadata extraction and paragraph chunking. Returns the embedding-ready chunk records.",
        inputSchema: {
          record: z.record(z.string(), z.unknown()).describe("Extraction record (text/content, section_path, side_label, page, refs, ...)"),
          max_chars: z.number().int().min(1).optional().describe("Soft maximum characters per chunk (default: 1000)"),
          source: z.string().optional().describe("Corpus label written to each chunk"),
        },
      },
      async ({ record, max_chars, source }) => {
        const result = chunkRecord({ record, max_chars, source });
        if (isErrorPayload(result)) {
          throwMcpError(result);
        }
        return textResult(result);
      }
    );

    server.registerTool(
      "prepare_jsonl",
      {
        title: "Prepare JSONL Corpus",
        description: "Convert a JSON Lines extraction file into a JSON Lines file of chunks. Malformed lines are skipped and counted.",
        inputSchema: {
          input_path: z.string().describe("Path of the raw JSON Lines file"),
          output_path: z.string().describe("Path of the chunk file to write; parent directories are created"),
          max_chars: z.number().int().min(1).optional().describe("Soft maximum characters per chunk (default: 1000)"),
          source: z.string().optional().describe("Corpus label written to each chunk"),
        },
      },
      async ({ input_path, output_path, max_chars, source }) => {
        const result = await prepareJsonl({ input_path, output_path, max_chars, source });
        if (isErrorPayload(result)) {
          throwMcpError(result);
        }
        return textResult(result);
      }
    );

    const shutdown = async (signal: string) => {
      logger.info(`Received ${signal}, shutting down gracefully...`);

      if (server) {
        try {
          await server.close();
        } catch (error) {
          logger.error("Error closing server", {
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }

      process.exit(0);
    };

    process.on("SIGINT", () => void shutdown("SIGINT"));
    process.on("SIGTERM", () => void shutdown("SIGTERM"));

    const transport = new StdioServerTransport();
    await server.connect(transport);

    logger.info("MCP server started and connected to stdio transport");
  } catch (error) {
    logger.error("Failed to start server", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error("Unhandled error in main", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
