/**
 * Argument parsing for the MCP server entry point
 */

import { parseArgs } from "node:util";

export interface ServerArgs {
  logLevel?: string;
}

/**
 * Read server options; anything the server does not know about is ignored
 */
export function parseServerArgs(argv: string[]): ServerArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      "log-level": { type: "string" },
    },
    strict: false,
    allowPositionals: true,
  });

  const logLevel = values["log-level"];
  return { logLevel: typeof logLevel === "string" ? logLevel : undefined };
}
