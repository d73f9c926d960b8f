/**
 * The prepare command: argument parsing and pipeline invocation for the CLI
 */

import { parseArgs } from "node:util";
import * as z from "zod";

import { initializeConfig } from "../config.js";
import { formatSummary, processJsonl } from "../lib/pipeline/driver.js";
import { errorToPayload, invalidInputError } from "../lib/utils/errors.js";
import { logger } from "../lib/utils/logger.js";
import type { PipelineConfig } from "../types.js";

const argsSchema = z.object({
  input: z.string().min(1, "--input is required"),
  output: z.string().min(1, "--output is required"),
  maxChars: z.coerce.number().int().positive().optional(),
  source: z.string().optional(),
  logLevel: z.string().optional(),
});

export type CliArgs = z.infer<typeof argsSchema>;

/**
 * Parse and validate command-line arguments
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      input: { type: "string", short: "i" },
      output: { type: "string", short: "o" },
      "max-chars": { type: "string" },
      source: { type: "string" },
      "log-level": { type: "string" },
    },
    strict: true,
  });

  const parsed = argsSchema.safeParse({
    input: values.input ?? "",
    output: values.output ?? "",
    maxChars: values["max-chars"],
    source: values.source,
    logLevel: values["log-level"],
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "arguments";
    throw new Error(`Invalid ${field}: ${issue?.message ?? "invalid value"}`);
  }
  return parsed.data;
}

/**
 * Run the pipeline for the given arguments and return the process exit code
 * (0 on success, 1 for unusable arguments or a failed run)
 */
export async function run(argv: string[]): Promise<number> {
  let args: CliArgs;
  let config: PipelineConfig;
  try {
    args = parseCliArgs(argv);
    config = initializeConfig({
      maxChars: args.maxChars,
      sourceName: args.source,
      logLevel: args.logLevel,
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error("Invalid arguments", { ...invalidInputError("arguments", argv.join(" "), reason) });
    return 1;
  }

  try {
    const stats = await processJsonl(args.input, args.output, {
      maxChars: config.maxChars,
      sourceName: config.sourceName,
    });
    console.log(formatSummary(stats));
    return 0;
  } catch (error) {
    logger.error("Pipeline failed", {
      ...errorToPayload(error, { input: args.input, output: args.output }),
    });
    return 1;
  }
}
