/**
 * Configuration module for resolving and validating run options
 */

import * as z from "zod";

import type { PipelineConfig } from "./types.js";

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: PipelineConfig = {
  maxChars: 1000,
  sourceName: "adhd_guideline",
  logLevel: "info",
};

/**
 * Valid log levels
 */
export const VALID_LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

const overridesSchema = z.object({
  maxChars: z.number().int().positive().optional(),
  sourceName: z.string().trim().min(1).optional(),
  logLevel: z.enum(VALID_LOG_LEVELS).optional(),
});

/**
 * Unvalidated overrides accepted from the CLI or the server's arguments
 */
export interface ConfigOverrides {
  maxChars?: number;
  sourceName?: string;
  logLevel?: string;
}

/**
 * Resolve configuration from defaults plus validated overrides
 */
export function loadConfig(overrides: ConfigOverrides = {}): PipelineConfig {
  const parsed = overridesSchema.safeParse(overrides);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "config";
    throw new Error(`Invalid ${field}: ${issue?.message ?? "invalid value"}`);
  }

  return {
    maxChars: parsed.data.maxChars ?? DEFAULT_CONFIG.maxChars,
    sourceName: parsed.data.sourceName ?? DEFAULT_CONFIG.sourceName,
    logLevel: parsed.data.logLevel ?? DEFAULT_CONFIG.logLevel,
  };
}

let cachedConfig: PipelineConfig | null = null;

/**
 * Set cached config directly (for testing only)
 * @internal
 */
export function _setCachedConfigForTesting(config: PipelineConfig | null): void {
  cachedConfig = config;
}

/**
 * Get the run configuration, which must have been initialized first
 */
export function getConfig(): PipelineConfig {
  if (!cachedConfig) {
    throw new Error("Configuration not loaded. Call initializeConfig() first.");
  }
  return cachedConfig;
}

/**
 * Load and cache configuration. Later calls return the cached value.
 */
export function initializeConfig(overrides: ConfigOverrides = {}): PipelineConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig(overrides);
  }
  return cachedConfig;
}

/**
 * Reset the cached configuration
 *
 * The logger reads its level from config on every call, so it follows the next config loaded.
 */
export function resetConfig(): void {
  cachedConfig = null;
}
