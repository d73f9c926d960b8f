/**
 * Library entry point
 */

export * from "./lib/parser/index.js";
export * from "./lib/pipeline/index.js";
export { loadConfig, DEFAULT_CONFIG } from "./config.js";
export type {
  FieldValue,
  PageMarker,
  RecordFields,
  RecordMetadata,
  OutputRecord,
  YearResult,
  LineParseResult,
  PipelineStats,
  ChunkOptions,
  ErrorPayload,
  PipelineConfig,
} from "./types.js";
