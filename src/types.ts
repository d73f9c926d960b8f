/**
 * Core type definitions for the guideline RAG preparation pipeline
 */

/**
 * A field that extraction tools emit either as a single value or as a list
 */
export type FieldValue =
  | { kind: "scalar"; value: string }
  | { kind: "sequence"; values: string[] };

/**
 * Page marker carried through from the input record
 */
export type PageMarker = number | string | null;

/**
 * Fields read from one raw input line, with every fallback already applied
 */
export interface RecordFields {
  text: string;
  sectionPath?: FieldValue;
  sideLabel?: FieldValue;
  pageStart: PageMarker;
  pageEnd: PageMarker;
  /** Raw reference entries; only integers and digit strings are used */
  references: unknown[];
}

/**
 * Metadata shared by every chunk derived from one input record
 */
export interface RecordMetadata {
  years: number[];
  breadcrumb: string;
  section: string;
  sideLabels: string[];
  pageStart: PageMarker;
  pageEnd: PageMarker;
}

/**
 * One embeddable chunk, as written to the output file
 */
export interface OutputRecord {
  id: string;
  source: string;
  section: string;
  breadcrumb: string;
  page_start: PageMarker;
  page_end: PageMarker;
  side_labels: string[];
  refs: number[];
  text: string;
  /** Presentation copy of `text`; identical until highlighting markup exists */
  highlighted_text: string;
}

/**
 * Outcome of reading a single reference entry as a year
 */
export type YearResult =
  | { ok: true; year: number }
  | { ok: false; reason: "not-a-year" | "out-of-range"; entry: unknown };

/**
 * Outcome of parsing one input line
 */
export type LineParseResult =
  | { status: "blank" }
  | { status: "record"; record: Record<string, unknown> }
  | { status: "skip"; reason: "invalid-json" | "not-an-object"; error: string };

/**
 * Counters reported at the end of a run
 */
export interface PipelineStats {
  /** Lines that parsed into a record */
  readItems: number;
  /** Non-blank lines that were skipped as malformed */
  skippedLines: number;
  wroteChunks: number;
  outputPath: string;
}

/**
 * Options that control chunking and emission
 */
export interface ChunkOptions {
  maxChars: number;
  sourceName: string;
}

/**
 * Standardized error payload
 */
export interface ErrorPayload {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  retryable?: boolean;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Resolved configuration for a pipeline run
 */
export interface PipelineConfig {
  maxChars: number;
  sourceName: string;
  logLevel: LogLevel;
}
