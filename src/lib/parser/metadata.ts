/**
 * Metadata extraction: referenced years, breadcrumb and section label
 */

import type { FieldValue, RecordFields, RecordMetadata, YearResult } from "../../types.js";
import { toSequence } from "./record-fields.js";

export const MIN_YEAR = 1900;
export const MAX_YEAR = 2100;
export const BREADCRUMB_SEPARATOR = " > ";

// Bare, [2019] or (2019): brackets never touch the digits, so digit boundaries suffice
const YEAR_TOKEN = /(?<!\d)(\d{4})(?!\d)/g;

function inYearRange(year: number): boolean {
  return year >= MIN_YEAR && year <= MAX_YEAR;
}

function sortedUnique(years: Iterable<number>): number[] {
  return [...new Set(years)].sort((a, b) => a - b);
}

/**
 * Collect the distinct in-range four-digit years mentioned in a string, ascending
 */
export function extractYears(text: string): number[] {
  if (!text) {
    return [];
  }

  const years: number[] = [];
  for (const match of text.matchAll(YEAR_TOKEN)) {
    const year = Number.parseInt(match[1], 10);
    if (inYearRange(year)) {
      years.push(year);
    }
  }
  return sortedUnique(years);
}

/**
 * Read one declared reference entry as a year
 */
export function readReferenceYear(entry: unknown): YearResult {
  let year: number;
  if (typeof entry === "number" && Number.isInteger(entry)) {
    year = entry;
  } else if (typeof entry === "string" && /^\d+$/.test(entry)) {
    year = Number.parseInt(entry, 10);
  } else {
    return { ok: false, reason: "not-a-year", entry };
  }

  return inYearRange(year) ? { ok: true, year } : { ok: false, reason: "out-of-range", entry };
}

/**
 * Read every declared reference entry; unusable entries are reported, not thrown
 */
export function collectReferenceYears(entries: readonly unknown[]): YearResult[] {
  return entries.map(readReferenceYear);
}

/**
 * Union of years found in the body and years declared as references
 */
export function extractRecordYears(text: string, references: readonly unknown[]): number[] {
  const declared = collectReferenceYears(references).flatMap((result) =>
    result.ok ? [result.year] : []
  );
  return sortedUnique([...extractYears(text), ...declared]);
}

/**
 * Render "[label] > Heading > Subheading". Side labels are comma-joined inside one bracket.
 */
export function buildBreadcrumb(sectionPath?: FieldValue, sideLabel?: FieldValue): string {
  const parts: string[] = [];

  if (sideLabel) {
    parts.push(`[${toSequence(sideLabel).join(",")}]`);
  }
  parts.push(...toSequence(sectionPath).filter((segment) => segment.length > 0));

  return parts.join(BREADCRUMB_SEPARATOR);
}

/**
 * The section path on its own; empty segments in a list are kept as-is
 */
export function sectionString(sectionPath?: FieldValue): string {
  return toSequence(sectionPath).join(BREADCRUMB_SEPARATOR);
}

/**
 * Derive the metadata shared by all chunks of one record
 *
 * @param text - the record's body after normalization
 */
export function extractMetadata(fields: RecordFields, text: string): RecordMetadata {
  return {
    years: extractRecordYears(text, fields.references),
    breadcrumb: buildBreadcrumb(fields.sectionPath, fields.sideLabel),
    section: sectionString(fields.sectionPath),
    sideLabels: toSequence(fields.sideLabel),
    pageStart: fields.pageStart,
    pageEnd: fields.pageEnd,
  };
}
