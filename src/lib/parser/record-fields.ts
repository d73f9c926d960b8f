/**
 * Best-effort field access over loosely typed extraction records
 *
 * Each logical field has an ordered list of candidate keys. The first
 * candidate holding a usable value wins; otherwise the field takes a neutral default.
 */

import type { FieldValue, PageMarker, RecordFields } from "../../types.js";

export const TEXT_KEYS = ["text", "content"] as const;
export const SECTION_KEYS = ["section_path", "section"] as const;
export const SIDE_LABEL_KEYS = ["side_label", "side_labels"] as const;
export const PAGE_START_KEYS = ["page_start", "page", "pageIndex"] as const;
export const PAGE_END_KEYS = ["page_end", "page", "pageIndex"] as const;
export const REFERENCE_KEYS = ["refs", "references"] as const;

type Coercer<T> = (value: unknown) => T | undefined;

/**
 * Return the first candidate key whose value coerces, or undefined
 */
export function readFirst<T>(
  record: Record<string, unknown>,
  keys: readonly string[],
  coerce: Coercer<T>
): T | undefined {
  for (const key of keys) {
    const value = coerce(record[key]);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

function asNonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function scalarToString(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

/**
 * Read a string-or-list value into the tagged union. Empty strings and empty lists are absent.
 */
export function asFieldValue(value: unknown): FieldValue | undefined {
  if (Array.isArray(value)) {
    if (value.length === 0) {
      return undefined;
    }
    const values = value
      .map(scalarToString)
      .filter((entry): entry is string => entry !== undefined);
    return { kind: "sequence", values };
  }

  const scalar = scalarToString(value);
  if (scalar === undefined || scalar.length === 0) {
    return undefined;
  }
  return { kind: "scalar", value: scalar };
}

function asPageMarker(value: unknown): Exclude<PageMarker, null> | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  return asNonEmptyString(value);
}

function asReferenceList(value: unknown): unknown[] | undefined {
  if (value === undefined || value === null || value === "") {
    return undefined;
  }
  if (Array.isArray(value)) {
    return value.length > 0 ? value : undefined;
  }
  return [value];
}

/**
 * Flatten a field value into a list of strings
 */
export function toSequence(field: FieldValue | undefined): string[] {
  if (!field) {
    return [];
  }
  return field.kind === "sequence" ? [...field.values] : [field.value];
}

/**
 * Read every logical field of a raw record, applying fallbacks and defaults
 */
export function readRecordFields(record: Record<string, unknown>): RecordFields {
  return {
    text: readFirst(record, TEXT_KEYS, asNonEmptyString) ?? "",
    sectionPath: readFirst(record, SECTION_KEYS, asFieldValue),
    sideLabel: readFirst(record, SIDE_LABEL_KEYS, asFieldValue),
    pageStart: readFirst(record, PAGE_START_KEYS, asPageMarker) ?? null,
    pageEnd: readFirst(record, PAGE_END_KEYS, asPageMarker) ?? null,
    references: readFirst(record, REFERENCE_KEYS, asReferenceList) ?? [],
  };
}
