/**
 * Paragraph chunker for packing normalized text into embedding-sized chunks
 */

import { charLength } from "../utils/text.js";

export const DEFAULT_MAX_CHARS = 1000;

/**
 * Split normalized text on blank lines, dropping blank paragraphs
 */
export function splitParagraphs(text: string): string[] {
  return text.split(/\n\s*\n/).filter((p) => p.trim());
}

/**
 * Whether a paragraph is a normalized bullet ("- " prefix)
 */
export function isBulletParagraph(paragraph: string): boolean {
  return paragraph.trim().startsWith("- ");
}

/**
 * Group paragraphs into packing units: a run of consecutive bullets becomes one
 * newline-joined unit, every other paragraph is its own unit.
 */
export function toPackingUnits(paragraphs: readonly string[]): string[] {
  const units: string[] = [];
  let i = 0;

  while (i < paragraphs.length) {
    const paragraph = paragraphs[i].trim();
    if (!paragraph) {
      i++;
      continue;
    }

    if (!isBulletParagraph(paragraph)) {
      units.push(paragraph);
      i++;
      continue;
    }

    const bulletRun = [paragraph];
    let j = i + 1;
    while (j < paragraphs.length && isBulletParagraph(paragraphs[j])) {
      bulletRun.push(paragraphs[j].trim());
      j++;
    }
    units.push(bulletRun.join("\n"));
    i = j;
  }

  return units;
}

/**
 * Greedily pack paragraphs into chunks of at most `maxChars` characters
 *
 * Each unit counts its length plus one joining character. A unit that alone
 * exceeds the budget is placed in a chunk of its own; it is never split.
 */
export function chunkParagraphs(
  paragraphs: readonly string[],
  maxChars: number = DEFAULT_MAX_CHARS
): string[][] {
  const chunks: string[][] = [];
  let current: string[] = [];
  let currentLength = 0;

  for (const unit of toPackingUnits(paragraphs)) {
    const unitLength = charLength(unit);
    if (currentLength + unitLength + 1 > maxChars && current.length > 0) {
      chunks.push(current);
      current = [];
      currentLength = 0;
    }
    current.push(unit);
    currentLength += unitLength + 1;
  }

  if (current.length > 0) {
    chunks.push(current);
  }

  return chunks;
}
