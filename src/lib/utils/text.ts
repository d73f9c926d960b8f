/**
 * Length helpers that count Unicode code points rather than UTF-16 units
 */

export function charLength(text: string): number {
  return Array.from(text).length;
}

/**
 * First `count` code points of a string
 */
export function takeChars(text: string, count: number): string {
  return Array.from(text).slice(0, count).join("");
}
