/**
 * Text normalizer for raw PDF-extraction output
 *
 * Steps run in a fixed order; bullet detection must see the original glyphs
 * before quote/dash unification rewrites them.
 */

/**
 * Glyphs that mark a bullet line in extracted text
 */
export const BULLET_GLYPHS = ["•", "◦", "▪", "‣", "·", "●", "*", "–", "—", "-"] as const;

const HYPHENATED_BREAK = /([\p{L}\p{N}\p{M}_])-\s*\n\s*([\p{L}\p{N}\p{M}_])/gu;
const LEADING_BULLETS = /^[•◦▪‣·●*–—-]+\s*/u;

/**
 * Join words that a line wrap split with a hyphen ("hyper-\ntension" -> "hypertension")
 */
export function dehyphenate(text: string): string {
  return text.replace(HYPHENATED_BREAK, "$1$2");
}

export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

/**
 * Collapse three or more newlines into a single blank line
 */
export function collapseBlankLines(text: string): string {
  return text.replace(/\n{3,}/g, "\n\n");
}

export function collapseInlineWhitespace(text: string): string {
  return text.replace(/[ \t]{2,}/g, " ");
}

/**
 * Whether a trimmed line opens with any bullet glyph
 */
export function startsWithBullet(line: string): boolean {
  return BULLET_GLYPHS.some((glyph) => line.startsWith(glyph));
}

/**
 * Trim every line and rewrite bullet lines to a single "- " prefix
 */
export function unifyBullets(text: string): string {
  return text
    .split("\n")
    .map((line) => {
      const trimmed = line.trim();
      if (!startsWithBullet(trimmed)) {
        return trimmed;
      }
      return `- ${trimmed.replace(LEADING_BULLETS, "")}`;
    })
    .join("\n");
}

/**
 * Straighten curly quotes and turn en/em dashes and stray bullets into hyphens
 */
export function unifyPunctuation(text: string): string {
  return text
    .replace(/[‘’]/g, "'")
    .replace(/[“”]/g, '"')
    .replace(/[–—]/g, "-")
    .replace(/•/g, "-");
}

/**
 * Clean raw extracted text. Returns "" for empty or absent input.
 */
export function normalizeText(raw: string | null | undefined): string {
  if (!raw) {
    return "";
  }

  let text = dehyphenate(raw);
  text = normalizeLineEndings(text);
  text = collapseBlankLines(text);
  text = collapseInlineWhitespace(text);
  text = unifyBullets(text);
  text = unifyPunctuation(text);
  return text.trim();
}
