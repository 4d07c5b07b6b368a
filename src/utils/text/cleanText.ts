/**
 * Text cleanup for extracted field values
 */

/**
 * Normalize line endings, trim each line, collapse runs of spaces and
 * blank lines, trim the whole value
 */
export function cleanText(value: string): string {
  return value
    .replace(/\r\n?/g, "\n")
    .replace(/\u00a0/g, " ")
    .split("\n")
    .map((line) => line.replace(/[ \t\f\v]+/g, " ").trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Truncate to `max` characters, marking the cut with "..."
 */
export function truncate(value: string, max: number): string {
  return value.length > max ? value.substring(0, max) + "..." : value;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const DECORATIVE_SYMBOLS = /[\p{Extended_Pictographic}\u{FE0F}\u{200D}•▪●►★☆✔✓➤]/gu;

/**
 * Remove emoji and decorative bullets/symbols
 */
export function stripDecorativeSymbols(value: string): string {
  return value.replace(DECORATIVE_SYMBOLS, "");
}
