/**
 * Text normalization for matching and cache keys
 */

/**
 * Fold text to a comparison key: accents removed, punctuation dropped,
 * lowercase, whitespace runs collapsed.
 *
 * "Amazing Grace!" and "amazing  grace" produce the same key.
 */
export function normalizeText(text: string | null | undefined): string {
  if (!text) return ""
  return text
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/['’]/g, "")
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim()
}

/**
 * Key under which a manual selection is remembered for a target line
 */
export function selectionKey(rawQuery: string): string {
  return normalizeText(rawQuery)
}
