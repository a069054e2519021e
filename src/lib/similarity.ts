/**
 * Edit-distance similarity for fuzzy title matching
 */

import { normalizeText } from "./normalize-text"

/**
 * Levenshtein distance (insertions, deletions, substitutions all cost 1)
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0
  if (a.length === 0) return b.length
  if (b.length === 0) return a.length

  // Single rolling row: previous[j] is the distance between a[0..i) and b[0..j)
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j)

  for (let i = 1; i <= a.length; i++) {
    const current = [i]
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost,
      )
    }
    previous = current
  }

  return previous[b.length] ?? 0
}

/**
 * Similarity ratio in [0, 1] of two already-normalized strings.
 * 1 means identical; two empty strings are identical.
 */
export function similarityRatio(a: string, b: string): number {
  const maxLength = Math.max(a.length, b.length)
  if (maxLength === 0) return 1
  return 1 - levenshteinDistance(a, b) / maxLength
}

/**
 * Similarity of two display strings after normalization
 * ("Amzing Grace" vs "Amazing Grace!" → 12/13)
 */
export function calculateSimilarity(a: string, b: string): number {
  return similarityRatio(normalizeText(a), normalizeText(b))
}
