/**
 * Display limits for console output
 */

export const DISPLAY_LIMITS = {
  /** Lyric preview shown next to each ambiguous candidate */
  CANDIDATE_SNIPPET: 120,
} as const
