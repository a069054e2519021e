/**
 * Match results using Effect.ts Data.TaggedClass for exhaustive handling
 */

import { Data } from "effect"
import type { UnmatchedReason } from "./issues"
import type { SongRecord } from "./song-types"

/** Which tier produced a match */
export type MatchKind = "byNumber" | "byExactTitle" | "byFuzzyTitle" | "byManualChoice"

export interface ScoredSong {
  readonly song: SongRecord
  /** Similarity in [0, 1]; 1 for exact matches */
  readonly score: number
}

export class Matched extends Data.TaggedClass("Matched")<{
  readonly song: SongRecord
  readonly kind: MatchKind
  readonly score: number
}> {}

export class Ambiguous extends Data.TaggedClass("Ambiguous")<{
  /** Best first, library order among equal scores */
  readonly candidates: readonly ScoredSong[]
}> {}

export class Unmatched extends Data.TaggedClass("Unmatched")<{
  readonly reason: UnmatchedReason
}> {}

export type MatchResult = Matched | Ambiguous | Unmatched

/** What the matcher hands back once ambiguity has been dealt with */
export type ResolvedMatch = Matched | Unmatched

export const MATCH_KIND_LABELS: Record<MatchKind, string> = {
  byNumber: "number",
  byExactTitle: "exact title",
  byFuzzyTitle: "fuzzy title",
  byManualChoice: "manual choice",
}
