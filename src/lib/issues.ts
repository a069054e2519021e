/**
 * Non-fatal problems collected during a run
 *
 * None of these stop the pipeline. They are gathered and reported once at the
 * end so the user can fix the target list or the library.
 */

import { Data } from "effect"

/**
 * Why a target line produced no song:
 * - NoMatch: nothing scored above the fuzzy threshold
 * - ResolutionAmbiguous: several candidates and no choice was made
 */
export type UnmatchedReason = "NoMatch" | "ResolutionAmbiguous"

export interface UnmatchedQuery {
  readonly lineNumber: number
  readonly query: string
  readonly reason: UnmatchedReason
}

/**
 * A library entry that was skipped while loading
 */
export class MalformedLibraryRecord extends Data.TaggedClass("MalformedLibraryRecord")<{
  /** 1-based position in the library's song list */
  readonly position: number
  readonly id: string | null
  readonly reason: string
}> {}

export const UNMATCHED_REASON_LABELS: Record<UnmatchedReason, string> = {
  NoMatch: "no match",
  ResolutionAmbiguous: "ambiguous, no choice made",
}
