/**
 * Tiered song matching
 *
 * 1. hymn number
 * 2. exact title or first lyric line, after normalization
 * 3. fuzzy title or first lyric line, similarity at or above the threshold
 * 4. a remembered or prompted choice between several fuzzy candidates
 *
 * Tiers 1-3 are pure. Tier 4 reads and writes the selection cache and may ask
 * the ambiguity resolver.
 */

import { DEFAULT_FUZZY_THRESHOLD } from "@/constants"
import { AmbiguityResolver } from "@/services/ambiguity-resolver"
import { SelectionCache } from "@/services/selection-cache"
import { Effect } from "effect"
import { firstContentLine } from "./lyrics-parser"
import {
  Ambiguous,
  type MatchResult,
  Matched,
  type ResolvedMatch,
  type ScoredSong,
  Unmatched,
} from "./match-types"
import { normalizeText, selectionKey } from "./normalize-text"
import { similarityRatio } from "./similarity"
import type { Query, SongRecord } from "./song-types"

export { DEFAULT_FUZZY_THRESHOLD }

// Similarity ratios are quotients; keep 0.8 reachable when it is exactly 4/5
const SCORE_EPSILON = 1e-9

export interface MatchOptions {
  readonly fuzzyThreshold?: number | undefined
}

// --- Song keys ---

interface SongKeys {
  readonly title: string
  readonly firstLine: string
}

const keyCache = new WeakMap<SongRecord, SongKeys>()

function songKeys(song: SongRecord): SongKeys {
  const cached = keyCache.get(song)
  if (cached) return cached

  const keys = {
    title: normalizeText(song.title),
    firstLine: normalizeText(firstContentLine(song.lyrics)),
  }
  keyCache.set(song, keys)
  return keys
}

function isExact(song: SongRecord, key: string): boolean {
  const keys = songKeys(song)
  return keys.title === key || keys.firstLine === key
}

/**
 * Best similarity between the query and the song's title or opening line
 */
export function scoreSong(song: SongRecord, key: string): number {
  const keys = songKeys(song)
  const titleScore = similarityRatio(key, keys.title)
  const firstLineScore = keys.firstLine ? similarityRatio(key, keys.firstLine) : 0
  return Math.max(titleScore, firstLineScore)
}

// --- Tiers 1-3 ---

function matchByTitle(
  key: string,
  pool: readonly SongRecord[],
  threshold: number,
): MatchResult {
  const exact = pool.filter(song => isExact(song, key))
  const [onlyExact] = exact
  if (exact.length === 1 && onlyExact) {
    return new Matched({ song: onlyExact, kind: "byExactTitle", score: 1 })
  }

  const scored: ScoredSong[] = pool
    .map(song => ({ song, score: scoreSong(song, key) }))
    .filter(candidate => candidate.score + SCORE_EPSILON >= threshold)
  // Array.prototype.sort is stable, so equal scores keep library order
  scored.sort((a, b) => b.score - a.score)

  const [best] = scored
  if (!best) return new Unmatched({ reason: "NoMatch" })
  if (scored.length === 1) {
    return new Matched({ song: best.song, kind: "byFuzzyTitle", score: best.score })
  }
  return new Ambiguous({ candidates: scored })
}

/**
 * Run the automatic tiers for one query
 */
export function findCandidates(
  query: Query,
  songs: readonly SongRecord[],
  options: MatchOptions = {},
): MatchResult {
  const threshold = options.fuzzyThreshold ?? DEFAULT_FUZZY_THRESHOLD
  const titleKey = query.title === null ? "" : normalizeText(query.title)

  if (query.number !== null) {
    const byNumber = songs.filter(song => song.number === query.number)
    const [onlyHit] = byNumber

    if (byNumber.length === 1 && onlyHit) {
      return new Matched({ song: onlyHit, kind: "byNumber", score: 1 })
    }

    if (!titleKey) {
      return byNumber.length > 1
        ? new Ambiguous({ candidates: byNumber.map(song => ({ song, score: 1 })) })
        : new Unmatched({ reason: "NoMatch" })
    }

    return matchByTitle(titleKey, byNumber.length > 1 ? byNumber : songs, threshold)
  }

  if (!titleKey) return new Unmatched({ reason: "NoMatch" })
  return matchByTitle(titleKey, songs, threshold)
}

// --- Tier 4 ---

const resolveAmbiguous = (query: Query, candidates: readonly ScoredSong[]) =>
  Effect.gen(function* () {
    const cache = yield* SelectionCache
    const key = selectionKey(query.raw)

    const cachedId = yield* cache.get(key)
    if (cachedId !== null) {
      const remembered = candidates.find(candidate => candidate.song.id === cachedId)
      if (remembered) {
        yield* Effect.logDebug(`[Matcher] Using remembered choice ${cachedId} for "${query.raw}"`)
        return new Matched({
          song: remembered.song,
          kind: "byManualChoice",
          score: remembered.score,
        })
      }
      yield* Effect.logWarning(
        `[Matcher] Ignoring stale choice ${cachedId} for "${query.raw}": not among current candidates`,
      )
    }

    const resolver = yield* AmbiguityResolver
    const choice = yield* resolver.choose(query, candidates)
    if (choice._tag === "Skip") {
      yield* Effect.logInfo(`[Matcher] Skipped "${query.raw}"`)
      return new Unmatched({ reason: "ResolutionAmbiguous" })
    }

    const chosen = candidates.find(candidate => candidate.song.id === choice.songId)
    if (!chosen) {
      yield* Effect.logWarning(
        `[Matcher] Choice ${choice.songId} for "${query.raw}" is not one of the candidates`,
      )
      return new Unmatched({ reason: "ResolutionAmbiguous" })
    }

    yield* cache.set(key, chosen.song.id).pipe(
      Effect.catchTag("SelectionCacheError", error =>
        Effect.logError(
          `[Matcher] Choice for "${query.raw}" kept for this run only: ${error.message}`,
        ),
      ),
    )

    return new Matched({ song: chosen.song, kind: "byManualChoice", score: chosen.score })
  })

/**
 * Match one query, settling ambiguity from the selection cache or by asking
 */
export const resolveQuery = (
  query: Query,
  songs: readonly SongRecord[],
  options: MatchOptions = {},
): Effect.Effect<ResolvedMatch, never, SelectionCache | AmbiguityResolver> => {
  const result = findCandidates(query, songs, options)
  if (result._tag !== "Ambiguous") return Effect.succeed(result)
  return resolveAmbiguous(query, result.candidates)
}
