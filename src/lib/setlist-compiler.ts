/**
 * Setlist compilation pipeline
 *
 * Target lines are matched and parsed strictly in order, one at a time, so an
 * interactive choice never interleaves with another line's output.
 */

import { AmbiguityResolver } from "@/services/ambiguity-resolver"
import { CompilerConfig } from "@/services/compiler-config"
import { SelectionCache } from "@/services/selection-cache"
import { readTargetList, writeCompiledSetlist } from "@/services/setlist-files"
import { SongLibrary } from "@/services/song-library"
import { Effect, Either } from "effect"
import type { MalformedLibraryRecord, UnmatchedQuery } from "./issues"
import { type LyricsParseOptions, parseLyrics } from "./lyrics-parser"
import type { MatchKind } from "./match-types"
import { parseTargetList } from "./reference-resolver"
import { toRendererJson } from "./setlist-report"
import { type MatchOptions, resolveQuery } from "./song-matcher"
import type { Section, TargetLine } from "./song-types"

export interface CompileOptions extends MatchOptions, LyricsParseOptions {}

export interface CompiledSong {
  readonly lineNumber: number
  /** Target line as written */
  readonly query: string
  readonly songId: string
  readonly number: number | null
  readonly title: string
  readonly matchKind: MatchKind
  readonly score: number
  readonly sections: readonly Section[]
  readonly chorusCount: number
  readonly needsAttention: boolean
  readonly warnings: readonly string[]
}

export interface CompiledSetlist {
  /** Number of non-blank target lines */
  readonly total: number
  /** Matched songs in target order, including those that need attention */
  readonly songs: readonly CompiledSong[]
  readonly unmatched: readonly UnmatchedQuery[]
  readonly needsAttention: readonly CompiledSong[]
  readonly malformed: readonly MalformedLibraryRecord[]
}

// --- Pipeline ---

const compileTarget = (
  target: TargetLine,
  options: CompileOptions,
  firstMatchLine: Map<string, number>,
) =>
  Effect.gen(function* () {
    const library = yield* SongLibrary
    const { query } = target

    const result = yield* resolveQuery(query, library.songs, options)
    if (result._tag === "Unmatched") {
      yield* Effect.logWarning(`[Compiler] No song for "${query.raw}" (${result.reason})`)
      const unmatched: UnmatchedQuery = {
        lineNumber: target.lineNumber,
        query: query.raw,
        reason: result.reason,
      }
      return Either.left(unmatched)
    }

    const { song } = result
    yield* Effect.logInfo(
      `[Compiler] "${query.raw}" -> ${song.title} (${result.kind}, ${result.score.toFixed(2)})`,
    )

    const earlier = firstMatchLine.get(song.id)
    if (earlier === undefined) {
      firstMatchLine.set(song.id, target.lineNumber)
    } else {
      yield* Effect.logWarning(`[Compiler] ${song.title} is already in the setlist at line ${earlier}`)
    }

    const parsed = parseLyrics(song.lyrics, options)
    for (const warning of parsed.warnings) {
      yield* Effect.logWarning(`[Parser] ${song.title}: ${warning}`)
    }
    if (parsed.chorusCount > 1) {
      yield* Effect.logInfo(
        `[Parser] ${song.title} has ${parsed.chorusCount} choruses; keeping source order`,
      )
    }
    if (parsed.needsAttention) {
      yield* Effect.logWarning(`[Parser] ${song.title} produced no sections`)
    }

    const compiled: CompiledSong = {
      lineNumber: target.lineNumber,
      query: query.raw,
      songId: song.id,
      number: song.number,
      title: song.title,
      matchKind: result.kind,
      score: result.score,
      sections: parsed.sections,
      chorusCount: parsed.chorusCount,
      needsAttention: parsed.needsAttention,
      warnings: parsed.warnings,
    }
    return Either.right(compiled)
  }).pipe(Effect.annotateLogs({ line: target.lineNumber }))

/**
 * Match and parse parsed target lines
 */
export const compileTargets = (targets: readonly TargetLine[], options: CompileOptions = {}) =>
  Effect.gen(function* () {
    const library = yield* SongLibrary
    const firstMatchLine = new Map<string, number>()

    const outcomes = yield* Effect.forEach(targets, target =>
      compileTarget(target, options, firstMatchLine),
    )

    const songs: CompiledSong[] = []
    const unmatched: UnmatchedQuery[] = []
    for (const outcome of outcomes) {
      switch (outcome._tag) {
        case "Right":
          songs.push(outcome.right)
          break
        case "Left":
          unmatched.push(outcome.left)
          break
      }
    }

    const setlist: CompiledSetlist = {
      total: targets.length,
      songs,
      unmatched,
      needsAttention: songs.filter(song => song.needsAttention),
      malformed: library.malformed,
    }
    return setlist
  })

/**
 * Match and parse the text of a target list file
 */
export const compileSetlist = (
  targetText: string,
  options: CompileOptions = {},
): Effect.Effect<CompiledSetlist, never, SongLibrary | SelectionCache | AmbiguityResolver> =>
  compileTargets(parseTargetList(targetText), options)

// --- File-to-file run ---

export interface CompileRunPaths {
  readonly targetsPath?: string | undefined
  readonly outputPath?: string | undefined
}

/**
 * Read the configured target list, compile it, and write the renderer JSON
 */
export const runCompilation = (paths: CompileRunPaths = {}) =>
  Effect.gen(function* () {
    const config = yield* CompilerConfig
    const targetsPath = paths.targetsPath ?? config.targetsPath
    const outputPath = paths.outputPath ?? config.outputPath

    const targetText = yield* readTargetList(targetsPath)
    const setlist = yield* compileSetlist(targetText, {
      fuzzyThreshold: config.fuzzyThreshold,
      maxSectionLines: config.maxSectionLines,
      repeatChorus: config.repeatChorus,
    })

    yield* writeCompiledSetlist(outputPath, toRendererJson(setlist))
    return setlist
  })
