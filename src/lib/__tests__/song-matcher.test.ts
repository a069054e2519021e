import { makeScriptedAmbiguityResolver } from "@/services/ambiguity-resolver"
import { SelectionCache, makeInMemorySelectionCache } from "@/services/selection-cache"
import { Effect, Layer, LogLevel, Logger } from "effect"
import { describe, expect, test } from "vitest"
import { parseTargetLine } from "../reference-resolver"
import { findCandidates, resolveQuery } from "../song-matcher"
import type { SongRecord } from "../song-types"
import { librarySongs } from "./fixtures/songs"

const Quiet = Logger.minimumLogLevel(LogLevel.None)

const song = (id: string): SongRecord => {
  const found = librarySongs.find(candidate => candidate.id === id)
  if (!found) throw new Error(`No fixture song ${id}`)
  return found
}

const match = (line: string) => findCandidates(parseTargetLine(line), librarySongs)

describe("findCandidates", () => {
  test("matches a unique hymn number without looking at titles", () => {
    expect(match("512")).toEqual({ _tag: "Matched", song: song("s1"), kind: "byNumber", score: 1 })
  })

  test("falls through to the exact title when the number is unknown", () => {
    const result = match("Amazing Grace (Hymn 999)")

    expect(result._tag).toBe("Matched")
    if (result._tag !== "Matched") return
    expect(result.song.id).toBe("s2")
    expect(result.kind).toBe("byExactTitle")
  })

  test("matches the first lyric line exactly", () => {
    const result = match("Holy, holy, holy! Lord God Almighty")

    expect(result).toEqual({ _tag: "Matched", song: song("s3"), kind: "byExactTitle", score: 1 })
  })

  test("matches a misspelled title by similarity", () => {
    const result = match("Amzing Grace")

    expect(result._tag).toBe("Matched")
    if (result._tag !== "Matched") return
    expect(result.song.id).toBe("s2")
    expect(result.kind).toBe("byFuzzyTitle")
    expect(result.score).toBeCloseTo(12 / 13)
  })

  test("narrows a shared number by title", () => {
    expect(match("300 Come Thou Fount")).toEqual({
      _tag: "Matched",
      song: song("x1"),
      kind: "byExactTitle",
      score: 1,
    })
  })

  test("reports a shared number without title as ambiguous", () => {
    const result = match("300")

    expect(result._tag).toBe("Ambiguous")
    if (result._tag !== "Ambiguous") return
    expect(result.candidates.map(candidate => candidate.song.id)).toEqual(["x1", "x2"])
  })

  test("reports an unknown number without title as no match", () => {
    expect(match("999")).toEqual({ _tag: "Unmatched", reason: "NoMatch" })
  })

  test("orders several fuzzy candidates by score", () => {
    const result = match("Blessed Asurance")

    expect(result._tag).toBe("Ambiguous")
    if (result._tag !== "Ambiguous") return
    expect(result.candidates.map(candidate => candidate.song.id)).toEqual(["a1", "a2"])
    expect(result.candidates[0]?.score).toBeCloseTo(16 / 17)
    expect(result.candidates[1]?.score).toBeCloseTo(16 / 18)
  })

  test("keeps library order for equal fuzzy scores", () => {
    const songs: SongRecord[] = [
      { id: "n2", number: null, title: "Holy Nights", lyrics: "" },
      { id: "k1", number: null, title: "Holy Knight", lyrics: "" },
    ]

    const result = findCandidates(parseTargetLine("Holy Night"), songs)

    expect(result._tag).toBe("Ambiguous")
    if (result._tag !== "Ambiguous") return
    expect(result.candidates.map(candidate => candidate.song.id)).toEqual(["n2", "k1"])
    expect(result.candidates[0]?.score).toBeCloseTo(10 / 11)
    expect(result.candidates[1]?.score).toBeCloseTo(10 / 11)
  })

  test("reports nothing close as no match", () => {
    expect(match("Nothing Like This At All")).toEqual({ _tag: "Unmatched", reason: "NoMatch" })
  })

  test("includes a score of exactly the threshold", () => {
    const songs: SongRecord[] = [{ id: "t1", number: null, title: "a".repeat(100), lyrics: "" }]

    const atThreshold = findCandidates(
      { raw: "query", number: null, title: `${"a".repeat(80)}${"b".repeat(20)}` },
      songs,
    )
    const belowThreshold = findCandidates(
      { raw: "query", number: null, title: `${"a".repeat(79)}${"b".repeat(21)}` },
      songs,
    )

    expect(atThreshold._tag).toBe("Matched")
    expect(belowThreshold).toEqual({ _tag: "Unmatched", reason: "NoMatch" })
  })

  test("uses a custom threshold", () => {
    const result = findCandidates(parseTargetLine("Amzing Grace"), librarySongs, {
      fuzzyThreshold: 0.95,
    })

    expect(result).toEqual({ _tag: "Unmatched", reason: "NoMatch" })
  })
})

describe("resolveQuery", () => {
  const query = parseTargetLine("Blessed Asurance")

  const resolveWith = (
    cached: Record<string, string>,
    answers: Record<string, string | null>,
    times = 1,
  ) => {
    const resolver = makeScriptedAmbiguityResolver(answers)
    const layer = Layer.mergeAll(makeInMemorySelectionCache(cached), resolver.layer, Quiet)

    const program = Effect.gen(function* () {
      const results = yield* Effect.forEach(Array.from({ length: times }), () =>
        resolveQuery(query, librarySongs),
      )
      const cache = yield* SelectionCache
      const entries = yield* cache.entries
      return { results, entries }
    })

    return Effect.runPromise(Effect.provide(program, layer)).then(outcome => ({
      ...outcome,
      asked: resolver.asked,
    }))
  }

  test("does not touch the cache for unambiguous queries", async () => {
    const resolver = makeScriptedAmbiguityResolver({})
    const layer = Layer.mergeAll(makeInMemorySelectionCache(), resolver.layer, Quiet)

    const result = await Effect.runPromise(
      Effect.provide(resolveQuery(parseTargetLine("512"), librarySongs), layer),
    )

    expect(result._tag).toBe("Matched")
    expect(resolver.asked).toEqual([])
  })

  test("asks once and remembers the choice", async () => {
    const { results, entries, asked } = await resolveWith({}, { "Blessed Asurance": "a2" }, 2)

    expect(asked).toEqual([query])
    expect(entries).toEqual({ "blessed asurance": "a2" })
    for (const result of results) {
      expect(result._tag).toBe("Matched")
      if (result._tag !== "Matched") continue
      expect(result.song.id).toBe("a2")
      expect(result.kind).toBe("byManualChoice")
      expect(result.score).toBeCloseTo(16 / 18)
    }
  })

  test("uses a remembered choice without asking", async () => {
    const { results, asked } = await resolveWith({ "blessed asurance": "a1" }, {})

    expect(asked).toEqual([])
    expect(results).toHaveLength(1)
    const [result] = results
    expect(result?._tag).toBe("Matched")
    if (result?._tag !== "Matched") return
    expect(result.song).toEqual(song("a1"))
    expect(result.kind).toBe("byManualChoice")
    expect(result.score).toBeCloseTo(16 / 17)
  })

  test("asks again when the remembered song is no longer a candidate", async () => {
    const { results, entries, asked } = await resolveWith({ "blessed asurance": "gone" }, {
      "Blessed Asurance": "a1",
    })

    expect(asked).toHaveLength(1)
    expect(entries).toEqual({ "blessed asurance": "a1" })
    expect(results[0]?._tag).toBe("Matched")
  })

  test("records a skip as unresolved and remembers nothing", async () => {
    const { results, entries } = await resolveWith({}, { "Blessed Asurance": null })

    expect(results).toEqual([{ _tag: "Unmatched", reason: "ResolutionAmbiguous" }])
    expect(entries).toEqual({})
  })

  test("rejects an answer that is not one of the candidates", async () => {
    const { results, entries } = await resolveWith({}, { "Blessed Asurance": "s1" })

    expect(results).toEqual([{ _tag: "Unmatched", reason: "ResolutionAmbiguous" }])
    expect(entries).toEqual({})
  })
})
