import { readFile } from "node:fs/promises"
import { LibraryLoadError, formatCause } from "@/lib/errors"
import { MalformedLibraryRecord } from "@/lib/issues"
import { firstContentLine } from "@/lib/lyrics-parser"
import type { SongRecord } from "@/lib/song-types"
import { Context, Effect, Layer } from "effect"
import { z } from "zod"
import { CompilerConfig } from "./compiler-config"

export interface SongLibraryShape {
  /** Valid songs in file order */
  readonly songs: readonly SongRecord[]
  /** Entries skipped while loading */
  readonly malformed: readonly MalformedLibraryRecord[]
}

export class SongLibrary extends Context.Tag("SongLibrary")<SongLibrary, SongLibraryShape>() {}

// --- Schemas ---

const SongIdSchema = z
  .union([z.string().trim().min(1), z.number().int()])
  .transform(value => String(value))

const HymnNumberSchema = z.union([
  z.number().int().nonnegative(),
  z
    .string()
    .trim()
    .regex(/^\d+$/, "must be a whole number")
    .transform(value => Number.parseInt(value, 10)),
])

const SongEntrySchema = z.object({
  id: SongIdSchema,
  title: z.string().nullish(),
  lyrics: z.string().nullish(),
  number: HymnNumberSchema.nullish(),
})

// A book maps song ids (object keys) to hymn numbers
const BookSchema = z.object({
  songs: z.record(z.union([z.string(), z.number()])),
})

type Book = z.infer<typeof BookSchema>

const noBooks: readonly Book[] = []

const LibraryFileSchema = z.union([
  z.array(z.unknown()).transform(songs => ({ songs, books: noBooks })),
  z.object({
    songs: z.array(z.unknown()),
    books: z.array(BookSchema).default([]),
  }),
])

// --- Parsing ---

export interface ParsedLibrary {
  readonly songs: readonly SongRecord[]
  readonly malformed: readonly MalformedLibraryRecord[]
}

function bookNumbers(books: readonly Book[]): Map<string, number> {
  const numbers = new Map<string, number>()
  const [firstBook] = books
  if (!firstBook) return numbers

  for (const [songId, hymn] of Object.entries(firstBook.songs)) {
    const parsed = HymnNumberSchema.safeParse(hymn)
    if (parsed.success) numbers.set(songId, parsed.data)
  }
  return numbers
}

function rawId(entry: unknown): string | null {
  if (typeof entry !== "object" || entry === null || !("id" in entry)) return null
  const { id } = entry
  return typeof id === "string" || typeof id === "number" ? String(id) : null
}

function describeIssues(error: z.ZodError): string {
  const [issue] = error.issues
  if (!issue) return "invalid song entry"
  const field = issue.path.join(".")
  if (field === "id") return "missing or invalid id"
  return field ? `${field}: ${issue.message}` : issue.message
}

/**
 * Validate a decoded library file. Bad entries are skipped and reported; only
 * a file without a song list fails.
 */
export function parseLibraryData(data: unknown): ParsedLibrary | null {
  const file = LibraryFileSchema.safeParse(data)
  if (!file.success) return null

  const numbers = bookNumbers(file.data.books)
  const songs: SongRecord[] = []
  const malformed: MalformedLibraryRecord[] = []
  const seen = new Set<string>()

  file.data.songs.forEach((entry, i) => {
    const position = i + 1
    const parsed = SongEntrySchema.safeParse(entry)
    if (!parsed.success) {
      malformed.push(
        new MalformedLibraryRecord({
          position,
          id: rawId(entry),
          reason: describeIssues(parsed.error),
        }),
      )
      return
    }

    const { id } = parsed.data
    const title = parsed.data.title?.trim() ?? ""
    const lyrics = parsed.data.lyrics ?? ""

    if (!title && !lyrics.trim()) {
      malformed.push(new MalformedLibraryRecord({ position, id, reason: "no title or lyrics" }))
      return
    }
    if (seen.has(id)) {
      malformed.push(new MalformedLibraryRecord({ position, id, reason: "duplicate id" }))
      return
    }
    seen.add(id)

    songs.push({
      id,
      number: parsed.data.number ?? numbers.get(id) ?? null,
      title: title || firstContentLine(lyrics) || `Song ${id}`,
      lyrics,
    })
  })

  return { songs, malformed }
}

// --- Service ---

export const makeSongLibrary = (
  songs: readonly SongRecord[],
  malformed: readonly MalformedLibraryRecord[] = [],
): SongLibraryShape => ({ songs, malformed })

export const loadSongLibrary = (path: string) =>
  Effect.gen(function* () {
    const text = yield* Effect.tryPromise({
      try: () => readFile(path, "utf8"),
      catch: cause => new LibraryLoadError({ path, message: formatCause(cause), cause }),
    })

    const data = yield* Effect.try({
      try: (): unknown => JSON.parse(text),
      catch: cause => new LibraryLoadError({ path, message: "not valid JSON", cause }),
    })

    const parsed = parseLibraryData(data)
    if (!parsed) {
      return yield* new LibraryLoadError({
        path,
        message: "expected a list of songs or an object with a songs list",
      })
    }

    for (const record of parsed.malformed) {
      const label = record.id ? `${record.position} (id ${record.id})` : `${record.position}`
      yield* Effect.logWarning(`[SongLibrary] Skipped entry ${label}: ${record.reason}`)
    }
    yield* Effect.logInfo(`[SongLibrary] Loaded ${parsed.songs.length} songs from ${path}`)

    return makeSongLibrary(parsed.songs, parsed.malformed)
  })

export const SongLibraryLive = Layer.effect(
  SongLibrary,
  Effect.flatMap(CompilerConfig, config => loadSongLibrary(config.libraryPath)),
)

export const makeSongLibraryLayer = (songs: readonly SongRecord[]) =>
  Layer.succeed(SongLibrary, makeSongLibrary(songs))
