/**
 * Shared song, query and section types
 */

/**
 * A song as the library provides it. Read-only to the compiler.
 */
export interface SongRecord {
  readonly id: string
  /** Hymn number in the songbook, when the song has one */
  readonly number: number | null
  readonly title: string
  /** Raw lyric text: blank-line separated blocks, "N." verses, indented choruses */
  readonly lyrics: string
}

/**
 * Structured form of one target line
 */
export interface Query {
  /** The trimmed target line as the user wrote it */
  readonly raw: string
  readonly number: number | null
  readonly title: string | null
}

/**
 * A query with its position in the target file (1-based, blank lines counted)
 */
export interface TargetLine {
  readonly lineNumber: number
  readonly query: Query
}

/**
 * Presentation section, tagged union pattern (Effect.ts style).
 * `lines` is never empty and holds no blank lines.
 */
export type Section =
  | {
      readonly _tag: "Verse"
      /** Number printed before the verse ("3."), null for unnumbered verses */
      readonly index: number | null
      readonly lines: readonly string[]
    }
  | {
      readonly _tag: "Chorus"
      readonly lines: readonly string[]
    }

export type SectionKind = Section["_tag"]

export const verse = (index: number | null, lines: readonly string[]): Section => ({
  _tag: "Verse",
  index,
  lines,
})

export const chorus = (lines: readonly string[]): Section => ({
  _tag: "Chorus",
  lines,
})
