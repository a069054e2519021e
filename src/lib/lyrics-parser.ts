/**
 * Songbook lyrics parser
 *
 * Parses the plain-text songbook format into presentation sections:
 *
 *   1. Amazing grace! how sweet the sound      numbered verse
 *   That saved a wretch like me!
 *
 *       Praise the Lord, praise the Lord       indented chorus
 *
 *   2. 'Twas grace that taught my heart to fear
 *
 * Blocks are separated by blank lines. Lines starting with "#" are comments and
 * bracketed chords ("[G]", "[D/F#]") are removed before parsing.
 */

import { DEFAULT_MAX_SECTION_LINES, DEFAULT_REPEAT_CHORUS } from "@/constants"
import { type Section, chorus, verse } from "./song-types"

export { DEFAULT_MAX_SECTION_LINES }

export interface LyricsParseOptions {
  /** Sections longer than this are split into consecutive sections */
  readonly maxSectionLines?: number | undefined
  /** Insert a song's only chorus after every verse */
  readonly repeatChorus?: boolean | undefined
}

export interface ParsedLyrics {
  /** Final presentation order */
  readonly sections: readonly Section[]
  /** Number of distinct chorus texts in the source */
  readonly chorusCount: number
  /** True when the text produced no sections at all */
  readonly needsAttention: boolean
  /** Formatting guesses worth a human look */
  readonly warnings: readonly string[]
}

const CHORD = /\[[^\]]*\]/g
const CHORUS_LABEL = /^(?:chorus|refrain)(?:\s*\d+)?\s*:?$/i
const VERSE_LABEL = /^verse(?:\s*(\d+))?\s*:?$/i
const VERSE_NUMBER = /^(\d+)\.(?!\d)\s*(.*)$/
const INDENTED = /^[ \t]/

type Block = { readonly position: number } & (
  | { readonly kind: "verse"; readonly index: number | null; readonly lines: string[] }
  | { readonly kind: "chorus"; readonly lines: string[] }
  | { readonly kind: "unlabeled"; readonly lines: string[] }
)

type Draft =
  | { readonly kind: "verse"; readonly index: number | null; readonly lines: string[] }
  | { readonly kind: "chorus"; readonly lines: string[] }

// --- Cleaning ---

/**
 * Remove comment lines and chord annotations. Leading indentation is kept
 * because it marks choruses; trailing whitespace and surrounding blank lines
 * are dropped.
 */
export function cleanLyrics(text: string): string {
  const cleaned: string[] = []

  for (const line of text.replace(/\r\n?/g, "\n").split("\n")) {
    if (line.trimStart().startsWith("#")) continue

    const withoutChords = line.replace(CHORD, "").trimEnd()
    // A chord-only line is not a block separator
    if (withoutChords.trim() === "" && line.trim() !== "") continue

    cleaned.push(withoutChords)
  }

  while (cleaned.length > 0 && cleaned[0]?.trim() === "") cleaned.shift()
  while (cleaned.length > 0 && cleaned[cleaned.length - 1]?.trim() === "") cleaned.pop()

  return cleaned.join("\n")
}

/**
 * First line a reader would see, used for songs indexed by their opening line.
 * Labels and a leading verse number are skipped.
 */
export function firstContentLine(text: string): string {
  for (const line of cleanLyrics(text).split("\n")) {
    const trimmed = line.trim()
    if (!trimmed || CHORUS_LABEL.test(trimmed) || VERSE_LABEL.test(trimmed)) continue

    const numbered = trimmed.match(VERSE_NUMBER)
    const content = numbered ? (numbered[2] ?? "").trim() : trimmed
    if (content) return content
  }
  return ""
}

// --- Blocks ---

function splitBlocks(text: string): string[][] {
  const blocks: string[][] = []
  let current: string[] = []

  for (const line of text.split("\n")) {
    if (line.trim() === "") {
      if (current.length > 0) blocks.push(current)
      current = []
      continue
    }
    current.push(line)
  }
  if (current.length > 0) blocks.push(current)

  return blocks
}

function trimLines(lines: readonly string[]): string[] {
  return lines.map(line => line.trim()).filter(line => line !== "")
}

function classifyBlock(lines: readonly string[], i: number): Block {
  const position = i + 1
  const first = lines[0] ?? ""
  const label = first.trim()

  if (CHORUS_LABEL.test(label)) {
    return { position, kind: "chorus", lines: trimLines(lines.slice(1)) }
  }

  const verseLabel = label.match(VERSE_LABEL)
  if (verseLabel) {
    const index = verseLabel[1] ? Number.parseInt(verseLabel[1], 10) : null
    return { position, kind: "verse", index, lines: trimLines(lines.slice(1)) }
  }

  const numbered = label.match(VERSE_NUMBER)
  if (numbered) {
    const index = Number.parseInt(numbered[1] ?? "0", 10)
    const rest = numbered[2] ?? ""
    return { position, kind: "verse", index, lines: trimLines([rest, ...lines.slice(1)]) }
  }

  if (lines.every(line => INDENTED.test(line))) {
    return { position, kind: "chorus", lines: trimLines(lines) }
  }

  return { position, kind: "unlabeled", lines: trimLines(lines) }
}

/**
 * A label standing alone in its block names the unlabeled block after it
 */
function attachLabels(blocks: readonly Block[]): Block[] {
  const attached: Block[] = []

  for (const block of blocks) {
    const previous = attached[attached.length - 1]
    const emptyLabel = previous?.kind !== "unlabeled" && previous?.lines.length === 0
    if (block.kind === "unlabeled" && previous && emptyLabel) {
      attached[attached.length - 1] = { ...previous, lines: block.lines }
      continue
    }
    attached.push(block)
  }

  return attached
}

function lastVerse(drafts: readonly Draft[]): Extract<Draft, { kind: "verse" }> | undefined {
  for (let i = drafts.length - 1; i >= 0; i--) {
    const draft = drafts[i]
    if (draft?.kind === "verse") return draft
  }
  return undefined
}

/**
 * Decide what unlabeled blocks are. A song's only non-verse block is its
 * chorus. Otherwise an unlabeled block continues the nearest verse before it,
 * or starts an unnumbered verse when no verse precedes it.
 */
function resolveBlocks(blocks: readonly Block[], warnings: string[]): Draft[] {
  const nonVerseCount = blocks.filter(
    block => block.kind !== "verse" && block.lines.length > 0,
  ).length
  const drafts: Draft[] = []

  for (const block of blocks) {
    const position = `block ${block.position}`

    if (block.lines.length === 0) {
      warnings.push(`Dropped empty ${block.kind} ${position}`)
      continue
    }

    switch (block.kind) {
      case "verse":
        drafts.push({ kind: "verse", index: block.index, lines: [...block.lines] })
        break
      case "chorus":
        drafts.push({ kind: "chorus", lines: [...block.lines] })
        break
      case "unlabeled": {
        if (nonVerseCount === 1) {
          drafts.push({ kind: "chorus", lines: [...block.lines] })
          warnings.push(`Unlabeled ${position} treated as the chorus`)
          break
        }
        const target = lastVerse(drafts)
        if (target) {
          target.lines.push(...block.lines)
          const label = target.index === null ? "the previous verse" : `verse ${target.index}`
          warnings.push(`Unlabeled ${position} appended to ${label}`)
          break
        }
        drafts.push({ kind: "verse", index: null, lines: [...block.lines] })
        warnings.push(`Unlabeled ${position} treated as an unnumbered verse`)
        break
      }
    }
  }

  return drafts
}

// --- Ordering and size ---

function chorusKey(section: Section): string {
  return section.lines.join("\n")
}

/**
 * With exactly one distinct chorus, drop its written-out repeats and sing it
 * after every verse. A chorus that opens the song stays in front.
 */
export function repeatSoleChorus(sections: readonly Section[]): readonly Section[] {
  const choruses = sections.filter(section => section._tag === "Chorus")
  const distinct = new Set(choruses.map(chorusKey))
  const soleChorus = choruses[0]

  if (distinct.size !== 1 || !soleChorus) return sections
  if (!sections.some(section => section._tag === "Verse")) return sections

  const result: Section[] = sections[0]?._tag === "Chorus" ? [soleChorus] : []
  for (const section of sections) {
    if (section._tag === "Verse") {
      result.push(section, soleChorus)
    }
  }
  return result
}

/**
 * Split a section into consecutive sections of at most `maxLines` lines.
 * Parts keep the kind and verse index of the original.
 */
export function splitSection(section: Section, maxLines: number): Section[] {
  const limit = Math.max(1, Math.floor(maxLines))
  if (section.lines.length <= limit) return [section]

  const parts: Section[] = []
  for (let start = 0; start < section.lines.length; start += limit) {
    const lines = section.lines.slice(start, start + limit)
    parts.push(section._tag === "Verse" ? verse(section.index, lines) : chorus(lines))
  }
  return parts
}

// --- Entry point ---

/**
 * Parse raw lyric text into presentation sections
 */
export function parseLyrics(text: string, options: LyricsParseOptions = {}): ParsedLyrics {
  const maxSectionLines = options.maxSectionLines ?? DEFAULT_MAX_SECTION_LINES
  const repeatChorus = options.repeatChorus ?? DEFAULT_REPEAT_CHORUS
  const warnings: string[] = []

  const blocks = attachLabels(splitBlocks(cleanLyrics(text)).map(classifyBlock))
  const drafts = resolveBlocks(blocks, warnings)

  const sections = drafts.map(draft =>
    draft.kind === "verse" ? verse(draft.index, draft.lines) : chorus(draft.lines),
  )
  const chorusCount = new Set(
    sections.filter(section => section._tag === "Chorus").map(chorusKey),
  ).size

  const ordered = repeatChorus ? repeatSoleChorus(sections) : sections
  const split = ordered.flatMap(section => splitSection(section, maxSectionLines))

  return {
    sections: split,
    chorusCount,
    needsAttention: split.length === 0,
    warnings,
  }
}
