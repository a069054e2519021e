/**
 * End-of-run report and renderer output
 */

import { UNMATCHED_REASON_LABELS } from "./issues"
import { MATCH_KIND_LABELS, type MatchKind } from "./match-types"
import type { CompiledSetlist, CompiledSong } from "./setlist-compiler"

const MATCH_KINDS: readonly MatchKind[] = [
  "byNumber",
  "byExactTitle",
  "byFuzzyTitle",
  "byManualChoice",
]

export interface IndexEntry {
  readonly lineNumber: number
  readonly title: string
}

function percent(count: number, total: number): string {
  const share = total === 0 ? 0 : (count / total) * 100
  return `${share.toFixed(1)}%`
}

function summaryLine(label: string, lineNumbers: readonly number[], total: number): string {
  const lines = lineNumbers.length > 0 ? lineNumbers.join(", ") : "—"
  return `${label}: ${lineNumbers.length}/${total} (${percent(lineNumbers.length, total)}) → lines: ${lines}`
}

/**
 * One line per outcome category, in a fixed order
 */
export function summarizeSetlist(setlist: CompiledSetlist): string[] {
  const lines = MATCH_KINDS.map(kind =>
    summaryLine(
      `Matched by ${MATCH_KIND_LABELS[kind]}`,
      setlist.songs.filter(song => song.matchKind === kind).map(song => song.lineNumber),
      setlist.total,
    ),
  )

  lines.push(
    summaryLine(
      "Unmatched",
      setlist.unmatched.map(entry => entry.lineNumber),
      setlist.total,
    ),
  )
  lines.push(
    summaryLine(
      "Needs attention",
      setlist.needsAttention.map(song => song.lineNumber),
      setlist.total,
    ),
  )
  lines.push(`Malformed library records: ${setlist.malformed.length}`)

  return lines
}

/**
 * Details worth reading after the summary: unmatched lines and skipped records
 */
export function describeIssues(setlist: CompiledSetlist): string[] {
  const lines: string[] = []
  for (const entry of setlist.unmatched) {
    lines.push(`Line ${entry.lineNumber}: "${entry.query}" (${UNMATCHED_REASON_LABELS[entry.reason]})`)
  }
  for (const song of setlist.needsAttention) {
    lines.push(`Line ${song.lineNumber}: ${song.title} has no usable lyrics`)
  }
  for (const record of setlist.malformed) {
    const id = record.id === null ? "" : ` (id ${record.id})`
    lines.push(`Library entry ${record.position}${id}: ${record.reason}`)
  }
  return lines
}

/**
 * Matched songs by title, ignoring case; equal titles keep target order
 */
export function alphabeticalIndex(songs: readonly CompiledSong[]): IndexEntry[] {
  return songs
    .map(song => ({ lineNumber: song.lineNumber, title: song.title }))
    .sort((a, b) => {
      const byTitle = a.title.toLowerCase().localeCompare(b.title.toLowerCase())
      return byTitle !== 0 ? byTitle : a.lineNumber - b.lineNumber
    })
}

/**
 * Plain JSON for the slide renderer
 */
export function toRendererJson(setlist: CompiledSetlist) {
  return {
    songs: setlist.songs,
    unmatched: setlist.unmatched,
    needsAttention: setlist.needsAttention.map(song => ({
      lineNumber: song.lineNumber,
      songId: song.songId,
      title: song.title,
    })),
    malformed: setlist.malformed.map(record => ({
      position: record.position,
      id: record.id,
      reason: record.reason,
    })),
    index: alphabeticalIndex(setlist.songs),
  }
}
