/**
 * Target list parsing
 *
 * Turns the lines of a setlist file into queries. Accepted forms:
 *   512                        hymn number only
 *   512 God Is Good            number followed by a title
 *   Amazing Grace (Hymn 999)   title with a parenthesised hymn number
 *   Amazing Grace              title only
 */

import type { Query, TargetLine } from "./song-types"

const NUMBER_ONLY = /^(\d+)$/
const NUMBER_THEN_TITLE = /^(\d+)\s+(.+)$/
const TITLE_THEN_HYMN = /^(.*?)\s*\(hymns?,?\s*(\d+)\)\s*$/i

function toNumber(digits: string | undefined): number | null {
  if (!digits) return null
  const value = Number.parseInt(digits, 10)
  return Number.isSafeInteger(value) ? value : null
}

/**
 * Parse one trimmed, non-empty target line. Never fails: anything that does
 * not fit a numbered form is treated as a title.
 */
export function parseTargetLine(line: string): Query {
  const raw = line.trim()

  const numberOnly = raw.match(NUMBER_ONLY)
  if (numberOnly) {
    const number = toNumber(numberOnly[1])
    if (number !== null) return { raw, number, title: null }
  }

  const numberThenTitle = raw.match(NUMBER_THEN_TITLE)
  if (numberThenTitle) {
    const number = toNumber(numberThenTitle[1])
    const title = numberThenTitle[2]?.trim()
    if (number !== null && title) return { raw, number, title }
  }

  const titleThenHymn = raw.match(TITLE_THEN_HYMN)
  if (titleThenHymn) {
    const number = toNumber(titleThenHymn[2])
    const title = titleThenHymn[1]?.trim()
    if (number !== null && title) return { raw, number, title }
  }

  return { raw, number: null, title: raw }
}

/**
 * Parse a whole target file. Blank lines are skipped but still counted, so
 * line numbers match what the user sees in an editor.
 */
export function parseTargetList(text: string): TargetLine[] {
  const targets: TargetLine[] = []
  const lines = text.split(/\r?\n/)

  for (let i = 0; i < lines.length; i++) {
    const trimmed = lines[i]?.trim()
    if (!trimmed) continue
    targets.push({ lineNumber: i + 1, query: parseTargetLine(trimmed) })
  }

  return targets
}
