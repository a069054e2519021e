import { describe, expect, test } from "vitest"
import {
  cleanLyrics,
  firstContentLine,
  parseLyrics,
  repeatSoleChorus,
  splitSection,
} from "../lyrics-parser"
import { chorus, verse } from "../song-types"

const numberedLines = (count: number) =>
  Array.from({ length: count }, (_, i) => `line ${i + 1}`)

describe("cleanLyrics", () => {
  test("drops comment lines and chord annotations", () => {
    const text = "# Key: G\n1. [G]Amazing [D]grace\nhow [C]sweet\n[G] [D]\n\n  [Am]Praise him"

    expect(cleanLyrics(text)).toBe("1. Amazing grace\nhow sweet\n\n  Praise him")
  })

  test("normalizes line endings and trims surrounding blank lines", () => {
    expect(cleanLyrics("\r\n\r\n1. one  \r\n  two\r\n\r\n")).toBe("1. one\n  two")
  })
})

describe("firstContentLine", () => {
  test("skips labels and the verse number", () => {
    expect(firstContentLine("Verse 1:\n1. [G]Amazing grace\nhow sweet")).toBe("Amazing grace")
  })

  test("returns an empty string when there is no content", () => {
    expect(firstContentLine("# only a comment")).toBe("")
  })
})

describe("parseLyrics", () => {
  test("repeats a sole chorus after every verse", () => {
    const result = parseLyrics("1. line one\nline two\n\n  chorus one\n  chorus two\n\n2. line three")

    expect(result.sections).toEqual([
      verse(1, ["line one", "line two"]),
      chorus(["chorus one", "chorus two"]),
      verse(2, ["line three"]),
      chorus(["chorus one", "chorus two"]),
    ])
    expect(result.chorusCount).toBe(1)
    expect(result.needsAttention).toBe(false)
    expect(result.warnings).toEqual([])
  })

  test("parses the same text to the same sections every time", () => {
    const text = "1. line one\nline two\n\n  chorus one\n\n2. line three"

    expect(parseLyrics(text)).toEqual(parseLyrics(text))
  })

  test("drops written-out repeats of the chorus", () => {
    const result = parseLyrics("1. a\n\n  c\n\n2. b\n\n  c\n\n3. d")

    expect(result.sections).toEqual([
      verse(1, ["a"]),
      chorus(["c"]),
      verse(2, ["b"]),
      chorus(["c"]),
      verse(3, ["d"]),
      chorus(["c"]),
    ])
  })

  test("keeps a chorus that opens the song in front", () => {
    const result = parseLyrics("  c\n\n1. a\n\n2. b")

    expect(result.sections).toEqual([
      chorus(["c"]),
      verse(1, ["a"]),
      chorus(["c"]),
      verse(2, ["b"]),
      chorus(["c"]),
    ])
  })

  test("keeps source order when there are several choruses", () => {
    const result = parseLyrics("1. a\n\n  first chorus\n\n2. b\n\n  second chorus")

    expect(result.sections).toEqual([
      verse(1, ["a"]),
      chorus(["first chorus"]),
      verse(2, ["b"]),
      chorus(["second chorus"]),
    ])
    expect(result.chorusCount).toBe(2)
  })

  test("leaves the chorus where it is when repetition is off", () => {
    const result = parseLyrics("1. a\n\n  c\n\n2. b", { repeatChorus: false })

    expect(result.sections).toEqual([verse(1, ["a"]), chorus(["c"]), verse(2, ["b"])])
  })

  test("splits a 20-line verse into 9, 9 and 2 lines", () => {
    const result = parseLyrics(`1. ${numberedLines(20).join("\n")}`)

    expect(result.sections.map(section => section.lines.length)).toEqual([9, 9, 2])
    expect(result.sections.every(section => section._tag === "Verse" && section.index === 1)).toBe(
      true,
    )
    expect(result.sections[2]?.lines).toEqual(["line 19", "line 20"])
  })

  test("honors a custom section length", () => {
    const result = parseLyrics(`1. ${numberedLines(5).join("\n")}`, { maxSectionLines: 2 })

    expect(result.sections.map(section => section.lines.length)).toEqual([2, 2, 1])
  })

  test("reads Verse and Chorus label lines", () => {
    const result = parseLyrics("Verse 1:\nline a\n\nChorus\nline c\n\nVerse 2\nline b")

    expect(result.sections).toEqual([
      verse(1, ["line a"]),
      chorus(["line c"]),
      verse(2, ["line b"]),
      chorus(["line c"]),
    ])
  })

  test("removes chords and comments before parsing", () => {
    const result = parseLyrics("# Key: G\n1. [G]Amazing [D]grace\nhow [C]sweet\n\n  [Am]Praise him")

    expect(result.sections).toEqual([
      verse(1, ["Amazing grace", "how sweet"]),
      chorus(["Praise him"]),
    ])
  })

  test("does not read a decimal number as a verse number", () => {
    const result = parseLyrics("3.14 is not a verse")

    expect(result.sections).toEqual([chorus(["3.14 is not a verse"])])
    expect(result.warnings).toEqual(["Unlabeled block 1 treated as the chorus"])
  })

  test("treats the only unlabeled block as the chorus", () => {
    const result = parseLyrics("1. a\n\nsing along\n\n2. b")

    expect(result.sections).toEqual([
      verse(1, ["a"]),
      chorus(["sing along"]),
      verse(2, ["b"]),
      chorus(["sing along"]),
    ])
    expect(result.warnings).toEqual(["Unlabeled block 2 treated as the chorus"])
  })

  test("appends other unlabeled blocks to the nearest verse before them", () => {
    const result = parseLyrics("1. a\n\n  c\n\nd\n\n2. b\n\n  c2")

    expect(result.sections).toEqual([
      verse(1, ["a", "d"]),
      chorus(["c"]),
      verse(2, ["b"]),
      chorus(["c2"]),
    ])
    expect(result.warnings).toEqual(["Unlabeled block 3 appended to verse 1"])
  })

  test("starts an unnumbered verse when no verse comes before", () => {
    const result = parseLyrics("  c\n\nd\n\n  e")

    expect(result.sections).toEqual([chorus(["c"]), verse(null, ["d"]), chorus(["e"])])
    expect(result.warnings).toEqual(["Unlabeled block 2 treated as an unnumbered verse"])
  })

  test("applies a label on its own to the block after it", () => {
    const result = parseLyrics("1. a\n\nChorus:\n\nsing along\n\n2. b")

    expect(result.sections).toEqual([
      verse(1, ["a"]),
      chorus(["sing along"]),
      verse(2, ["b"]),
      chorus(["sing along"]),
    ])
    expect(result.chorusCount).toBe(1)
    expect(result.warnings).toEqual([])
  })

  test("drops a label with nothing under it", () => {
    const result = parseLyrics("1. a\n\nChorus:")

    expect(result.sections).toEqual([verse(1, ["a"])])
    expect(result.chorusCount).toBe(0)
    expect(result.warnings).toEqual(["Dropped empty chorus block 2"])
  })

  test("flags text without sections", () => {
    expect(parseLyrics("")).toEqual({
      sections: [],
      chorusCount: 0,
      needsAttention: true,
      warnings: [],
    })
    expect(parseLyrics("# lyrics still to be typed in").needsAttention).toBe(true)
  })
})

describe("repeatSoleChorus", () => {
  test("leaves a chorus-only song alone", () => {
    const sections = [chorus(["c"])]

    expect(repeatSoleChorus(sections)).toBe(sections)
  })
})

describe("splitSection", () => {
  test("keeps the kind of the section", () => {
    const lines = numberedLines(10)

    expect(splitSection(chorus(lines), 4)).toEqual([
      chorus(lines.slice(0, 4)),
      chorus(lines.slice(4, 8)),
      chorus(lines.slice(8)),
    ])
  })

  test("returns short sections unchanged", () => {
    const section = verse(2, ["one", "two"])

    expect(splitSection(section, 9)).toEqual([section])
  })
})
