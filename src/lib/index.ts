// Library exports

export {
  LibraryLoadError,
  OutputWriteError,
  SelectionCacheError,
  TargetListError,
  describeCompilerError,
  formatCause,
  isCompilerError,
  type CompilerError,
} from "./errors"

export {
  MalformedLibraryRecord,
  UNMATCHED_REASON_LABELS,
  type UnmatchedQuery,
  type UnmatchedReason,
} from "./issues"

export {
  DEFAULT_MAX_SECTION_LINES,
  cleanLyrics,
  firstContentLine,
  parseLyrics,
  repeatSoleChorus,
  splitSection,
  type LyricsParseOptions,
  type ParsedLyrics,
} from "./lyrics-parser"

export {
  Ambiguous,
  MATCH_KIND_LABELS,
  Matched,
  Unmatched,
  type MatchKind,
  type MatchResult,
  type ResolvedMatch,
  type ScoredSong,
} from "./match-types"

export { normalizeText, selectionKey } from "./normalize-text"

export { parseTargetLine, parseTargetList } from "./reference-resolver"

export {
  compileSetlist,
  compileTargets,
  runCompilation,
  type CompileOptions,
  type CompileRunPaths,
  type CompiledSetlist,
  type CompiledSong,
} from "./setlist-compiler"

export {
  alphabeticalIndex,
  describeIssues,
  summarizeSetlist,
  toRendererJson,
  type IndexEntry,
} from "./setlist-report"

export { calculateSimilarity, levenshteinDistance, similarityRatio } from "./similarity"

export {
  DEFAULT_FUZZY_THRESHOLD,
  findCandidates,
  resolveQuery,
  scoreSong,
  type MatchOptions,
} from "./song-matcher"

export {
  chorus,
  verse,
  type Query,
  type Section,
  type SectionKind,
  type SongRecord,
  type TargetLine,
} from "./song-types"
