import * as readline from "node:readline"
import { DISPLAY_LIMITS } from "@/constants/limits"
import { cleanLyrics } from "@/lib/lyrics-parser"
import type { ScoredSong } from "@/lib/match-types"
import type { Query } from "@/lib/song-types"
import { Context, Data, Effect, Layer } from "effect"
import { CompilerConfig } from "./compiler-config"

export class Chosen extends Data.TaggedClass("Chosen")<{
  readonly songId: string
}> {}

export class Skip extends Data.TaggedClass("Skip")<object> {}

export type Choice = Chosen | Skip

/**
 * Answers "which of these songs did the user mean?"
 *
 * Asked at most once per ambiguous target line; the answer is remembered in
 * the selection cache by the matcher.
 */
export class AmbiguityResolver extends Context.Tag("AmbiguityResolver")<
  AmbiguityResolver,
  {
    readonly choose: (query: Query, candidates: readonly ScoredSong[]) => Effect.Effect<Choice>
  }
>() {}

function lyricSnippet(lyrics: string): string {
  const flat = cleanLyrics(lyrics).replace(/\s+/g, " ").trim()
  return flat.length > DISPLAY_LIMITS.CANDIDATE_SNIPPET
    ? `${flat.slice(0, DISPLAY_LIMITS.CANDIDATE_SNIPPET)}...`
    : flat
}

function formatCandidates(query: Query, candidates: readonly ScoredSong[]): string {
  const lines = [`\nTarget: ${query.raw} (${candidates.length} candidates)\n`]
  candidates.forEach((candidate, i) => {
    const number = candidate.song.number === null ? "" : ` #${candidate.song.number}`
    lines.push(
      `  [${i + 1}] ${candidate.song.title}${number} (ID: ${candidate.song.id}, score ${candidate.score.toFixed(2)})`,
    )
    lines.push(`      ${lyricSnippet(candidate.song.lyrics)}`)
  })
  return lines.join("\n")
}

/**
 * Interpret one answer. `null` means the answer was not understood.
 */
export function parseAnswer(answer: string, candidates: readonly ScoredSong[]): Choice | null {
  const trimmed = answer.trim().toLowerCase()
  if (trimmed === "" || trimmed === "s" || trimmed === "skip") return new Skip({})
  if (!/^\d+$/.test(trimmed)) return null

  const candidate = candidates[Number.parseInt(trimmed, 10) - 1]
  return candidate ? new Chosen({ songId: candidate.song.id }) : null
}

const PROMPT = (count: number) => `Select the correct song [1-${count}], or s to skip: `

// Closed input (Ctrl-D, piped stdin at EOF) reads as null
const nextLine = (lines: AsyncIterator<string>) =>
  Effect.promise(() => lines.next()).pipe(Effect.map(next => (next.done ? null : next.value)))

/**
 * Prompt on `output` and read answers from `input`. One line reader serves
 * every question of a run, so answers piped in ahead of time are consumed one
 * per line.
 */
export const makeConsoleAmbiguityResolverLayer = (
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
) =>
  Layer.scoped(
    AmbiguityResolver,
    Effect.gen(function* () {
      const lines = yield* Effect.acquireRelease(
        Effect.sync(() => {
          const rl = readline.createInterface({ input, terminal: false })
          return { rl, iterator: rl[Symbol.asyncIterator]() }
        }),
        ({ rl }) => Effect.sync(() => rl.close()),
      ).pipe(Effect.map(({ iterator }) => iterator))
      const write = (text: string) => Effect.sync(() => output.write(text))

      const askUntilAnswered = (candidates: readonly ScoredSong[]) =>
        Effect.gen(function* () {
          while (true) {
            yield* write(PROMPT(candidates.length))
            const answer = yield* nextLine(lines)
            if (answer === null) {
              yield* write("\n")
              return new Skip({})
            }
            const choice = parseAnswer(answer, candidates)
            if (choice) return choice
            yield* write("Invalid choice. Try again.\n")
          }
        })

      return AmbiguityResolver.of({
        choose: (query, candidates) =>
          Effect.gen(function* () {
            yield* write(`${formatCandidates(query, candidates)}\n`)
            const choice: Choice = yield* askUntilAnswered(candidates)
            if (choice._tag === "Chosen") {
              const chosen = candidates.find(candidate => candidate.song.id === choice.songId)
              yield* write(`Selected: ${chosen?.song.title ?? choice.songId}\n\n`)
            }
            return choice
          }),
      })
    }),
  )

export const ConsoleAmbiguityResolverLive = Layer.suspend(() =>
  makeConsoleAmbiguityResolverLayer(process.stdin, process.stdout),
)

export const NonInteractiveAmbiguityResolverLive = Layer.succeed(AmbiguityResolver, {
  choose: (query, candidates) =>
    Effect.logWarning(
      `[Resolver] Skipping "${query.raw}": ${candidates.length} candidates and no interactive input`,
    ).pipe(Effect.as<Choice>(new Skip({}))),
})

/**
 * Console prompt when SONGBOOK_INTERACTIVE is on, otherwise skip every
 * ambiguous line
 */
export const AmbiguityResolverLive = Layer.unwrapEffect(
  Effect.map(CompilerConfig, config =>
    config.interactive ? ConsoleAmbiguityResolverLive : NonInteractiveAmbiguityResolverLive,
  ),
)

/**
 * Deterministic answers keyed by the raw target line. A song id selects that
 * candidate; `null` or a missing key skips. Every question asked is recorded
 * in `asked`.
 */
export function makeScriptedAmbiguityResolver(answers: Readonly<Record<string, string | null>>) {
  const asked: Query[] = []

  const layer = Layer.succeed(AmbiguityResolver, {
    choose: query =>
      Effect.sync((): Choice => {
        asked.push(query)
        const answer = answers[query.raw]
        return answer ? new Chosen({ songId: answer }) : new Skip({})
      }),
  })

  return { layer, asked }
}
