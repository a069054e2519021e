import { randomUUID } from "node:crypto"
import { readFile, rename, writeFile } from "node:fs/promises"
import { SelectionCacheError, formatCause } from "@/lib/errors"
import { Context, Effect, Layer } from "effect"
import { z } from "zod"
import { CompilerConfig } from "./compiler-config"

/**
 * Remembered answers to ambiguous target lines, keyed by normalized query text
 */
export class SelectionCache extends Context.Tag("SelectionCache")<
  SelectionCache,
  {
    readonly get: (key: string) => Effect.Effect<string | null>
    readonly set: (key: string, songId: string) => Effect.Effect<void, SelectionCacheError>
    readonly entries: Effect.Effect<Readonly<Record<string, string>>>
  }
>() {}

// Older cache files stored numeric song ids as numbers
const SelectionFileSchema = z.record(
  z.union([z.string(), z.number()]).transform(value => String(value)),
)

const isMissingFile = (cause: unknown): boolean =>
  cause instanceof Error && "code" in cause && cause.code === "ENOENT"

// --- In-memory ---

export const makeInMemorySelectionCache = (
  initial: Readonly<Record<string, string>> = {},
) => {
  const selections = new Map(Object.entries(initial))

  return Layer.succeed(SelectionCache, {
    get: key => Effect.sync(() => selections.get(key) ?? null),
    set: (key, songId) =>
      Effect.sync(() => {
        selections.set(key, songId)
      }),
    entries: Effect.sync(() => Object.fromEntries(selections)),
  })
}

// --- File-backed ---

const readSelections = (path: string) =>
  Effect.tryPromise({
    try: () => readFile(path, "utf8"),
    catch: cause => cause,
  }).pipe(
    Effect.flatMap(text =>
      Effect.try({
        try: () => SelectionFileSchema.parse(JSON.parse(text)),
        catch: cause => cause,
      }),
    ),
    Effect.catchAll(cause =>
      isMissingFile(cause)
        ? Effect.succeed<Record<string, string>>({})
        : Effect.logWarning(
            `[SelectionCache] Ignoring unreadable ${path}: ${formatCause(cause)}`,
          ).pipe(Effect.as<Record<string, string>>({})),
    ),
  )

const writeSelections = (path: string, selections: ReadonlyMap<string, string>) =>
  Effect.tryPromise({
    try: async () => {
      const tempPath = `${path}.${randomUUID()}.tmp`
      await writeFile(tempPath, `${JSON.stringify(Object.fromEntries(selections), null, 2)}\n`)
      await rename(tempPath, path)
    },
    catch: cause =>
      new SelectionCacheError({ path, message: formatCause(cause), cause }),
  })

/**
 * Selection cache persisted as a JSON object. The whole map is rewritten after
 * every decision; a failed write leaves the choice in memory for this run.
 */
export const makeFileSelectionCache = (path: string) =>
  Effect.gen(function* () {
    const selections = new Map(Object.entries(yield* readSelections(path)))
    const semaphore = yield* Effect.makeSemaphore(1)

    yield* Effect.logDebug(`[SelectionCache] Loaded ${selections.size} choices from ${path}`)

    return SelectionCache.of({
      get: key => semaphore.withPermits(1)(Effect.sync(() => selections.get(key) ?? null)),
      set: (key, songId) =>
        semaphore.withPermits(1)(
          Effect.gen(function* () {
            selections.set(key, songId)
            yield* writeSelections(path, selections)
          }),
        ),
      entries: semaphore.withPermits(1)(Effect.sync(() => Object.fromEntries(selections))),
    })
  })

export const SelectionCacheFileLive = Layer.effect(
  SelectionCache,
  Effect.flatMap(CompilerConfig, config => makeFileSelectionCache(config.selectionCachePath)),
)
