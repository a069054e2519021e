import { mkdir, readFile, writeFile } from "node:fs/promises"
import { dirname } from "node:path"
import { OutputWriteError, TargetListError } from "@/lib/errors"
import { Effect } from "effect"

export const readTargetList = (path: string) =>
  Effect.tryPromise({
    try: () => readFile(path, "utf8"),
    catch: cause => new TargetListError({ path, cause }),
  })

/**
 * Write the renderer's JSON, creating the parent directory when needed
 */
export const writeCompiledSetlist = (path: string, data: unknown) =>
  Effect.tryPromise({
    try: async () => {
      await mkdir(dirname(path), { recursive: true })
      await writeFile(path, `${JSON.stringify(data, null, 2)}\n`, "utf8")
    },
    catch: cause => new OutputWriteError({ path, cause }),
  }).pipe(Effect.tap(() => Effect.logInfo(`[Output] Wrote ${path}`)))
