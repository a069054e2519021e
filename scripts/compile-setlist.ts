import {
  alphabeticalIndex,
  describeCompilerError,
  describeIssues,
  isCompilerError,
  runCompilation,
  summarizeSetlist,
} from "@/lib"
import { AppLayer, loadCompilerConfig, makeLoggingLayer } from "@/services"
import { Cause, Effect, Exit, Option } from "effect"

// Usage: tsx scripts/compile-setlist.ts [targets.txt] [output.json]
const [targetsPath, outputPath] = process.argv.slice(2)

async function main() {
  const config = loadCompilerConfig()

  const program = runCompilation({ targetsPath, outputPath }).pipe(
    Effect.provide(AppLayer),
    Effect.provide(makeLoggingLayer(config.logLevel)),
  )

  const exit = await Effect.runPromiseExit(program)

  if (Exit.isSuccess(exit)) {
    const setlist = exit.value
    console.log("\nSummary")
    for (const line of summarizeSetlist(setlist)) console.log(`  ${line}`)

    const issues = describeIssues(setlist)
    if (issues.length > 0) {
      console.log("\nNeeds review")
      for (const line of issues) console.log(`  ${line}`)
    }

    console.log("\nIndex")
    for (const entry of alphabeticalIndex(setlist.songs)) {
      console.log(`  ${entry.title} (line ${entry.lineNumber})`)
    }
    return
  }

  const failure = Cause.failureOption(exit.cause)
  if (Option.isSome(failure) && isCompilerError(failure.value)) {
    console.error(describeCompilerError(failure.value))
  } else {
    console.error(Cause.pretty(exit.cause))
  }
  process.exitCode = 1
}

main().catch(error => {
  console.error(error)
  process.exitCode = 1
})
