import {
  DEFAULT_FUZZY_THRESHOLD,
  DEFAULT_LIBRARY_PATH,
  DEFAULT_MAX_SECTION_LINES,
  DEFAULT_OUTPUT_PATH,
  DEFAULT_REPEAT_CHORUS,
  DEFAULT_SELECTION_CACHE_PATH,
  DEFAULT_TARGETS_PATH,
} from "@/constants"
import { Config, Context, Effect, Layer, LogLevel } from "effect"
import { AppConfigProviderLive } from "./config-provider"

export interface CompilerConfigValues {
  readonly libraryPath: string
  readonly targetsPath: string
  readonly selectionCachePath: string
  readonly outputPath: string
  readonly fuzzyThreshold: number
  readonly maxSectionLines: number
  readonly repeatChorus: boolean
  readonly interactive: boolean
  readonly logLevel: LogLevel.LogLevel
}

export class CompilerConfig extends Context.Tag("CompilerConfig")<
  CompilerConfig,
  CompilerConfigValues
>() {}

const compilerConfig = Config.all({
  libraryPath: Config.nonEmptyString("SONGBOOK_LIBRARY_PATH").pipe(
    Config.withDefault(DEFAULT_LIBRARY_PATH),
  ),
  targetsPath: Config.nonEmptyString("SONGBOOK_TARGETS_PATH").pipe(
    Config.withDefault(DEFAULT_TARGETS_PATH),
  ),
  selectionCachePath: Config.nonEmptyString("SONGBOOK_SELECTION_CACHE_PATH").pipe(
    Config.withDefault(DEFAULT_SELECTION_CACHE_PATH),
  ),
  outputPath: Config.nonEmptyString("SONGBOOK_OUTPUT_PATH").pipe(
    Config.withDefault(DEFAULT_OUTPUT_PATH),
  ),
  fuzzyThreshold: Config.number("SONGBOOK_FUZZY_THRESHOLD").pipe(
    Config.validate({
      message: "Expected a similarity between 0 and 1",
      validation: value => value >= 0 && value <= 1,
    }),
    Config.withDefault(DEFAULT_FUZZY_THRESHOLD),
  ),
  maxSectionLines: Config.integer("SONGBOOK_MAX_SECTION_LINES").pipe(
    Config.validate({
      message: "Expected a positive line count",
      validation: value => value >= 1,
    }),
    Config.withDefault(DEFAULT_MAX_SECTION_LINES),
  ),
  repeatChorus: Config.boolean("SONGBOOK_REPEAT_CHORUS").pipe(
    Config.withDefault(DEFAULT_REPEAT_CHORUS),
  ),
  interactive: Config.boolean("SONGBOOK_INTERACTIVE").pipe(Config.withDefault(true)),
  logLevel: Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info)),
})

export const CompilerConfigLive = Layer.effect(CompilerConfig, compilerConfig)

export const loadCompilerConfig = (): CompilerConfigValues =>
  Effect.runSync(compilerConfig.pipe(Effect.provide(AppConfigProviderLive)))
