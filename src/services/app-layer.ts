import { Layer, type LogLevel, Logger } from "effect"
import { AmbiguityResolverLive } from "./ambiguity-resolver"
import { CompilerConfigLive } from "./compiler-config"
import { AppConfigProviderLive } from "./config-provider"
import { SelectionCacheFileLive } from "./selection-cache"
import { SongLibraryLive } from "./song-library"

/**
 * Services for a file-to-file run, configured through the given provider
 */
export const makeAppLayer = (configProviderLayer: Layer.Layer<never>) => {
  const configLayer = CompilerConfigLive.pipe(Layer.provide(configProviderLayer))

  return Layer.mergeAll(
    configLayer,
    SongLibraryLive.pipe(Layer.provide(configLayer)),
    SelectionCacheFileLive.pipe(Layer.provide(configLayer)),
    AmbiguityResolverLive.pipe(Layer.provide(configLayer)),
  )
}

export const AppLayer = makeAppLayer(AppConfigProviderLive)

/**
 * Pretty console logging at or above the configured level
 */
export const makeLoggingLayer = (level: LogLevel.LogLevel) =>
  Layer.merge(Logger.pretty, Logger.minimumLogLevel(level))
