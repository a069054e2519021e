export {
  AmbiguityResolver,
  AmbiguityResolverLive,
  Chosen,
  ConsoleAmbiguityResolverLive,
  NonInteractiveAmbiguityResolverLive,
  Skip,
  makeConsoleAmbiguityResolverLayer,
  makeScriptedAmbiguityResolver,
  parseAnswer,
  type Choice,
} from "./ambiguity-resolver"
export { AppLayer, makeAppLayer, makeLoggingLayer } from "./app-layer"
export {
  CompilerConfig,
  CompilerConfigLive,
  loadCompilerConfig,
  type CompilerConfigValues,
} from "./compiler-config"
export {
  AppConfigProvider,
  AppConfigProviderLive,
  makeConfigProvider,
  makeConfigProviderLayer,
} from "./config-provider"
export {
  SelectionCache,
  SelectionCacheFileLive,
  makeFileSelectionCache,
  makeInMemorySelectionCache,
} from "./selection-cache"
export { readTargetList, writeCompiledSetlist } from "./setlist-files"
export {
  SongLibrary,
  SongLibraryLive,
  loadSongLibrary,
  makeSongLibrary,
  makeSongLibraryLayer,
  parseLibraryData,
  type ParsedLibrary,
  type SongLibraryShape,
} from "./song-library"
