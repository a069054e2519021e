import { ConfigProvider, Layer } from "effect"

export const AppConfigProvider = ConfigProvider.fromEnv()

/**
 * Fixed values layered over the environment, for tests and CLI arguments
 */
export const makeConfigProvider = (overrides: Readonly<Record<string, string>>) =>
  ConfigProvider.orElse(ConfigProvider.fromMap(new Map(Object.entries(overrides))), () =>
    AppConfigProvider,
  )

export const AppConfigProviderLive = Layer.setConfigProvider(AppConfigProvider)

export const makeConfigProviderLayer = (overrides: Readonly<Record<string, string>>) =>
  Layer.setConfigProvider(makeConfigProvider(overrides))
