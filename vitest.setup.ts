// Tests read configuration through the same provider as the CLI, so a developer's
// shell overrides must not leak into expectations.
for (const key of Object.keys(process.env)) {
  if (key.startsWith("SONGBOOK_") || key === "LOG_LEVEL") {
    delete process.env[key]
  }
}
