import { type AppContextOptions, createAppContext } from "./app/create-context"
import { DispatcherSettingsToken } from "./app/services"

export async function run(options: AppContextOptions = {}): Promise<void> {
  const ctx = await createAppContext(options)
  const settings = ctx.services.getRequired(DispatcherSettingsToken)

  ctx.logger.info("Webhook dispatcher configured", {
    source: ctx.configuration.sourcesUsed().join(","),
  })
  ctx.logger
    .child({
      endpoints: settings.endpoints.map((url) => url.href),
      maxAttempts: settings.maxAttempts,
      timeoutMs: settings.timeoutMs,
    })
    .debug("Dispatcher settings")
}
