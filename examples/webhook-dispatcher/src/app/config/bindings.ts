import { injectConfiguration, t } from "@confbind/inject"

export enum DeliveryMode {
  Sequential,
  Parallel,
}

export const webhookBindings = {
  mode: injectConfiguration(
    "Webhooks:Mode",
    t.enumOf("DeliveryMode", DeliveryMode, { ignoreCase: true }),
  ),
  endpoints: injectConfiguration("Webhooks:Endpoints", t.readOnlyList(t.uri)),
  signingKeyId: injectConfiguration("Webhooks:SigningKeyId", t.nullable(t.uuid)),
  maxAttempts: injectConfiguration("Webhooks:Retry:MaxAttempts", t.int32, {
    onCoercionError: "throw",
  }),
  timeout: injectConfiguration("Webhooks:Retry:Timeout", t.duration),
  retryOn: injectConfiguration("Webhooks:Retry:RetryOn", t.array(t.uint16)),
}
