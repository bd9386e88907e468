import OpenAI from "openai";
import { config } from "../config/index.js";
import { withTimeout } from "../modules/providers/call-policy.js";
import { logInfo } from "../observability/logger.js";
import { lazySingleton, probeHealth, type ClientHealth } from "./client-support.js";

export interface OpenAISingleton {
  client: OpenAI;
  healthCheck: () => Promise<ClientHealth>;
}

const HEALTH_CHECK_TIMEOUT_MS = 7000;

const openai = lazySingleton<OpenAISingleton>(async () => {
  // Retries and timeouts are owned by callWithPolicy so that every provider
  // call gets exactly one bounded retry.
  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    maxRetries: 0,
    timeout: config.PROVIDER_TIMEOUT_MS
  });
  logInfo("clients.openai.ready", {});

  return {
    client,
    healthCheck: () =>
      probeHealth(() =>
        withTimeout(
          async (signal) => {
            await client.models.retrieve(config.OPENAI_MODEL, { signal });
          },
          HEALTH_CHECK_TIMEOUT_MS,
          "openai health check"
        )
      )
  };
});

export const getOpenAIClient = (): Promise<OpenAISingleton> => openai.get();

export async function shutdownOpenAIClient(): Promise<void> {
  if (!openai.current()) {
    return;
  }
  openai.reset();
  logInfo("clients.openai.closed", {});
}

export function resetOpenAIClientForTests(): void {
  openai.reset();
}
