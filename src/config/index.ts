import { env } from "./env.js";

export type { Env } from "./env.js";
export { envSchema, parseEnv } from "./env.js";
export { env };

export type Config = Readonly<typeof env>;
export const config: Config = Object.freeze({ ...env });

export interface AssistantSettings {
  retrievalTopK: number;
  relevanceFloor: number;
  routingConfidenceThreshold: number;
  historyMaxTurns: number;
  providerTimeoutMs: number;
  transientRetryDelayMs: number;
}

export const assistantSettingsFromConfig = (source: Config = config): AssistantSettings => ({
  retrievalTopK: source.RETRIEVAL_TOP_K,
  relevanceFloor: source.RELEVANCE_FLOOR,
  routingConfidenceThreshold: source.ROUTING_CONFIDENCE_THRESHOLD,
  historyMaxTurns: source.HISTORY_MAX_TURNS,
  providerTimeoutMs: source.PROVIDER_TIMEOUT_MS,
  transientRetryDelayMs: source.TRANSIENT_RETRY_DELAY_MS
});
