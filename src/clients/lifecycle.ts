import type { FastifyInstance } from "fastify";
import { config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";

let processHooksRegistered = false;

type HealthCheckedClient = { healthCheck: () => Promise<{ status: string; details?: string }> };

export interface ClientLifecycleModules {
  getOpenAIClient: () => Promise<HealthCheckedClient>;
  shutdownOpenAIClient: () => Promise<void>;
  getPostgresClient: () => Promise<HealthCheckedClient>;
  shutdownPostgresClient: () => Promise<void>;
  getQdrantClient: () => Promise<HealthCheckedClient>;
  shutdownQdrantClient: () => Promise<void>;
}

async function getClientModules(): Promise<ClientLifecycleModules> {
  const [openaiModule, postgresModule, qdrantModule] = await Promise.all([
    import("./openai.js"),
    import("./postgres.js"),
    import("./qdrant.js")
  ]);

  return {
    getOpenAIClient: openaiModule.getOpenAIClient,
    shutdownOpenAIClient: openaiModule.shutdownOpenAIClient,
    getPostgresClient: postgresModule.getPostgresClient,
    shutdownPostgresClient: postgresModule.shutdownPostgresClient,
    getQdrantClient: qdrantModule.getQdrantClient,
    shutdownQdrantClient: qdrantModule.shutdownQdrantClient
  };
}

async function shutdownAllClients(trigger: string, loadClientModules: () => Promise<ClientLifecycleModules>): Promise<void> {
  const clients = await loadClientModules();
  logInfo("clients.shutdown", {}, { trigger });
  await Promise.allSettled([
    clients.shutdownQdrantClient(),
    clients.shutdownOpenAIClient(),
    clients.shutdownPostgresClient()
  ]);
}

export interface ClientLifecycleOptions {
  enableBootstrap?: boolean;
  /** Postgres is only touched when conversation history lives there. */
  usePostgres?: boolean;
  loadClientModules?: () => Promise<ClientLifecycleModules>;
  registerProcessSignals?: boolean;
  exit?: (code: number) => never | void;
}

export function registerClientLifecycle(app: FastifyInstance, options?: ClientLifecycleOptions): void {
  const enableBootstrap = options?.enableBootstrap ?? config.ENABLE_INFRA_BOOTSTRAP;
  if (!enableBootstrap) {
    app.log.info("Infrastructure bootstrap disabled (set ENABLE_INFRA_BOOTSTRAP=true to enable).");
    return;
  }
  const usePostgres = options?.usePostgres ?? config.HISTORY_BACKEND === "postgres";
  const loadClientModules = options?.loadClientModules ?? getClientModules;
  const shouldRegisterProcessSignals = options?.registerProcessSignals ?? true;
  const exit = options?.exit ?? ((code: number) => process.exit(code));

  app.addHook("onReady", async () => {
    const clients = await loadClientModules();
    const checks = [
      clients.getOpenAIClient().then((client) => client.healthCheck()),
      clients.getQdrantClient().then((client) => client.healthCheck())
    ];
    if (usePostgres) {
      checks.push(clients.getPostgresClient().then((client) => client.healthCheck()));
    }
    await Promise.all(checks);
    app.log.info("Infrastructure singletons initialized and health checked");
  });

  app.addHook("onClose", async () => {
    await shutdownAllClients("onClose", loadClientModules);
  });

  if (shouldRegisterProcessSignals && !processHooksRegistered) {
    processHooksRegistered = true;
    const handleSignal = async (signal: NodeJS.Signals): Promise<void> => {
      await shutdownAllClients(signal, loadClientModules);
      exit(0);
    };

    process.once("SIGINT", () => {
      void handleSignal("SIGINT");
    });
    process.once("SIGTERM", () => {
      void handleSignal("SIGTERM");
    });
  }
}

export function resetClientLifecycleStateForTests(): void {
  processHooksRegistered = false;
}
