import type { FastifyInstance } from "fastify";
import { config } from "../../config/index.js";

export interface InfrastructureHealthOptions {
  includePostgres?: boolean;
}

export async function registerInfrastructureHealthRoute(
  app: FastifyInstance,
  options: InfrastructureHealthOptions = {}
): Promise<void> {
  const includePostgres = options.includePostgres ?? config.HISTORY_BACKEND === "postgres";

  app.get("/infra/health", async (_request, reply) => {
    try {
      const [openaiModule, qdrantModule] = await Promise.all([
        import("../../clients/openai.js"),
        import("../../clients/qdrant.js")
      ]);

      const [openai, qdrant] = await Promise.all([
        openaiModule.getOpenAIClient(),
        qdrantModule.getQdrantClient()
      ]);

      const [openaiHealth, qdrantHealth] = await Promise.all([openai.healthCheck(), qdrant.healthCheck()]);
      const clients: Record<string, { status: string; details?: string }> = {
        openai: openaiHealth,
        qdrant: qdrantHealth
      };

      if (includePostgres) {
        const postgresModule = await import("../../clients/postgres.js");
        const postgres = await postgresModule.getPostgresClient();
        clients.postgres = await postgres.healthCheck();
      }

      const degraded = Object.values(clients).some((client) => client.status !== "ok");
      if (degraded) {
        reply.code(503);
      }
      return {
        status: degraded ? "degraded" : "ok",
        clients
      };
    } catch (error) {
      const detail = error instanceof Error ? error.message : "unknown error";
      reply.code(503);
      return {
        status: "error",
        detail
      };
    }
  });
}
