import { beforeEach, describe, expect, it, vi } from "vitest";
import { config } from "../../src/config/index.js";
import { DimensionMismatchError } from "../../src/modules/providers/errors.js";
import { runStartupChecks } from "../../src/startup/startup-checks.js";

describe("app.ts", () => {
  beforeEach(() => {
    vi.resetModules();
  });

  it("buildAllowedFrontendOrigins returns defaults and localhost aliases", async () => {
    const { buildAllowedFrontendOrigins } = await import("../../src/app.js");

    expect(buildAllowedFrontendOrigins(undefined)).toEqual(["http://localhost:5173", "http://127.0.0.1:5173"]);
    expect(buildAllowedFrontendOrigins("http://localhost:3000, invalid-url, http://localhost:3000")).toEqual([
      "http://localhost:3000",
      "invalid-url",
      "http://127.0.0.1:3000"
    ]);
    expect(buildAllowedFrontendOrigins("https://assist.example.org")).toEqual(["https://assist.example.org"]);
  });

  it("buildApp wires cors, hooks, lifecycle and routes with optional infra-health skip", async () => {
    const app = {
      register: vi.fn().mockResolvedValue(undefined)
    };
    const fastifyFactory = vi.fn(() => app);
    const corsPlugin = Symbol("cors");
    const registerClientLifecycle = vi.fn();
    const registerHealthRoute = vi.fn().mockResolvedValue(undefined);
    const registerInfrastructureHealthRoute = vi.fn().mockResolvedValue(undefined);
    const registerApiRoutes = vi.fn().mockResolvedValue(undefined);
    const registerMetricsRoutes = vi.fn().mockResolvedValue(undefined);
    const registerRequestMetricsHooks = vi.fn();
    const registerRequestTraceHooks = vi.fn();

    vi.doMock("fastify", () => ({ default: fastifyFactory }));
    vi.doMock("@fastify/cors", () => ({ default: corsPlugin }));
    vi.doMock("../../src/clients/lifecycle.js", () => ({ registerClientLifecycle }));
    vi.doMock("../../src/api/routes/health.js", () => ({ registerHealthRoute }));
    vi.doMock("../../src/api/routes/infrastructure-health.js", () => ({ registerInfrastructureHealthRoute }));
    vi.doMock("../../src/api/routes/index.js", () => ({ registerApiRoutes }));
    vi.doMock("../../src/observability/metrics.js", () => ({
      registerMetricsRoutes,
      registerRequestMetricsHooks,
      resetMetrics: vi.fn()
    }));
    vi.doMock("../../src/observability/request-tracing.js", () => ({ registerRequestTraceHooks }));

    vi.stubEnv("FRONTEND_ORIGIN", "http://localhost:9999");
    const { buildApp } = await import("../../src/app.js");

    const apiDependencies = { getAssistant: vi.fn() };
    const built = await buildApp({ apiDependencies, registerInfrastructureHealth: false });

    expect(built).toBe(app);
    expect(fastifyFactory).toHaveBeenCalledWith({ logger: true });
    expect(app.register).toHaveBeenCalledWith(corsPlugin, {
      origin: ["http://localhost:9999", "http://127.0.0.1:9999"],
      methods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "X-Request-Id"]
    });
    expect(registerRequestMetricsHooks).toHaveBeenCalledWith(app);
    expect(registerRequestTraceHooks).toHaveBeenCalledWith(app);
    expect(registerClientLifecycle).toHaveBeenCalledWith(app, undefined);
    expect(registerHealthRoute).toHaveBeenCalledWith(app);
    expect(registerMetricsRoutes).toHaveBeenCalledWith(app);
    expect(registerInfrastructureHealthRoute).not.toHaveBeenCalled();
    expect(registerApiRoutes).toHaveBeenCalledWith(app, apiDependencies);

    vi.doUnmock("fastify");
    vi.doUnmock("@fastify/cors");
    vi.doUnmock("../../src/clients/lifecycle.js");
    vi.doUnmock("../../src/api/routes/health.js");
    vi.doUnmock("../../src/api/routes/infrastructure-health.js");
    vi.doUnmock("../../src/api/routes/index.js");
    vi.doUnmock("../../src/observability/metrics.js");
    vi.doUnmock("../../src/observability/request-tracing.js");
  });
});

describe("startup-checks.ts", () => {
  const createVectorIndex = (initialize: () => Promise<void>) => vi.fn(async () => ({ initialize: vi.fn(initialize) }));

  it("skips every check when disabled", async () => {
    const assertMigrationsCurrent = vi.fn();
    const vectorIndexFactory = createVectorIndex(async () => undefined);

    await runStartupChecks({
      config: { ...config, RUN_STARTUP_CHECKS: false, HISTORY_BACKEND: "postgres" },
      assertMigrationsCurrent,
      createVectorIndex: vectorIndexFactory
    });

    expect(assertMigrationsCurrent).not.toHaveBeenCalled();
    expect(vectorIndexFactory).not.toHaveBeenCalled();
  });

  it("checks the vector collection without migrations for in-memory history", async () => {
    const assertMigrationsCurrent = vi.fn();
    const initialize = vi.fn(async () => undefined);

    await runStartupChecks({
      config: { ...config, RUN_STARTUP_CHECKS: true, HISTORY_BACKEND: "memory" },
      assertMigrationsCurrent,
      createVectorIndex: async () => ({ initialize })
    });

    expect(assertMigrationsCurrent).not.toHaveBeenCalled();
    expect(initialize).toHaveBeenCalledTimes(1);
  });

  it("runs the migration check for postgres history", async () => {
    const assertMigrationsCurrent = vi.fn().mockResolvedValue(undefined);

    await runStartupChecks({
      config: { ...config, RUN_STARTUP_CHECKS: true, HISTORY_BACKEND: "postgres" },
      assertMigrationsCurrent,
      createVectorIndex: createVectorIndex(async () => undefined)
    });

    expect(assertMigrationsCurrent).toHaveBeenCalledTimes(1);
  });

  it("fails when the collection dimensionality does not match", async () => {
    await expect(
      runStartupChecks({
        config: { ...config, RUN_STARTUP_CHECKS: true, HISTORY_BACKEND: "memory" },
        createVectorIndex: createVectorIndex(async () => {
          throw new DimensionMismatchError(256, 1536, "collection legal_documents");
        })
      })
    ).rejects.toThrow("collection legal_documents: expected vector dimension 256, received 1536");
  });
});

describe("server.ts", () => {
  beforeEach(() => {
    vi.resetModules();
  });

  it("bootstrap runs startup checks and listens on the configured port", async () => {
    const runStartupChecks = vi.fn().mockResolvedValue(undefined);
    const listen = vi.fn().mockResolvedValue(undefined);
    const buildApp = vi.fn().mockResolvedValue({ listen });

    vi.doMock("../../src/startup/startup-checks.js", () => ({ runStartupChecks }));
    vi.doMock("../../src/app.js", () => ({ buildApp }));

    vi.stubEnv("PORT", "4567");
    const { bootstrap } = await import("../../src/server.js");
    await bootstrap();

    expect(runStartupChecks).toHaveBeenCalledTimes(1);
    expect(buildApp).toHaveBeenCalledTimes(1);
    expect(listen).toHaveBeenCalledWith({ host: "0.0.0.0", port: 4567 });

    vi.doUnmock("../../src/startup/startup-checks.js");
    vi.doUnmock("../../src/app.js");
  });
});
