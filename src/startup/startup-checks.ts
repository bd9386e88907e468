import { config, type Config } from "../config/index.js";
import { assertMigrationsCurrent } from "../migrations/check-migrations.js";
import { createVectorIndex } from "../modules/legal/default-dependencies.js";
import type { VectorIndex } from "../modules/rag/types.js";

export interface StartupCheckDependencies {
  config?: Config;
  assertMigrationsCurrent?: typeof assertMigrationsCurrent;
  createVectorIndex?: () => Promise<Pick<VectorIndex, "initialize">>;
}

/**
 * Fails startup when Postgres history has pending migrations or when the
 * vector collection was created with a different embedding dimensionality.
 */
export async function runStartupChecks(dependencies: StartupCheckDependencies = {}): Promise<void> {
  const source = dependencies.config ?? config;
  if (!source.RUN_STARTUP_CHECKS) {
    return;
  }

  if (source.HISTORY_BACKEND === "postgres") {
    await (dependencies.assertMigrationsCurrent ?? assertMigrationsCurrent)();
  }

  const vectorIndex = await (dependencies.createVectorIndex ?? (() => createVectorIndex(source)))();
  await vectorIndex.initialize();
}
