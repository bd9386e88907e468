import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { shutdownPostgresClient, withTransaction } from "../clients/postgres.js";
import { logError, logInfo } from "../observability/logger.js";
import { CREATE_SCHEMA_MIGRATIONS_SQL, defaultMigrationsDir, listMigrationFiles } from "./migration-files.js";

export interface RunMigrationsDependencies {
  migrationsDir?: string;
  readdirFn?: typeof readdir;
  readFileFn?: typeof readFile;
  withTransactionFn?: typeof withTransaction;
}

/** Applies each pending migration in its own transaction; returns the applied filenames. */
export async function runMigrations(dependencies: RunMigrationsDependencies = {}): Promise<string[]> {
  const migrationsDir = dependencies.migrationsDir ?? defaultMigrationsDir;
  const readFileFn = dependencies.readFileFn ?? readFile;
  const withTransactionFn = dependencies.withTransactionFn ?? withTransaction;

  const filenames = await listMigrationFiles(migrationsDir, dependencies.readdirFn);
  if (filenames.length === 0) {
    return [];
  }

  await withTransactionFn(async (client) => {
    await client.query(CREATE_SCHEMA_MIGRATIONS_SQL);
  });

  const applied: string[] = [];

  for (const filename of filenames) {
    const alreadyAppliedResult = await withTransactionFn(async (client) => {
      return client.query<{ exists: boolean }>(
        "SELECT EXISTS(SELECT 1 FROM schema_migrations WHERE filename = $1) AS exists",
        [filename]
      );
    });

    if (alreadyAppliedResult.rows[0]?.exists) {
      continue;
    }

    const migrationSql = (await readFileFn(path.join(migrationsDir, filename), "utf8")).replace(/^\uFEFF/, "");

    await withTransactionFn(async (client) => {
      await client.query(migrationSql);
      await client.query("INSERT INTO schema_migrations (filename) VALUES ($1)", [filename]);
    });

    logInfo("migrations.applied", {}, { filename });
    applied.push(filename);
  }

  return applied;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  runMigrations()
    .then((applied) => {
      logInfo("migrations.complete", {}, { applied, pending_count: 0 });
    })
    .catch((error: unknown) => {
      logError("migrations.failed", {}, { error: error instanceof Error ? error.message : String(error) });
      process.exitCode = 1;
    })
    .finally(() => shutdownPostgresClient());
}
