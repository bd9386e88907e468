import type { readdir } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { getPostgresClient, shutdownPostgresClient } from "../clients/postgres.js";
import { CREATE_SCHEMA_MIGRATIONS_SQL, defaultMigrationsDir, listMigrationFiles } from "./migration-files.js";

export interface CheckMigrationsDependencies {
  migrationsDir?: string;
  readdirFn?: typeof readdir;
  getPostgresClientFn?: typeof getPostgresClient;
}

export class PendingMigrationsError extends Error {
  readonly pending: string[];

  constructor(pending: string[]) {
    super(`Pending migrations detected: ${pending.join(", ")}. Run npm run migrate.`);
    this.name = "PendingMigrationsError";
    this.pending = pending;
  }
}

export async function assertMigrationsCurrent(dependencies: CheckMigrationsDependencies = {}): Promise<void> {
  const migrationsDir = dependencies.migrationsDir ?? defaultMigrationsDir;
  const getPostgresClientFn = dependencies.getPostgresClientFn ?? getPostgresClient;
  const files = await listMigrationFiles(migrationsDir, dependencies.readdirFn);

  if (files.length === 0) {
    return;
  }

  const { pool } = await getPostgresClientFn();
  await pool.query(CREATE_SCHEMA_MIGRATIONS_SQL);

  const appliedResult = await pool.query<{ filename: string }>(
    "SELECT filename FROM schema_migrations"
  );
  const applied = new Set(appliedResult.rows.map((row) => row.filename));

  const pending = files.filter((file) => !applied.has(file));
  if (pending.length > 0) {
    throw new PendingMigrationsError(pending);
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  assertMigrationsCurrent()
    .then(() => console.log("Migrations are up to date."))
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    })
    .finally(() => shutdownPostgresClient());
}
