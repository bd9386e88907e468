import { readdir } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

const currentFilePath = fileURLToPath(import.meta.url);
export const defaultMigrationsDir = path.resolve(path.dirname(currentFilePath), "../../migrations");

export const CREATE_SCHEMA_MIGRATIONS_SQL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    filename TEXT PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

/** `.sql` files in lexical order, which is the order they are applied in. */
export async function listMigrationFiles(
  migrationsDir: string = defaultMigrationsDir,
  readdirFn: typeof readdir = readdir
): Promise<string[]> {
  return (await readdirFn(migrationsDir))
    .filter((name) => name.endsWith(".sql"))
    .sort();
}
