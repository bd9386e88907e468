import { Pool, type PoolClient } from "pg";
import { config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";
import { lazySingleton, probeHealth, retryOnStartup, type ClientHealth } from "./client-support.js";

export interface PostgresSingleton {
  pool: Pool;
  healthCheck: () => Promise<ClientHealth>;
}

const CONNECT_TIMEOUT_MS = 5000;

const postgres = lazySingleton<PostgresSingleton>(async () => {
  if (!config.POSTGRES_URL) {
    throw new Error("POSTGRES_URL is required to connect to Postgres.");
  }

  const pool = new Pool({
    connectionString: config.POSTGRES_URL,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: CONNECT_TIMEOUT_MS
  });
  await retryOnStartup(() => pool.query("SELECT 1"), { attempts: 3, delayMs: 250 });
  logInfo("clients.postgres.ready", {});

  return {
    pool,
    healthCheck: () => probeHealth(() => pool.query("SELECT 1"))
  };
});

export const getPostgresClient = (): Promise<PostgresSingleton> => postgres.get();

export async function shutdownPostgresClient(): Promise<void> {
  const current = postgres.current();
  if (!current) {
    return;
  }
  postgres.reset();
  await current.pool.end();
  logInfo("clients.postgres.closed", {});
}

/** Runs `operation` between BEGIN and COMMIT, rolling back when it throws. */
export async function withTransaction<T>(operation: (client: PoolClient) => Promise<T>): Promise<T> {
  const { pool } = await getPostgresClient();
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await operation(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

export function resetPostgresClientForTests(): void {
  postgres.reset();
}
