import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export function parseDotEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const separatorIndex = trimmed.indexOf("=");
  if (separatorIndex <= 0) {
    return null;
  }

  const key = trimmed.slice(0, separatorIndex).trim();
  let value = trimmed.slice(separatorIndex + 1).trim();

  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1);
  }

  return [key, value];
}

export interface LoadModeEnvFileOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  existsSync?: (filePath: string) => boolean;
  readFileSync?: (filePath: string, encoding: "utf8") => string;
}

export function loadModeEnvFile(options: LoadModeEnvFileOptions = {}): void {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const existsSync: (filePath: string) => boolean = options.existsSync ?? fs.existsSync;
  const readFileSync: (filePath: string, encoding: "utf8") => string = options.readFileSync ?? fs.readFileSync;
  const protectedKeys = new Set(
    Object.keys(processEnv).filter((key) => processEnv[key] !== undefined)
  );
  const rawMode = processEnv.APP_MODE?.trim().toLowerCase();
  const explicitMode = rawMode === "local" || rawMode === "prod" ? rawMode : undefined;

  const modeCandidates = explicitMode ? [explicitMode] : ["local", "prod"];
  const envFilePath = modeCandidates
    .map((mode) => path.join(cwd, `.env.${mode}`))
    .find((candidate) => existsSync(candidate));
  if (!envFilePath) {
    return;
  }

  const content = readFileSync(envFilePath, "utf8");
  for (const line of content.split(/\r?\n/)) {
    const entry = parseDotEnvLine(line);
    if (!entry) {
      continue;
    }
    const [key, value] = entry;
    if (protectedKeys.has(key)) {
      continue;
    }
    processEnv[key] = value;
  }
}

loadModeEnvFile();

const runtimeModeSchema = z.enum(["prod", "local"]);
const booleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
  });
const unitIntervalSchema = z.coerce.number().min(0).max(1);

export const envSchema = z.object({
  APP_MODE: runtimeModeSchema.default("prod"),
  PORT: z.coerce.number().int().positive().default(3000),
  FRONTEND_ORIGIN: z.string().min(1).default("http://localhost:5173"),
  ENABLE_INFRA_BOOTSTRAP: booleanFlagSchema.default(false),
  RUN_STARTUP_CHECKS: booleanFlagSchema.default(false),
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_CLASSIFIER_MODEL: z.string().min(1).default("gpt-4o-mini"),
  EMBEDDING_PROVIDER: z.enum(["openai", "hashing"]).default("openai"),
  OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
  QDRANT_URL: z.string().optional(),
  QDRANT_API_KEY: z.string().optional(),
  QDRANT_COLLECTION: z.string().min(1).default("legal_documents"),
  LOCAL_VECTOR_STORE_FILE: z.string().optional(),
  HISTORY_BACKEND: z.enum(["memory", "postgres"]).default("memory"),
  POSTGRES_URL: z.string().optional(),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(5),
  RELEVANCE_FLOOR: unitIntervalSchema.default(0.2),
  ROUTING_CONFIDENCE_THRESHOLD: unitIntervalSchema.default(0.4),
  HISTORY_MAX_TURNS: z.coerce.number().int().positive().default(10),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  TRANSIENT_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(500)
}).superRefine((value, ctx) => {
  if (value.APP_MODE === "prod" && (!value.QDRANT_URL || value.QDRANT_URL.trim().length === 0)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["QDRANT_URL"],
      message: "QDRANT_URL is required in prod mode"
    });
  }
  if (value.HISTORY_BACKEND === "postgres" && (!value.POSTGRES_URL || value.POSTGRES_URL.trim().length === 0)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["POSTGRES_URL"],
      message: "POSTGRES_URL is required when HISTORY_BACKEND=postgres"
    });
  }
});

export type Env = z.infer<typeof envSchema>;

const blankToUndefined = (value: string | undefined): string | undefined =>
  value && value.trim().length > 0 ? value.trim() : undefined;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(rawEnv);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return {
    ...parsed.data,
    QDRANT_URL: blankToUndefined(parsed.data.QDRANT_URL),
    QDRANT_API_KEY: blankToUndefined(parsed.data.QDRANT_API_KEY),
    LOCAL_VECTOR_STORE_FILE: blankToUndefined(parsed.data.LOCAL_VECTOR_STORE_FILE),
    POSTGRES_URL: blankToUndefined(parsed.data.POSTGRES_URL)
  };
}

export const env: Env = parseEnv(process.env);
