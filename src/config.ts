import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { z } from "zod";
import { describeError, InvalidConfigurationError } from "./errors";
import { parseMetadataBoosts, type MetadataBoost } from "./metadata";

/**
 * Centralized single dotenv.config() call.
 * When running compiled code from dist/, resolve ../.env (project root) first;
 * otherwise fall back to the working directory's .env.
 */
export function loadEnvironment(): void {
  const rootEnv = path.resolve(__dirname, "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
}

/** Application version sourced from package.json (same relative path from src/ and dist/). */
export const APP_VERSION: string = (() => {
  try {
    const raw = fsSync.readFileSync(path.resolve(__dirname, "../package.json"), "utf8");
    const parsed = z.object({ version: z.string() }).safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data.version : "0.0.0";
  } catch {
    return "0.0.0";
  }
})();

export type RetrievalMode = "similarity" | "mmr";

export interface Config {
  OPENAI_API_KEY?: string;
  OPENAI_BASE_URL: string;
  EMBED_MODEL: string;
  EMBED_DIMENSIONS: number;
  EMBED_BATCH_SIZE: number;
  LLM_MODEL: string;
  LLM_TEMPERATURE: number;
  MAX_CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  TOP_K: number;
  TOKEN_BUDGET: number;
  LEXICAL_WEIGHT: number;
  METADATA_BOOSTS: MetadataBoost[];
  RETRIEVAL_MODE: RetrievalMode;
  MMR_LAMBDA: number;
  MMR_FETCH_K: number;
  INDEX_STORE_PATH: string;
  INGEST_CONCURRENCY: number;
  GATEWAY_TIMEOUT_MS: number;
  GATEWAY_MAX_ATTEMPTS: number;
  GATEWAY_BACKOFF_MS: number;
  VERBOSE: boolean;
}

// Blank values count as unset so `FOO=` in .env falls back to the default.
const blankToUndefined = (v: unknown) =>
  typeof v === "string" && v.trim() === "" ? undefined : typeof v === "string" ? v.trim() : v;

const int = (def: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(def));

const num = (def: number, min: number, max: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().min(min).max(max).default(def));

const str = (def: string) => z.preprocess(blankToUndefined, z.string().default(def));

// Tolerant truthy parsing (supports several common forms).
const flag = z.preprocess(
  (v) => typeof v === "string" && ["1", "true", "yes", "on"].includes(v.trim().toLowerCase()),
  z.boolean(),
);

const EnvSchema = z.object({
  OPENAI_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  OPENAI_BASE_URL: z.preprocess(
    blankToUndefined,
    z.string().url().default("https://api.openai.com/v1"),
  ),
  EMBED_MODEL: str("text-embedding-3-small"),
  EMBED_DIMENSIONS: int(1536, 1),
  EMBED_BATCH_SIZE: int(64, 1, 2048),
  LLM_MODEL: str("gpt-4o-mini"),
  LLM_TEMPERATURE: num(0.2, 0, 2),
  // Chunk size trades recall (too large) against precision (too small).
  MAX_CHUNK_SIZE: int(1000, 1, 100_000),
  CHUNK_OVERLAP: int(200, 0, 100_000),
  TOP_K: int(6, 1, 100),
  TOKEN_BUDGET: int(3000, 1),
  LEXICAL_WEIGHT: num(0.1, 0, 1),
  // e.g. importance=high:0.2,content_type=article:0.1,year>=2019:0.1
  METADATA_BOOSTS: z.preprocess(
    blankToUndefined,
    z
      .string()
      .default("")
      .transform((rules, ctx): MetadataBoost[] => {
        try {
          return parseMetadataBoosts(rules);
        } catch (e) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: describeError(e) });
          return z.NEVER;
        }
      }),
  ),
  RETRIEVAL_MODE: z.preprocess(
    (v) => (typeof v === "string" ? blankToUndefined(v.toLowerCase()) : v),
    z.enum(["similarity", "mmr"]).default("similarity"),
  ),
  MMR_LAMBDA: num(0.7, 0, 1),
  MMR_FETCH_K: int(10, 1, 1000),
  INDEX_STORE_PATH: str(".docqa/index.json"),
  INGEST_CONCURRENCY: int(2, 1, 64),
  GATEWAY_TIMEOUT_MS: int(60_000, 1),
  GATEWAY_MAX_ATTEMPTS: int(4, 1, 20),
  GATEWAY_BACKOFF_MS: int(500, 0),
  VERBOSE: flag,
});

/**
 * Parse and validate runtime configuration from environment variables.
 * Any malformed value is fatal: it raises {@link InvalidConfigurationError}
 * naming every offending variable.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new InvalidConfigurationError(`Invalid environment configuration (${problems})`);
  }
  const config: Config = parsed.data;
  if (config.CHUNK_OVERLAP >= config.MAX_CHUNK_SIZE) {
    throw new InvalidConfigurationError(
      `CHUNK_OVERLAP (=${config.CHUNK_OVERLAP}) must be smaller than MAX_CHUNK_SIZE (=${config.MAX_CHUNK_SIZE})`,
    );
  }
  return config;
}

/** Raise a configuration error when no API key is available for the gateways. */
export function requireApiKey(config: Config): string {
  if (!config.OPENAI_API_KEY) {
    throw new InvalidConfigurationError(
      "OPENAI_API_KEY is not set. Add it to the environment or a .env file.",
    );
  }
  return config.OPENAI_API_KEY;
}
