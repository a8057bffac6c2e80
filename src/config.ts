import "dotenv/config";
import { z } from "zod";

export type AppConfig = {
  dbPath: string;
  pokeapi: {
    baseUrl: string;
  };
  http: {
    timeoutMs: number;
    maxAttempts: number;
    retryBaseMs: number;
    retryMaxMs: number;
  };
};

const PositiveIntFromEnv = z.coerce.number().int().positive();

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const baseUrl = env.POKEAPI_BASE_URL || "https://pokeapi.co/api/v2";
  const dbPath = env.POKEPIPELINE_DB_PATH || "pokepipeline.db";

  return {
    dbPath,
    pokeapi: {
      baseUrl: z.string().url().parse(baseUrl)
    },
    http: {
      timeoutMs: readInt(env, "HTTP_TIMEOUT_MS", 10_000),
      maxAttempts: readInt(env, "HTTP_MAX_ATTEMPTS", 4),
      retryBaseMs: readInt(env, "HTTP_RETRY_BASE_MS", 500),
      retryMaxMs: readInt(env, "HTTP_RETRY_MAX_MS", 8_000)
    }
  };
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = PositiveIntFromEnv.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid ${key}: expected a positive integer, got "${raw}"`);
  }
  return parsed.data;
}
