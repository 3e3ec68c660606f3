import dotenv from "dotenv";

dotenv.config();

export const TEST_MODE = process.env.NODE_ENV === "test" || process.env.VITEST === "true";

function numberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`Invalid numeric env var ${name}: ${raw}`);
  }
  return n;
}

function countEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Invalid count env var ${name}: ${raw}`);
  }
  return n;
}

export const config = {
  PORT: numberEnv("PORT", 3333),
  MAX_VCF_BYTES: numberEnv("MAX_VCF_BYTES", 5 * 1024 * 1024),
  NARRATIVE_ENABLED: (process.env.NARRATIVE_ENABLED ?? "true") === "true",
  NARRATIVE_MODEL: process.env.NARRATIVE_MODEL ?? "gpt-4o-mini",
  NARRATIVE_TIMEOUT_MS: numberEnv("NARRATIVE_TIMEOUT_MS", 15_000),
  NARRATIVE_MAX_RETRIES: countEnv("NARRATIVE_MAX_RETRIES", 1),
  // Raw parse route; development only.
  EXPOSE_PARSE: process.env.EXPOSE_PARSE === "true",
  // Never reach the network from the test suite.
  OPENAI_API_KEY: TEST_MODE ? "" : process.env.OPENAI_API_KEY ?? "",
} as const;

export type Config = typeof config;
