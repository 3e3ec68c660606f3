import { readFileSync } from "node:fs";

/**
 * Clinical guidance keyed by `DRUG:Risk Label`. Anything not listed,
 * including every `Unknown` label, gets the specialist-review fallback.
 */

export interface ClinicalRecommendation {
  readonly action: string;
  readonly recommendation: string;
  readonly monitoring: string;
}

export interface RecommendationTable {
  fallback: ClinicalRecommendation;
  entries: ReadonlyMap<string, ClinicalRecommendation>;
}

const DEFAULT_TABLE_URL = new URL("../data/recommendations.json", import.meta.url);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRecommendation(value: unknown, key: string): ClinicalRecommendation {
  if (
    isRecord(value) &&
    typeof value.action === "string" &&
    typeof value.recommendation === "string" &&
    typeof value.monitoring === "string"
  ) {
    return Object.freeze({ action: value.action, recommendation: value.recommendation, monitoring: value.monitoring });
  }
  throw new Error(`recommendations: ${key} needs action, recommendation and monitoring strings`);
}

export function toRecommendationTable(raw: unknown): RecommendationTable {
  if (!isRecord(raw) || !isRecord(raw.entries)) throw new Error("recommendations: expected { fallback, entries }");
  const entries = new Map<string, ClinicalRecommendation>();
  for (const [key, value] of Object.entries(raw.entries)) {
    entries.set(key, toRecommendation(value, key));
  }
  return { fallback: toRecommendation(raw.fallback, "fallback"), entries };
}

export function loadRecommendations(source: URL | string = DEFAULT_TABLE_URL): RecommendationTable {
  const raw: unknown = JSON.parse(readFileSync(source, "utf8"));
  return toRecommendationTable(raw);
}

export const recommendations = loadRecommendations();

export function recommend(
  drug: string | null,
  riskLabel: string | null,
  table: RecommendationTable = recommendations,
): ClinicalRecommendation {
  if (drug === null || riskLabel === null) return table.fallback;
  return table.entries.get(`${drug.toUpperCase()}:${riskLabel}`) ?? table.fallback;
}
