import { randomUUID } from "node:crypto";
import { filterActionable } from "./grouping.ts";
import { createLogger, type Logger } from "./logger.ts";
import { createDefaultNarrator, PLACEHOLDER_SUMMARY, type NarrativeFacts, type NarrativeGenerator } from "./narrative.ts";
import { isUnknownPhenotype } from "./panel.ts";
import { recommend, recommendations, type ClinicalRecommendation, type RecommendationTable } from "./recommendations.ts";
import type { DrugRiskResult, GeneProfile, RiskLabel, Severity } from "./types.ts";
import type { VariantRecord } from "./variant.ts";

/** ---------- Wire Types ---------- */

export type ShortPhenotype = "NM" | "IM" | "PM" | "RM" | "UM" | "Unknown";

export interface DetectedVariantJson {
  rsid: string;
  star_allele: string;
  genotype: string | null;
}

export interface PharmacogenomicProfileJson {
  primary_gene: string | null;
  diplotype: string | null;
  phenotype: ShortPhenotype;
  detected_variants: DetectedVariantJson[];
}

export interface RiskAssessmentJson {
  risk_label: RiskLabel;
  confidence_score: number;
  severity: Severity;
}

export interface DrugReport {
  patient_id: string;
  drug: string;
  timestamp: string;
  risk_assessment: RiskAssessmentJson;
  pharmacogenomic_profile: PharmacogenomicProfileJson;
  clinical_recommendation: ClinicalRecommendation;
  llm_generated_explanation: { summary: string };
  quality_metrics: { vcf_parsing_success: boolean };
}

/** ---------- Phenotype Codes ---------- */

const SHORT_CODES: ReadonlyArray<[prefix: string, code: ShortPhenotype]> = [
  ["NM", "NM"],
  ["IM", "IM"],
  ["PM", "PM"],
  ["RM", "RM"],
  ["UM", "UM"],
  ["Normal Function", "NM"],
  ["Decreased Function", "IM"],
  ["Poor Function", "PM"],
];

/** `"IM – Intermediate Metabolizer"` → `"IM"`, `"Poor Function – …"` → `"PM"`. */
export function toShortPhenotype(phenotype: string | null): ShortPhenotype {
  if (phenotype === null || isUnknownPhenotype(phenotype)) return "Unknown";
  return SHORT_CODES.find(([prefix]) => phenotype.startsWith(prefix))?.[1] ?? "Unknown";
}

/** ---------- Assembly ---------- */

export interface ReportInput {
  drugRisks: readonly DrugRiskResult[];
  profiles: readonly GeneProfile[];
  variants: readonly VariantRecord[];
  parseSuccess: boolean;
}

export interface ReportDeps {
  narrator?: NarrativeGenerator;
  recommendations?: RecommendationTable;
  idFactory?: () => string;
  clock?: () => Date;
  log?: Logger;
}

function detectedVariants(gene: string, variants: readonly VariantRecord[]): DetectedVariantJson[] {
  return filterActionable(variants)
    .filter((v) => v.gene === gene)
    .map((v) => ({ rsid: v.rsid, star_allele: v.starAllele, genotype: v.genotype }));
}

function profileJson(
  gene: string | null,
  profile: GeneProfile | undefined,
  variants: readonly VariantRecord[],
): PharmacogenomicProfileJson {
  if (gene === null) return { primary_gene: null, diplotype: null, phenotype: "Unknown", detected_variants: [] };
  return {
    primary_gene: gene,
    diplotype: profile?.diplotype ?? null,
    phenotype: toShortPhenotype(profile?.phenotype ?? null),
    detected_variants: detectedVariants(gene, variants),
  };
}

async function summarizeSafely(narrator: NarrativeGenerator, facts: NarrativeFacts, log: Logger): Promise<string> {
  try {
    return await narrator.summarize(facts);
  } catch (err) {
    log.warn(`narrator failed for ${facts.drug}: ${err instanceof Error ? err.message : String(err)}`);
    return PLACEHOLDER_SUMMARY;
  }
}

/**
 * One report per drug result, in order. All reports of a call share one
 * patient id and timestamp.
 */
export async function buildReports(input: ReportInput, deps: ReportDeps = {}): Promise<DrugReport[]> {
  const narrator = deps.narrator ?? createDefaultNarrator();
  const log = deps.log ?? createLogger("report");
  const table = deps.recommendations ?? recommendations;
  const patientId = (deps.idFactory ?? randomUUID)();
  const timestamp = (deps.clock ?? (() => new Date()))().toISOString();
  const profileByGene = new Map(input.profiles.map((p) => [p.gene, p]));

  return Promise.all(
    input.drugRisks.map(async (risk): Promise<DrugReport> => {
      const { riskLabel, severity, confidenceScore } = risk.riskAssessment;
      const profile = risk.gene === null ? undefined : profileByGene.get(risk.gene);
      const pgx = profileJson(risk.gene, profile, input.variants);
      const recommendation = recommend(risk.drug, riskLabel, table);

      const summary = await summarizeSafely(
        narrator,
        Object.freeze({
          drug: risk.drug,
          gene: risk.gene,
          diplotype: pgx.diplotype,
          phenotype: pgx.phenotype,
          riskLabel,
          severity,
          action: recommendation.action,
        }),
        log,
      );

      return {
        patient_id: patientId,
        drug: risk.drug,
        timestamp,
        risk_assessment: { risk_label: riskLabel, confidence_score: confidenceScore, severity },
        pharmacogenomic_profile: pgx,
        clinical_recommendation: recommendation,
        llm_generated_explanation: { summary },
        quality_metrics: { vcf_parsing_success: input.parseSuccess },
      };
    }),
  );
}
