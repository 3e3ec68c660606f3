import { drugRules, type DrugRuleTableInstance } from "./drugRules.ts";
import { createLoggedHooks, type PipelineHooksInstance } from "./hooks.ts";
import { isUnknownPhenotype } from "./panel.ts";
import { assessRisk, type AssessmentBasis } from "./riskAssessment.ts";
import type { DrugRiskResult, GeneProfile, RiskLabel } from "./types.ts";

/** Phenotype reported when the governing gene has no profile. */
export const FALLBACK_PHENOTYPE = "*1/*1 assumed";

export interface DrugRiskDeps {
  table?: DrugRuleTableInstance;
  hooks?: PipelineHooksInstance;
}

/** `"CODEINE, warfarin , "` → `["CODEINE", "WARFARIN"]`. Blank input gives `[]`. */
export function parseDrugList(raw: string | null | undefined): string[] {
  if (!raw || raw.trim() === "") return [];
  return raw
    .split(",")
    .map((d) => d.trim().toUpperCase())
    .filter((d) => d !== "");
}

/**
 * One result per requested drug, in request order. Duplicates are
 * evaluated each time they appear.
 */
export function evaluateDrugRisks(
  profiles: readonly GeneProfile[],
  drugs: string | null | undefined,
  deps: DrugRiskDeps = {},
): DrugRiskResult[] {
  const table = deps.table ?? drugRules;
  const hooks = deps.hooks ?? createLoggedHooks();

  return parseDrugList(drugs).map((drug) => {
    const result = evaluateDrug(drug, profiles, table);
    hooks.emit("drug:evaluated", {
      drug,
      gene: result.gene,
      riskLabel: result.riskAssessment.riskLabel,
      severity: result.riskAssessment.severity,
      confidenceScore: result.riskAssessment.confidenceScore,
    });
    return result;
  });
}

function evaluateDrug(drug: string, profiles: readonly GeneProfile[], table: DrugRuleTableInstance): DrugRiskResult {
  const rule = table.find(drug);
  if (!rule) return result(drug, null, null, "Unknown", "unsupported");

  const profile = profiles.find((p) => p.gene === rule.gene);
  if (!profile) return result(drug, rule.gene, FALLBACK_PHENOTYPE, "Safe", "fallback");

  const { phenotype } = profile;
  if (isUnknownPhenotype(phenotype)) return result(drug, rule.gene, phenotype, "Unknown", "rule");

  return result(drug, rule.gene, phenotype, rule.classify(phenotype), "rule");
}

function result(
  drug: string,
  gene: string | null,
  phenotype: string | null,
  riskLabel: RiskLabel,
  basis: AssessmentBasis,
): DrugRiskResult {
  return Object.freeze({
    drug,
    gene,
    phenotype,
    riskAssessment: assessRisk({ drug, gene, riskLabel, phenotype, basis }),
  });
}
