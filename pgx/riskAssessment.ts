import { isUnknownPhenotype } from "./panel.ts";
import type { RiskAssessment, RiskLabel, Severity } from "./types.ts";

export const CONFIDENCE = {
  EXPLICIT_RULE: 0.95,
  FALLBACK_SAFE: 0.85,
  UNKNOWN_PHENOTYPE: 0.5,
  UNSUPPORTED: 0.4,
} as const;

/** Drug/gene pairs whose poor-metabolizer toxicity is life-threatening. */
export const CRITICAL_PAIRS: ReadonlySet<string> = new Set(["FLUOROURACIL:DPYD", "AZATHIOPRINE:TPMT"]);

/** How the risk label was reached. */
export type AssessmentBasis = "rule" | "fallback" | "unsupported";

export interface AssessmentInput {
  drug: string;
  gene: string | null;
  riskLabel: RiskLabel;
  phenotype: string | null;
  basis: AssessmentBasis;
}

const severityByLabel: Record<RiskLabel, Severity> = {
  Safe: "none",
  "Adjust Dosage": "moderate",
  Ineffective: "moderate",
  Toxic: "high",
  Unknown: "low",
};

export function resolveConfidence(phenotype: string | null, basis: AssessmentBasis): number {
  if (basis === "unsupported") return CONFIDENCE.UNSUPPORTED;
  if (isUnknownPhenotype(phenotype)) return CONFIDENCE.UNKNOWN_PHENOTYPE;
  if (basis === "fallback") return CONFIDENCE.FALLBACK_SAFE;
  return CONFIDENCE.EXPLICIT_RULE;
}

export function resolveSeverity(drug: string, gene: string | null, riskLabel: RiskLabel, phenotype: string | null): Severity {
  if (
    riskLabel === "Toxic" &&
    gene !== null &&
    phenotype !== null &&
    phenotype.startsWith("PM") &&
    CRITICAL_PAIRS.has(`${drug}:${gene}`)
  ) {
    return "critical";
  }
  return severityByLabel[riskLabel];
}

export function assessRisk(input: AssessmentInput): RiskAssessment {
  return Object.freeze({
    riskLabel: input.riskLabel,
    severity: resolveSeverity(input.drug, input.gene, input.riskLabel, input.phenotype),
    confidenceScore: resolveConfidence(input.phenotype, input.basis),
  });
}
