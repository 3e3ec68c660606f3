export const RISK_LABELS = ["Safe", "Adjust Dosage", "Toxic", "Ineffective", "Unknown"] as const;
export type RiskLabel = (typeof RISK_LABELS)[number];

export const SEVERITIES = ["none", "low", "moderate", "high", "critical"] as const;
export type Severity = (typeof SEVERITIES)[number];

export interface GeneProfile {
  readonly gene: string;
  readonly allele1: string;
  readonly allele2: string;
  /** `allele1/allele2` in resolved order. */
  readonly diplotype: string;
  readonly phenotype: string;
}

export interface RiskAssessment {
  readonly riskLabel: RiskLabel;
  readonly severity: Severity;
  readonly confidenceScore: number;
}

export interface DrugRiskResult {
  readonly drug: string;
  /** null when the drug is not supported */
  readonly gene: string | null;
  readonly phenotype: string | null;
  readonly riskAssessment: RiskAssessment;
}

export function makeGeneProfile(gene: string, allele1: string, allele2: string, phenotype: string): GeneProfile {
  return Object.freeze({ gene, allele1, allele2, diplotype: `${allele1}/${allele2}`, phenotype });
}
