/**
 * The pharmacogene panel. The parser keeps only these genes and the
 * interpretation step always reports every one of them.
 */
export const REQUIRED_PANEL = ["CYP2C19", "CYP2C9", "CYP2D6", "DPYD", "SLCO1B1", "TPMT"] as const;

export type PanelGene = (typeof REQUIRED_PANEL)[number];

const panelSet: ReadonlySet<string> = new Set(REQUIRED_PANEL);

export function isPanelGene(gene: string): gene is PanelGene {
  return panelSet.has(gene);
}

/** Wild-type star allele, assumed for any chromosome with no called variant. */
export const REFERENCE_ALLELE = "*1";

/** Sentinel phenotype for any gene or diplotype the rule table does not cover. */
export const UNKNOWN_PHENOTYPE = "UNKNOWN";

export function isUnknownPhenotype(phenotype: string | null): boolean {
  return phenotype === null || phenotype.startsWith(UNKNOWN_PHENOTYPE);
}
