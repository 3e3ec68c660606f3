import { resolveDiplotype } from "./diplotypeResolver.ts";
import { filterActionable, groupByGene } from "./grouping.ts";
import { createLoggedHooks, type PipelineHooksInstance } from "./hooks.ts";
import { REFERENCE_ALLELE, REQUIRED_PANEL, isPanelGene } from "./panel.ts";
import { phenotypeRules, type PhenotypeRuleTableInstance } from "./phenotypeRules.ts";
import { makeGeneProfile, type GeneProfile } from "./types.ts";
import type { VariantRecord } from "./variant.ts";

export interface InterpretationDeps {
  rules?: PhenotypeRuleTableInstance;
  hooks?: PipelineHooksInstance;
}

/**
 * Turns raw variant records into one profile per panel gene, sorted by gene.
 *
 * Genes with no informative record are reported as `*1/*1` with the
 * phenotype the rule table gives for that pair.
 */
export function interpretVariants(variants: readonly VariantRecord[], deps: InterpretationDeps = {}): GeneProfile[] {
  const rules = deps.rules ?? phenotypeRules;
  const hooks = deps.hooks ?? createLoggedHooks();

  const profiles = new Map<string, GeneProfile>();
  for (const [gene, group] of groupByGene(filterActionable(variants))) {
    if (!isPanelGene(gene)) continue;
    const resolution = resolveDiplotype(group);
    if (!resolution) continue;

    if (resolution.hardLimitExceeded) {
      hooks.emit("diplotype:hardLimitExceeded", {
        gene,
        observedAlleles: [...resolution.observedAlleles],
        allele1: resolution.allele1,
        allele2: resolution.allele2,
      });
    }
    const phenotype = rules.lookup(gene, resolution.allele1, resolution.allele2);
    profiles.set(gene, makeGeneProfile(gene, resolution.allele1, resolution.allele2, phenotype));
  }

  for (const gene of REQUIRED_PANEL) {
    if (profiles.has(gene)) continue;
    const phenotype = rules.lookup(gene, REFERENCE_ALLELE, REFERENCE_ALLELE);
    profiles.set(gene, makeGeneProfile(gene, REFERENCE_ALLELE, REFERENCE_ALLELE, phenotype));
    hooks.emit("gene:backfilled", { gene, phenotype });
  }

  return [...profiles.values()].sort((a, b) => (a.gene < b.gene ? -1 : a.gene > b.gene ? 1 : 0));
}
