import { readFileSync } from "node:fs";
import { types, type Instance, type SnapshotIn } from "mobx-state-tree";
import { UNKNOWN_PHENOTYPE } from "./panel.ts";

/**
 * Diplotype → phenotype tables for the panel genes.
 *
 * Keys are written in one allele order per entry; lookups try both orders.
 * The table is a protected tree: it is built once and never changed by
 * the pipeline.
 */

const GeneRules = types.model("GeneRules", {
  gene: types.identifier,
  diplotypes: types.map(types.string),
});

export const PhenotypeRuleTable = types
  .model("PhenotypeRuleTable", {
    genes: types.map(GeneRules),
  })
  .views((self) => ({
    get geneSymbols(): string[] {
      return [...self.genes.keys()].sort();
    },

    /** Phenotype for `allele1/allele2` or `allele2/allele1`; `UNKNOWN` when neither is listed. */
    lookup(gene: string, allele1: string, allele2: string): string {
      const rules = self.genes.get(gene);
      if (!rules) return UNKNOWN_PHENOTYPE;
      return (
        rules.diplotypes.get(`${allele1}/${allele2}`) ??
        rules.diplotypes.get(`${allele2}/${allele1}`) ??
        UNKNOWN_PHENOTYPE
      );
    },
  }));

export type PhenotypeRuleTableInstance = Instance<typeof PhenotypeRuleTable>;

export type PhenotypeRuleData = Record<string, Record<string, string>>;

const DEFAULT_RULES_URL = new URL("../data/phenotype-rules.json", import.meta.url);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Checks the `{ gene: { "A/B": phenotype } }` shape of parsed JSON. */
export function toPhenotypeRuleData(raw: unknown): PhenotypeRuleData {
  if (!isRecord(raw)) throw new Error("phenotype rules: expected an object of genes");
  const data: PhenotypeRuleData = {};
  for (const [gene, entries] of Object.entries(raw)) {
    if (!isRecord(entries)) throw new Error(`phenotype rules: ${gene} must map diplotypes to phenotypes`);
    const diplotypes: Record<string, string> = {};
    for (const [key, phenotype] of Object.entries(entries)) {
      if (typeof phenotype !== "string") throw new Error(`phenotype rules: ${gene} ${key} is not a string`);
      diplotypes[key] = phenotype;
    }
    data[gene] = diplotypes;
  }
  return data;
}

export function createPhenotypeRuleTable(data: PhenotypeRuleData): PhenotypeRuleTableInstance {
  const genes: Record<string, SnapshotIn<typeof GeneRules>> = {};
  for (const [gene, diplotypes] of Object.entries(data)) {
    genes[gene] = { gene, diplotypes };
  }
  return PhenotypeRuleTable.create({ genes });
}

export function loadPhenotypeRules(source: URL | string = DEFAULT_RULES_URL): PhenotypeRuleTableInstance {
  const raw: unknown = JSON.parse(readFileSync(source, "utf8"));
  return createPhenotypeRuleTable(toPhenotypeRuleData(raw));
}

export const phenotypeRules = loadPhenotypeRules();

export function lookupPhenotype(gene: string, allele1: string, allele2: string): string {
  return phenotypeRules.lookup(gene, allele1, allele2);
}
