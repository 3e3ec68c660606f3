import { classifyGenotype, type VariantRecord } from "./variant.ts";

/** Heterozygous or homozygous-alternate records that carry a gene annotation. */
export function filterActionable(variants: readonly VariantRecord[]): VariantRecord[] {
  return variants.filter((v) => {
    const zygosity = classifyGenotype(v.genotype);
    return (zygosity === "heterozygous" || zygosity === "homozygous-alternate") && v.gene.trim() !== "";
  });
}

/** Buckets records by gene. Map order is first appearance; records keep input order. */
export function groupByGene(variants: readonly VariantRecord[]): Map<string, VariantRecord[]> {
  const groups = new Map<string, VariantRecord[]>();
  for (const v of variants) {
    const bucket = groups.get(v.gene);
    if (bucket) bucket.push(v);
    else groups.set(v.gene, [v]);
  }
  return groups;
}
