import { REFERENCE_ALLELE } from "./panel.ts";
import { isHeterozygous, isHomozygousAlt, type VariantRecord } from "./variant.ts";

export interface Resolution {
  readonly allele1: string;
  readonly allele2: string;
  /** More than two distinct heterozygous alleles were seen; only the first two are used. */
  readonly hardLimitExceeded: boolean;
  /** Distinct alleles that fed the resolution, in first-seen order. */
  readonly observedAlleles: readonly string[];
}

/** Trims, maps blank to `*1` and adds a missing `*` prefix (`"3A"` → `"*3A"`). */
export function normalizeStarAllele(allele: string | null | undefined): string {
  const trimmed = (allele ?? "").trim();
  if (trimmed === "") return REFERENCE_ALLELE;
  return trimmed.startsWith("*") ? trimmed : `*${trimmed}`;
}

/**
 * Reduces one gene's records to two alleles.
 *
 * A homozygous-alternate call fills both slots and ends the search. Otherwise
 * distinct heterozygous alleles are taken in order: one pairs with `*1`, two
 * form a compound heterozygote, more are cut to the first two. Returns null
 * when no record is informative.
 */
export function resolveDiplotype(variants: readonly VariantRecord[]): Resolution | null {
  const homozygous = variants.find(isHomozygousAlt);
  if (homozygous) {
    const star = normalizeStarAllele(homozygous.starAllele);
    return Object.freeze({ allele1: star, allele2: star, hardLimitExceeded: false, observedAlleles: [star] });
  }

  const seen = new Set<string>();
  for (const v of variants) {
    if (isHeterozygous(v)) seen.add(normalizeStarAllele(v.starAllele));
  }
  const alleles = [...seen];
  const [first, second] = alleles;
  if (first === undefined) return null;

  if (second === undefined) {
    return Object.freeze({ allele1: REFERENCE_ALLELE, allele2: first, hardLimitExceeded: false, observedAlleles: alleles });
  }
  return Object.freeze({ allele1: first, allele2: second, hardLimitExceeded: alleles.length > 2, observedAlleles: alleles });
}
