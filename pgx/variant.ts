/**
 * One called genomic position, as read from a VCF data line.
 * Records are frozen on creation and never mutated afterwards.
 */
export interface VariantRecord {
  readonly chrom: string;
  /** 1-based */
  readonly position: number;
  readonly rsid: string;
  readonly ref: string;
  readonly alt: string;
  readonly filter: string;
  /** INFO `GENE`, empty when absent */
  readonly gene: string;
  /** INFO `STAR`, empty when absent */
  readonly starAllele: string;
  /** Raw GT value (e.g. `0/1`, `1|1`), null when the sample has none. */
  readonly genotype: string | null;
  readonly info: Readonly<Record<string, string>>;
}

export type Zygosity = "reference-homozygous" | "heterozygous" | "homozygous-alternate" | "uninformative";

const zygosityByGenotype: Readonly<Record<string, Zygosity>> = {
  "0/0": "reference-homozygous",
  "0/1": "heterozygous",
  "1/0": "heterozygous",
  "0|1": "heterozygous",
  "1|0": "heterozygous",
  "1/1": "homozygous-alternate",
  "1|1": "homozygous-alternate",
};

export function classifyGenotype(genotype: string | null): Zygosity {
  if (genotype === null) return "uninformative";
  return zygosityByGenotype[genotype] ?? "uninformative";
}

export const isHeterozygous = (v: VariantRecord) => classifyGenotype(v.genotype) === "heterozygous";
export const isHomozygousAlt = (v: VariantRecord) => classifyGenotype(v.genotype) === "homozygous-alternate";

export type VariantInit = Partial<Omit<VariantRecord, "info">> & { info?: Record<string, string> };

export function createVariantRecord(init: VariantInit): VariantRecord {
  return Object.freeze({
    chrom: init.chrom ?? "",
    position: init.position ?? 0,
    rsid: init.rsid ?? ".",
    ref: init.ref ?? "",
    alt: init.alt ?? "",
    filter: init.filter ?? ".",
    gene: init.gene ?? "",
    starAllele: init.starAllele ?? "",
    genotype: init.genotype ?? null,
    info: Object.freeze({ ...init.info }),
  });
}
