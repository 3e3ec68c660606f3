import { describe, it, expect } from "vitest";
import { filterActionable, groupByGene } from "./grouping.ts";
import { createVariantRecord } from "./variant.ts";

const v = (gene: string, genotype: string | null, starAllele = "*2") =>
  createVariantRecord({ gene, genotype, starAllele });

describe("filterActionable", () => {
  it("keeps heterozygous and homozygous-alternate calls", () => {
    const kept = filterActionable([
      v("TPMT", "0/0"),
      v("TPMT", "0/1"),
      v("TPMT", "1|0"),
      v("TPMT", "1/1"),
      v("TPMT", "0|0"),
      v("TPMT", "./."),
      v("TPMT", null),
    ]);
    expect(kept.map((r) => r.genotype)).toEqual(["0/1", "1|0", "1/1"]);
  });

  it("drops records without a gene", () => {
    expect(filterActionable([v("", "0/1"), v("  ", "1/1")])).toEqual([]);
  });
});

describe("groupByGene", () => {
  it("groups in first-seen order and keeps record order", () => {
    const a = v("CYP2D6", "0/1", "*4");
    const b = v("TPMT", "0/1", "*3A");
    const c = v("CYP2D6", "0/1", "*6");
    const groups = groupByGene([a, b, c]);
    expect([...groups.keys()]).toEqual(["CYP2D6", "TPMT"]);
    expect(groups.get("CYP2D6")).toEqual([a, c]);
  });

  it("returns an empty map for no records", () => {
    expect(groupByGene([]).size).toBe(0);
  });
});
