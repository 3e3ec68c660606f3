import { describe, it, expect } from "vitest";
import { evaluateDrugRisks, parseDrugList } from "./drugRisk.ts";
import { createPipelineHooks, type DrugEvaluatedEvent } from "./hooks.ts";
import { makeGeneProfile } from "./types.ts";

const hooks = () => createPipelineHooks();

describe("parseDrugList", () => {
  it("splits, trims and uppercases", () => {
    expect(parseDrugList("CODEINE, warfarin , ")).toEqual(["CODEINE", "WARFARIN"]);
  });

  it("returns an empty list for blank input", () => {
    expect(parseDrugList("")).toEqual([]);
    expect(parseDrugList("  ")).toEqual([]);
    expect(parseDrugList(null)).toEqual([]);
    expect(parseDrugList(",,")).toEqual([]);
  });
});

describe("evaluateDrugRisks", () => {
  const profiles = [
    makeGeneProfile("CYP2D6", "*4", "*4", "PM – Poor Metabolizer"),
    makeGeneProfile("CYP2C9", "*1", "*2", "IM – Intermediate Metabolizer"),
    makeGeneProfile("DPYD", "*2A", "*2A", "PM – Poor Metabolizer"),
    makeGeneProfile("TPMT", "*9", "*10", "UNKNOWN"),
    makeGeneProfile("SLCO1B1", "*1", "*1", "Normal Function"),
  ];

  it("falls back to Safe when the gene has no profile", () => {
    const results = evaluateDrugRisks([], "CODEINE, warfarin", { hooks: hooks() });
    expect(results).toEqual([
      {
        drug: "CODEINE",
        gene: "CYP2D6",
        phenotype: "*1/*1 assumed",
        riskAssessment: { riskLabel: "Safe", severity: "none", confidenceScore: 0.85 },
      },
      {
        drug: "WARFARIN",
        gene: "CYP2C9",
        phenotype: "*1/*1 assumed",
        riskAssessment: { riskLabel: "Safe", severity: "none", confidenceScore: 0.85 },
      },
    ]);
  });

  it("applies explicit rules", () => {
    const [codeine, warfarin] = evaluateDrugRisks(profiles, "codeine,warfarin", { hooks: hooks() });
    expect(codeine?.riskAssessment).toEqual({ riskLabel: "Ineffective", severity: "moderate", confidenceScore: 0.95 });
    expect(warfarin?.riskAssessment).toEqual({ riskLabel: "Adjust Dosage", severity: "moderate", confidenceScore: 0.95 });
  });

  it("escalates fluorouracil with a DPYD poor metabolizer to critical", () => {
    const [result] = evaluateDrugRisks(profiles, "FLUOROURACIL", { hooks: hooks() });
    expect(result).toMatchObject({ gene: "DPYD", riskAssessment: { riskLabel: "Toxic", severity: "critical" } });
  });

  it("reports unknown phenotypes with degraded confidence", () => {
    const [result] = evaluateDrugRisks(profiles, "AZATHIOPRINE", { hooks: hooks() });
    expect(result).toEqual({
      drug: "AZATHIOPRINE",
      gene: "TPMT",
      phenotype: "UNKNOWN",
      riskAssessment: { riskLabel: "Unknown", severity: "low", confidenceScore: 0.5 },
    });
  });

  it("reports unsupported drugs without a gene", () => {
    const [result] = evaluateDrugRisks(profiles, "aspirin", { hooks: hooks() });
    expect(result).toEqual({
      drug: "ASPIRIN",
      gene: null,
      phenotype: null,
      riskAssessment: { riskLabel: "Unknown", severity: "low", confidenceScore: 0.4 },
    });
  });

  it("keeps request order and duplicates", () => {
    const results = evaluateDrugRisks(profiles, "SIMVASTATIN, codeine, simvastatin", { hooks: hooks() });
    expect(results.map((r) => r.drug)).toEqual(["SIMVASTATIN", "CODEINE", "SIMVASTATIN"]);
    expect(results[0]?.riskAssessment.riskLabel).toBe("Safe");
  });

  it("returns nothing for a blank drug list", () => {
    expect(evaluateDrugRisks(profiles, " ", { hooks: hooks() })).toEqual([]);
  });

  it("emits one event per evaluated drug", () => {
    const h = hooks();
    const events: DrugEvaluatedEvent[] = [];
    h.on("drug:evaluated", (e) => events.push(e));
    evaluateDrugRisks(profiles, "CODEINE, ASPIRIN", { hooks: h });
    expect(events.map((e) => [e.drug, e.gene, e.riskLabel])).toEqual([
      ["CODEINE", "CYP2D6", "Ineffective"],
      ["ASPIRIN", null, "Unknown"],
    ]);
  });
});
