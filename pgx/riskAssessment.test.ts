import { describe, it, expect } from "vitest";
import { CONFIDENCE, assessRisk, resolveConfidence, resolveSeverity } from "./riskAssessment.ts";
import { RISK_LABELS } from "./types.ts";

describe("resolveConfidence", () => {
  it("ranks unsupported above an unknown phenotype", () => {
    expect(resolveConfidence(null, "unsupported")).toBe(0.4);
  });

  it("degrades null and UNKNOWN phenotypes", () => {
    expect(resolveConfidence(null, "rule")).toBe(0.5);
    expect(resolveConfidence("UNKNOWN", "rule")).toBe(0.5);
    expect(resolveConfidence("UNKNOWN", "fallback")).toBe(0.5);
  });

  it("scores fallbacks and explicit matches", () => {
    expect(resolveConfidence("*1/*1 assumed", "fallback")).toBe(CONFIDENCE.FALLBACK_SAFE);
    expect(resolveConfidence("PM – Poor Metabolizer", "rule")).toBe(CONFIDENCE.EXPLICIT_RULE);
  });
});

describe("resolveSeverity", () => {
  it("maps labels to severities", () => {
    expect(resolveSeverity("CODEINE", "CYP2D6", "Safe", "NM – Normal Metabolizer")).toBe("none");
    expect(resolveSeverity("CODEINE", "CYP2D6", "Adjust Dosage", "IM – Intermediate Metabolizer")).toBe("moderate");
    expect(resolveSeverity("CODEINE", "CYP2D6", "Ineffective", "PM – Poor Metabolizer")).toBe("moderate");
    expect(resolveSeverity("CODEINE", "CYP2D6", "Toxic", "UM – Ultrarapid Metabolizer")).toBe("high");
    expect(resolveSeverity("ASPIRIN", null, "Unknown", null)).toBe("low");
  });

  it("escalates critical poor-metabolizer pairs", () => {
    expect(resolveSeverity("FLUOROURACIL", "DPYD", "Toxic", "PM – Poor Metabolizer")).toBe("critical");
    expect(resolveSeverity("AZATHIOPRINE", "TPMT", "Toxic", "PM – Poor Metabolizer")).toBe("critical");
  });

  it("keeps other toxic results at high", () => {
    expect(resolveSeverity("WARFARIN", "CYP2C9", "Toxic", "PM – Poor Metabolizer")).toBe("high");
    expect(resolveSeverity("FLUOROURACIL", null, "Toxic", "PM – Poor Metabolizer")).toBe("high");
  });
});

describe("resolveSeverity across combinations", () => {
  const pairs: Array<[drug: string, gene: string]> = [
    ["FLUOROURACIL", "DPYD"],
    ["AZATHIOPRINE", "TPMT"],
    ["FLUOROURACIL", "TPMT"],
    ["AZATHIOPRINE", "DPYD"],
    ["CODEINE", "CYP2D6"],
    ["WARFARIN", "CYP2C9"],
    ["CLOPIDOGREL", "CYP2C19"],
    ["SIMVASTATIN", "SLCO1B1"],
  ];
  const phenotypes = [
    "PM – Poor Metabolizer",
    "IM – Intermediate Metabolizer",
    "NM – Normal Metabolizer",
    "RM – Rapid Metabolizer",
    "UM – Ultrarapid Metabolizer",
    "Poor Function – High Statin Myopathy Risk",
    "*1/*1 assumed",
    "UNKNOWN",
  ];
  const expectedByLabel = { Safe: "none", "Adjust Dosage": "moderate", Ineffective: "moderate", Toxic: "high", Unknown: "low" };
  const critical = new Set(["FLUOROURACIL:DPYD", "AZATHIOPRINE:TPMT"]);

  it("is critical only for toxic poor metabolizers of the critical pairs", () => {
    for (const [drug, gene] of pairs) {
      for (const label of RISK_LABELS) {
        for (const phenotype of phenotypes) {
          const isCritical = label === "Toxic" && phenotype.startsWith("PM") && critical.has(`${drug}:${gene}`);
          expect(resolveSeverity(drug, gene, label, phenotype), `${drug}/${gene}/${label}/${phenotype}`).toBe(
            isCritical ? "critical" : expectedByLabel[label],
          );
        }
      }
    }
  });

  it("keeps near misses off critical", () => {
    expect(resolveSeverity("FLUOROURACIL", "DPYD", "Toxic", "IM – Intermediate Metabolizer")).toBe("high");
    expect(resolveSeverity("AZATHIOPRINE", "TPMT", "Adjust Dosage", "PM – Poor Metabolizer")).toBe("moderate");
    expect(resolveSeverity("FLUOROURACIL", "TPMT", "Toxic", "PM – Poor Metabolizer")).toBe("high");
    expect(resolveSeverity("AZATHIOPRINE", "TPMT", "Toxic", null)).toBe("high");
  });
});

describe("assessRisk", () => {
  it("returns a frozen assessment", () => {
    const assessment = assessRisk({
      drug: "FLUOROURACIL",
      gene: "DPYD",
      riskLabel: "Toxic",
      phenotype: "PM – Poor Metabolizer",
      basis: "rule",
    });
    expect(assessment).toEqual({ riskLabel: "Toxic", severity: "critical", confidenceScore: 0.95 });
    expect(Object.isFrozen(assessment)).toBe(true);
  });
});
