import { types, type Instance, type SnapshotIn } from "mobx-state-tree";
import { RISK_LABELS, type RiskLabel } from "./types.ts";

/**
 * Drug → governing gene, with phenotype-prefix rules checked in order.
 * The first rule whose prefix starts the phenotype label decides the risk.
 */

const RiskRule = types.model("RiskRule", {
  prefix: types.string,
  riskLabel: types.enumeration<RiskLabel>("RiskLabel", [...RISK_LABELS]),
});

const DrugRule = types
  .model("DrugRule", {
    drug: types.identifier,
    gene: types.string,
    rules: types.array(RiskRule),
  })
  .views((self) => ({
    classify(phenotype: string): RiskLabel {
      return self.rules.find((r) => phenotype.startsWith(r.prefix))?.riskLabel ?? "Unknown";
    },
  }));

export type DrugRuleInstance = Instance<typeof DrugRule>;

export const DrugRuleTable = types
  .model("DrugRuleTable", {
    drugs: types.map(DrugRule),
  })
  .views((self) => ({
    get supportedDrugs(): string[] {
      return [...self.drugs.keys()];
    },

    find(drug: string): DrugRuleInstance | undefined {
      return self.drugs.get(drug);
    },
  }));

export type DrugRuleTableInstance = Instance<typeof DrugRuleTable>;

type Rules = Array<[prefix: string, riskLabel: RiskLabel]>;

const metabolizer = (pm: RiskLabel, extra: Rules = []): Rules => [
  ["PM", pm],
  ["IM", "Adjust Dosage"],
  ["NM", "Safe"],
  ...extra,
];

const DRUGS: Array<{ drug: string; gene: string; rules: Rules }> = [
  { drug: "CODEINE", gene: "CYP2D6", rules: metabolizer("Ineffective", [["RM", "Toxic"], ["UM", "Toxic"]]) },
  { drug: "WARFARIN", gene: "CYP2C9", rules: metabolizer("Toxic") },
  { drug: "CLOPIDOGREL", gene: "CYP2C19", rules: metabolizer("Ineffective", [["RM", "Safe"]]) },
  {
    drug: "SIMVASTATIN",
    gene: "SLCO1B1",
    rules: [
      ["Poor Function", "Toxic"],
      ["Decreased Function", "Adjust Dosage"],
      ["Normal Function", "Safe"],
    ],
  },
  { drug: "AZATHIOPRINE", gene: "TPMT", rules: metabolizer("Toxic") },
  { drug: "FLUOROURACIL", gene: "DPYD", rules: metabolizer("Toxic") },
];

export function createDrugRuleTable(): DrugRuleTableInstance {
  const drugs: Record<string, SnapshotIn<typeof DrugRule>> = {};
  for (const { drug, gene, rules } of DRUGS) {
    drugs[drug] = { drug, gene, rules: rules.map(([prefix, riskLabel]) => ({ prefix, riskLabel })) };
  }
  return DrugRuleTable.create({ drugs });
}

export const drugRules = createDrugRuleTable();
