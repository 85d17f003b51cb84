export const RISK_CLASSES = ["LOW", "MEDIUM", "HIGH"] as const;

export type RiskClass = (typeof RISK_CLASSES)[number];

export type RiskTable = {
  defaultClass: RiskClass;
  fields: Record<string, RiskClass>;
};

export type RiskElevator = "PROD_ENVIRONMENT" | "DELETE_OPERATION" | "DESTROY_OPERATION";

export type RiskClassification = {
  riskClass: RiskClass;
  baseClass: RiskClass;
  matchedField: string | null;
  elevators: RiskElevator[];
};

export function riskRank(riskClass: RiskClass): number {
  return RISK_CLASSES.indexOf(riskClass);
}

export function maxRisk(a: RiskClass, b: RiskClass): RiskClass {
  return riskRank(a) >= riskRank(b) ? a : b;
}

export function elevateOneStep(riskClass: RiskClass): RiskClass {
  const next = RISK_CLASSES[riskRank(riskClass) + 1];
  return next ?? "HIGH";
}
