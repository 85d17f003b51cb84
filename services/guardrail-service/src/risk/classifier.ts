import { lastFieldSegment, parseChangeProposal } from "../proposal/schema";
import type { ChangeProposal } from "../proposal/types";
import { DEFAULT_RISK_TABLE } from "./risk-table";
import type { RiskClass, RiskClassification, RiskElevator, RiskTable } from "./types";
import { elevateOneStep, maxRisk } from "./types";

export type RiskClassifier = {
  classify: (proposal: ChangeProposal) => RiskClass;
  explain: (proposal: ChangeProposal) => RiskClassification;
};

// Own keys only: field names such as "constructor" must not resolve through the prototype.
function ownEntry(table: RiskTable, key: string): RiskClass | null {
  return Object.hasOwn(table.fields, key) ? table.fields[key] ?? null : null;
}

function lookupBase(table: RiskTable, field: string): { baseClass: RiskClass; matchedField: string | null } {
  const exact = ownEntry(table, field);
  if (exact) {
    return { baseClass: exact, matchedField: field };
  }
  const segment = lastFieldSegment(field);
  const bySegment = ownEntry(table, segment);
  if (bySegment) {
    return { baseClass: bySegment, matchedField: segment };
  }
  return { baseClass: table.defaultClass, matchedField: null };
}

export function classifyWithTable(table: RiskTable, input: ChangeProposal): RiskClassification {
  // Re-validate: callers outside the HTTP layer can hand us anything.
  const proposal = parseChangeProposal(input);
  const { baseClass, matchedField } = lookupBase(table, proposal.field);

  const candidates: RiskClass[] = [baseClass];
  const elevators: RiskElevator[] = [];

  if (proposal.environment === "prod") {
    candidates.push(elevateOneStep(baseClass));
    elevators.push("PROD_ENVIRONMENT");
  }
  if (proposal.operationKind === "delete") {
    candidates.push("HIGH");
    elevators.push("DELETE_OPERATION");
  }
  if (proposal.operationKind === "destroy") {
    candidates.push("HIGH");
    elevators.push("DESTROY_OPERATION");
  }

  return {
    riskClass: candidates.reduce(maxRisk),
    baseClass,
    matchedField,
    elevators
  };
}

export function createRiskClassifier(options?: { table?: () => RiskTable }): RiskClassifier {
  const table = options?.table ?? (() => DEFAULT_RISK_TABLE);
  return {
    classify: (proposal) => classifyWithTable(table(), proposal).riskClass,
    explain: (proposal) => classifyWithTable(table(), proposal)
  };
}
