import type { PolicyOutcome } from "../policy/types";
import type { RiskClass } from "../risk/types";
import { ESCALATION_ACTIONS, type EscalationAction } from "./types";

export const ESCALATION_MATRIX: Readonly<Record<RiskClass, Readonly<Record<PolicyOutcome, EscalationAction>>>> = {
  LOW: { PASS: "AUTO_APPLY", WARN: "AUTO_APPLY", FAIL: "BLOCKED" },
  MEDIUM: { PASS: "APPLY_WITH_NOTIFY", WARN: "APPLY_WITH_NOTIFY", FAIL: "BLOCKED" },
  HIGH: { PASS: "REQUIRE_APPROVAL", WARN: "REQUIRE_APPROVAL", FAIL: "BLOCKED" }
};

export function resolveAction(riskClass: RiskClass, outcome: PolicyOutcome): EscalationAction {
  return ESCALATION_MATRIX[riskClass][outcome];
}

export function actionRank(action: EscalationAction): number {
  return ESCALATION_ACTIONS.indexOf(action);
}

export function mostRestrictive(actions: EscalationAction[]): EscalationAction {
  return actions.reduce<EscalationAction>(
    (current, action) => (actionRank(action) > actionRank(current) ? action : current),
    "AUTO_APPLY"
  );
}

export function describeAction(action: EscalationAction, riskClass: RiskClass, outcome: PolicyOutcome): string {
  switch (action) {
    case "AUTO_APPLY":
      return `${riskClass} risk change, policy ${outcome}: applied automatically.`;
    case "APPLY_WITH_NOTIFY":
      return `${riskClass} risk change, policy ${outcome}: applied and owners notified.`;
    case "REQUIRE_APPROVAL":
      return `${riskClass} risk change, policy ${outcome}: waiting for human approval before apply.`;
    case "BLOCKED":
      return `Policy ${outcome}: change blocked.`;
  }
}
