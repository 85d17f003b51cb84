import type { Environment, OperationKind } from "../proposal/types";
import type { RiskTable } from "../risk/types";

export const POLICY_OUTCOMES = ["PASS", "WARN", "FAIL"] as const;

export type PolicyOutcome = (typeof POLICY_OUTCOMES)[number];

export type PolicyConstraint =
  | {
      type: "MAX_VALUE";
      params: { max: number };
    }
  | {
      type: "MIN_VALUE";
      params: { min: number };
    }
  | {
      type: "ALLOWED_VALUES";
      params: { values: Array<string | number | boolean> };
    }
  | {
      type: "DENIED_VALUES";
      params: { values: Array<string | number | boolean> };
    }
  | {
      type: "NEW_RESOURCE";
      params: { value: boolean };
    };

export type PolicyRule = {
  id: string;
  enabled: boolean;
  priority: number;
  appliesTo: {
    fields?: string[];
    environments?: Environment[];
    operationKinds?: OperationKind[];
  };
  constraints: PolicyConstraint[];
  outcome: Exclude<PolicyOutcome, "PASS">;
  message: string;
};

export type PolicyDocument = {
  version: "v1";
  riskTable?: RiskTable;
  rules: PolicyRule[];
};

export type PolicyInfo = {
  version: string;
  hash: string;
  loadedAt: string;
  path: string;
};

export type PolicyRuleResult = {
  ruleId: string;
  outcome: PolicyOutcome;
  message: string | null;
};

export type PolicyEvaluation = {
  outcome: PolicyOutcome;
  messages: string[];
  results?: PolicyRuleResult[];
};
