import { GuardrailError } from "../errors";
import { lastFieldSegment } from "../proposal/schema";
import type { ChangeProposal } from "../proposal/types";
import { aggregateOutcomes } from "./aggregate";
import type { PolicyLoader } from "./loader";
import type { PolicyConstraint, PolicyEvaluation, PolicyRule, PolicyRuleResult } from "./types";

/**
 * Anything that can judge a proposal against declarative rules. The engine
 * only ever sees the structured result.
 */
export type PolicyEvaluator = {
  evaluate: (proposal: ChangeProposal) => Promise<PolicyEvaluation>;
};

/** The evaluator itself broke. Distinct from a FAIL outcome. */
export class PolicyEvaluationFailedError extends GuardrailError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 503, options);
    this.name = "PolicyEvaluationFailedError";
  }
}

function fieldMatches(ruleFields: string[] | undefined, field: string): boolean {
  if (!ruleFields) {
    return true;
  }
  return ruleFields.includes(field) || ruleFields.includes(lastFieldSegment(field));
}

function ruleApplies(rule: PolicyRule, proposal: ChangeProposal): boolean {
  const { fields, environments, operationKinds } = rule.appliesTo;
  if (!fieldMatches(fields, proposal.field)) {
    return false;
  }
  if (environments && !environments.includes(proposal.environment)) {
    return false;
  }
  if (operationKinds && !operationKinds.includes(proposal.operationKind)) {
    return false;
  }
  return true;
}

function constraintHolds(constraint: PolicyConstraint, proposal: ChangeProposal): boolean {
  const value = proposal.proposedValue;
  switch (constraint.type) {
    case "MAX_VALUE":
      return typeof value === "number" && value > constraint.params.max;
    case "MIN_VALUE":
      return typeof value === "number" && value < constraint.params.min;
    case "ALLOWED_VALUES":
      return value === null || !constraint.params.values.includes(value);
    case "DENIED_VALUES":
      return value !== null && constraint.params.values.includes(value);
    case "NEW_RESOURCE":
      return proposal.isNewResource === constraint.params.value;
    default:
      return false;
  }
}

function orderRules(rules: PolicyRule[]): PolicyRule[] {
  return rules
    .filter((rule) => rule.enabled)
    .slice()
    .sort((a, b) => {
      if (b.priority !== a.priority) {
        return b.priority - a.priority;
      }
      return a.id.localeCompare(b.id);
    });
}

export function evaluateRules(rules: PolicyRule[], proposal: ChangeProposal): PolicyEvaluation {
  const results: PolicyRuleResult[] = [];

  for (const rule of orderRules(rules)) {
    if (!ruleApplies(rule, proposal)) {
      continue;
    }
    const fired = rule.constraints.every((constraint) => constraintHolds(constraint, proposal));
    results.push({
      ruleId: rule.id,
      outcome: fired ? rule.outcome : "PASS",
      message: fired ? rule.message : null
    });
  }

  return {
    outcome: aggregateOutcomes(results.map((result) => result.outcome)),
    messages: results
      .filter((result) => result.message !== null)
      .map((result) => `[${result.ruleId}] ${result.message}`),
    results
  };
}

export function createRulePolicyEvaluator(loader: PolicyLoader): PolicyEvaluator {
  return {
    evaluate: async (proposal) => {
      const snapshot = loader.getSnapshot();
      if (!snapshot.policy) {
        throw new PolicyEvaluationFailedError(
          `No policy document loaded from ${snapshot.info.path}${snapshot.error ? `: ${snapshot.error}` : ""}`
        );
      }
      try {
        return evaluateRules(snapshot.policy.rules, proposal);
      } catch (error) {
        throw new PolicyEvaluationFailedError("Policy rule evaluation crashed", { cause: error });
      }
    }
  };
}
