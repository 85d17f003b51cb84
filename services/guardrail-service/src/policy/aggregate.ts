import type { PolicyOutcome } from "./types";

const SEVERITY: Record<PolicyOutcome, number> = {
  PASS: 0,
  WARN: 1,
  FAIL: 2
};

/** Worst outcome wins: one FAIL fails the lot, whatever the majority says. */
export function aggregateOutcomes(outcomes: PolicyOutcome[]): PolicyOutcome {
  return outcomes.reduce<PolicyOutcome>(
    (worst, outcome) => (SEVERITY[outcome] > SEVERITY[worst] ? outcome : worst),
    "PASS"
  );
}
