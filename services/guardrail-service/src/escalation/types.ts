import type { ChangeProposal } from "../proposal/types";
import type { PolicyOutcome } from "../policy/types";
import type { RiskClass } from "../risk/types";

export const ESCALATION_ACTIONS = ["AUTO_APPLY", "APPLY_WITH_NOTIFY", "REQUIRE_APPROVAL", "BLOCKED"] as const;

export type EscalationAction = (typeof ESCALATION_ACTIONS)[number];

export type BlockSource = "POLICY" | "GATE" | "BATCH";

export type EscalationAuditRecord = {
  decisionId: string;
  batchId: string | null;
  targetId: string;
  requestedBy: string;
  proposal: ChangeProposal;
  riskClass: RiskClass;
  // null when the gate stopped the change before policy was consulted
  policyOutcome: PolicyOutcome | null;
  policyMessages: string[];
  policyEvaluationFailed: boolean;
  action: EscalationAction;
  blockedBy: BlockSource | null;
  reason: string;
  warnings: string[];
  notificationDelivered: boolean | null;
  pendingDecisionId: string | null;
  decidedAt: string;
};

export type EscalationDecision = {
  action: EscalationAction;
  auditRecord: EscalationAuditRecord;
};
