import type { ChangeProposal } from "../proposal/types";
import type { PolicyOutcome } from "../policy/types";
import type { RiskClass } from "../risk/types";

export type EscalationNotificationKind = "CHANGE_NOTICE" | "APPROVAL_REQUESTED";

export type EscalationNotification = {
  id: string;
  kind: EscalationNotificationKind;
  decisionId: string;
  batchId: string | null;
  pendingDecisionId: string | null;
  proposals: ChangeProposal[];
  riskClass: RiskClass;
  policyOutcome: PolicyOutcome;
  policyMessages: string[];
  reason: string;
  occurredAt: string;
};

export type Notifier = {
  notify: (notification: EscalationNotification) => Promise<void>;
};
