import type { ChangeProposal } from "../proposal/types";
import type { PolicyOutcome } from "../policy/types";
import type { RiskClass } from "../risk/types";

export type PendingDecisionStatus = "PENDING" | "APPROVED" | "REJECTED";

export type PendingDecisionRecord = {
  id: string;
  decisionId: string;
  batchId: string | null;
  proposals: ChangeProposal[];
  riskClass: RiskClass;
  policyOutcome: PolicyOutcome;
  policyMessages: string[];
  reason: string;
  requestedBy: string;
  status: PendingDecisionStatus;
  createdAt: Date;
  resolvedAt: Date | null;
  resolvedBy: string | null;
  resolutionNote: string | null;
};

export type PendingDecisionInput = Omit<PendingDecisionRecord, "status" | "resolvedAt" | "resolvedBy" | "resolutionNote">;

export type PendingDecisionResolution = {
  status: Exclude<PendingDecisionStatus, "PENDING">;
  actor: string;
  note: string | null;
  resolvedAt: Date;
};

export type PendingDecisionView = PendingDecisionRecord & {
  effectiveStatus: PendingDecisionStatus | "EXPIRED";
  expiresAt: Date | null;
};

export type ApprovalStore = {
  createPending: (input: PendingDecisionInput) => Promise<PendingDecisionRecord>;
  getPending: (id: string) => Promise<PendingDecisionRecord | null>;
  listPending: (filters?: { status?: PendingDecisionStatus; limit?: number }) => Promise<PendingDecisionRecord[]>;
  // Transitions only a PENDING record; returns null when the record was already resolved.
  resolve: (id: string, resolution: PendingDecisionResolution) => Promise<PendingDecisionRecord | null>;
};
