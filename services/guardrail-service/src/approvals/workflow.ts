import type { AuditStore } from "../audit/types";
import type { Clock, IdGenerator } from "../clock";
import { GuardrailError } from "../errors";
import type { ChangeApplier } from "../escalation/applier";
import type { Logger } from "../logger";
import type { ApprovalStore, PendingDecisionRecord, PendingDecisionStatus, PendingDecisionView } from "./types";

export class ApprovalStateError extends GuardrailError {
  constructor(message: string, statusCode: 404 | 409) {
    super(message, statusCode);
    this.name = "ApprovalStateError";
  }
}

export type ApprovalWorkflow = {
  get: (id: string) => Promise<PendingDecisionView | null>;
  list: (filters?: { status?: PendingDecisionStatus; limit?: number }) => Promise<PendingDecisionView[]>;
  approve: (id: string, actor: string, note?: string | null) => Promise<PendingDecisionView>;
  reject: (id: string, actor: string, note?: string | null) => Promise<PendingDecisionView>;
};

export function createApprovalWorkflow(deps: {
  store: ApprovalStore;
  applier: ChangeApplier;
  audit: AuditStore;
  clock: Clock;
  ids: IdGenerator;
  logger: Logger;
  // 0 keeps unanswered requests pending forever
  expirySeconds: number;
}): ApprovalWorkflow {
  const toView = (record: PendingDecisionRecord): PendingDecisionView => {
    const expiresAt =
      deps.expirySeconds > 0 ? new Date(record.createdAt.getTime() + deps.expirySeconds * 1000) : null;
    const expired =
      record.status === "PENDING" && expiresAt !== null && deps.clock.now().getTime() >= expiresAt.getTime();
    return {
      ...record,
      effectiveStatus: expired ? "EXPIRED" : record.status,
      expiresAt
    };
  };

  const resolve = async (
    id: string,
    status: "APPROVED" | "REJECTED",
    actor: string,
    note: string | null
  ): Promise<PendingDecisionView> => {
    const existing = await deps.store.getPending(id);
    if (!existing) {
      throw new ApprovalStateError(`Pending decision ${id} not found`, 404);
    }
    const view = toView(existing);
    if (view.effectiveStatus === "EXPIRED") {
      throw new ApprovalStateError(
        `Pending decision ${id} expired at ${view.expiresAt?.toISOString()}; resubmit the change`,
        409
      );
    }
    if (view.effectiveStatus !== "PENDING") {
      throw new ApprovalStateError(`Pending decision ${id} is already ${view.effectiveStatus}`, 409);
    }

    const resolvedAt = deps.clock.now();
    const resolved = await deps.store.resolve(id, { status, actor, note, resolvedAt });
    if (!resolved) {
      throw new ApprovalStateError(`Pending decision ${id} was resolved concurrently`, 409);
    }

    await deps.audit.append({
      id: deps.ids(),
      kind: "APPROVAL_RESOLVED",
      resourceId: resolved.proposals[0]?.targetId ?? "batch",
      actor,
      action: status,
      reason: note ?? `${status.toLowerCase()} by ${actor}`,
      occurredAt: resolvedAt,
      details: {
        pendingDecisionId: resolved.id,
        decisionId: resolved.decisionId,
        batchId: resolved.batchId,
        targetIds: resolved.proposals.map((proposal) => proposal.targetId),
        riskClass: resolved.riskClass
      }
    });

    deps.logger.info({ pendingDecisionId: id, status, actor }, "Pending decision resolved");

    if (status === "APPROVED") {
      await deps.applier.apply(resolved.proposals, {
        decisionId: resolved.decisionId,
        trigger: "APPROVED",
        approvedBy: actor
      });
    }

    return toView(resolved);
  };

  return {
    get: async (id) => {
      const record = await deps.store.getPending(id);
      return record ? toView(record) : null;
    },
    list: async (filters) => {
      const records = await deps.store.listPending(filters);
      return records.map(toView);
    },
    approve: (id, actor, note) => resolve(id, "APPROVED", actor, note ?? null),
    reject: (id, actor, note) => resolve(id, "REJECTED", actor, note ?? null)
  };
}
