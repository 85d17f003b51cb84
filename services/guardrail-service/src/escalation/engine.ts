import type { ApprovalStore, PendingDecisionRecord } from "../approvals/types";
import type { AuditStore } from "../audit/types";
import type { Clock, IdGenerator } from "../clock";
import type { BatchRiskAggregation } from "../config";
import type { Logger } from "../logger";
import type { EscalationNotificationKind, Notifier } from "../notifications/types";
import { aggregateOutcomes } from "../policy/aggregate";
import type { PolicyEvaluation, PolicyOutcome } from "../policy/types";
import { InvalidProposalError } from "../proposal/schema";
import type { ChangeProposal } from "../proposal/types";
import type { RiskClass } from "../risk/types";
import { maxRisk } from "../risk/types";
import { describeAction, mostRestrictive, resolveAction } from "./matrix";
import type { EscalationAction, EscalationAuditRecord, EscalationDecision } from "./types";

export type DecideOptions = {
  batchId?: string | null;
  policyEvaluationFailed?: boolean;
};

export type EngineDecision = EscalationDecision & {
  pendingDecision: PendingDecisionRecord | null;
};

export type BatchItem = {
  proposal: ChangeProposal;
  riskClass: RiskClass;
  policy: PolicyEvaluation;
  policyEvaluationFailed?: boolean;
  // set when the delete/destroy gate rejected this member
  gateReason?: string | null;
};

export type BatchDecision = {
  batchId: string;
  aggregation: BatchRiskAggregation;
  action: EscalationAction;
  effectiveRiskClass: RiskClass;
  effectiveOutcome: PolicyOutcome;
  reason: string;
  decisions: EscalationDecision[];
  pendingDecisions: PendingDecisionRecord[];
};

export type EscalationEngine = {
  decide: (
    proposal: ChangeProposal,
    riskClass: RiskClass,
    policy: PolicyEvaluation,
    options?: DecideOptions
  ) => Promise<EngineDecision>;
  blockAtGate: (proposal: ChangeProposal, riskClass: RiskClass, reason: string) => Promise<EscalationDecision>;
  decideBatch: (items: BatchItem[], aggregation?: BatchRiskAggregation) => Promise<BatchDecision>;
};

function warningsFor(policy: PolicyEvaluation): string[] {
  if (policy.outcome !== "WARN") {
    return [];
  }
  return policy.messages.length > 0 ? policy.messages : ["Policy returned WARN without messages."];
}

function blockedReason(proposal: ChangeProposal, policy: PolicyEvaluation): string {
  const detail = policy.messages.length > 0 ? ` ${policy.messages.join(" ")}` : "";
  return `Change to ${proposal.field} on ${proposal.targetId} blocked: policy evaluation FAIL.${detail}`;
}

export function createEscalationEngine(deps: {
  notifier: Notifier;
  approvals: ApprovalStore;
  audit: AuditStore;
  clock: Clock;
  ids: IdGenerator;
  logger: Logger;
  batchAggregation?: BatchRiskAggregation;
}): EscalationEngine {
  const defaultAggregation = deps.batchAggregation ?? "max";

  const persist = async (record: EscalationAuditRecord): Promise<void> => {
    await deps.audit.append({
      id: record.decisionId,
      kind: "ESCALATION_DECISION",
      resourceId: record.targetId,
      actor: record.requestedBy,
      action: record.action,
      reason: record.reason,
      occurredAt: new Date(record.decidedAt),
      details: record
    });
  };

  // Delivery problems are recorded on the decision; they never change the action.
  const sendNotification = async (input: {
    kind: EscalationNotificationKind;
    decisionId: string;
    batchId: string | null;
    pendingDecisionId: string | null;
    proposals: ChangeProposal[];
    riskClass: RiskClass;
    policy: PolicyEvaluation;
    reason: string;
  }): Promise<boolean> => {
    try {
      await deps.notifier.notify({
        id: deps.ids(),
        kind: input.kind,
        decisionId: input.decisionId,
        batchId: input.batchId,
        pendingDecisionId: input.pendingDecisionId,
        proposals: input.proposals,
        riskClass: input.riskClass,
        policyOutcome: input.policy.outcome,
        policyMessages: input.policy.messages,
        reason: input.reason,
        occurredAt: deps.clock.now().toISOString()
      });
      return true;
    } catch (error) {
      deps.logger.error({ error, decisionId: input.decisionId }, "Escalation notification failed");
      return false;
    }
  };

  const openPending = async (input: {
    decisionId: string;
    batchId: string | null;
    proposals: ChangeProposal[];
    riskClass: RiskClass;
    policy: PolicyEvaluation;
    reason: string;
  }): Promise<PendingDecisionRecord> =>
    deps.approvals.createPending({
      id: deps.ids(),
      decisionId: input.decisionId,
      batchId: input.batchId,
      proposals: input.proposals,
      riskClass: input.riskClass,
      policyOutcome: input.policy.outcome,
      policyMessages: input.policy.messages,
      reason: input.reason,
      requestedBy: input.proposals[0]?.requestedBy ?? "unknown",
      createdAt: deps.clock.now()
    });

  /**
   * Resolves the action for one proposal and carries out its side effects:
   * a notice for APPLY_WITH_NOTIFY, a pending decision plus approval request
   * for REQUIRE_APPROVAL. Applying the change is left to the caller.
   */
  const decide: EscalationEngine["decide"] = async (proposal, riskClass, policy, options) => {
    const decisionId = deps.ids();
    const batchId = options?.batchId ?? null;
    const action = resolveAction(riskClass, policy.outcome);
    const reason = action === "BLOCKED" ? blockedReason(proposal, policy) : describeAction(action, riskClass, policy.outcome);
    const warnings = warningsFor(policy);

    if (warnings.length > 0) {
      deps.logger.warn({ decisionId, targetId: proposal.targetId, riskClass, warnings }, "Applying change with policy warnings");
    }

    let pendingDecision: PendingDecisionRecord | null = null;
    let notificationDelivered: boolean | null = null;

    if (action === "REQUIRE_APPROVAL") {
      pendingDecision = await openPending({ decisionId, batchId, proposals: [proposal], riskClass, policy, reason });
      notificationDelivered = await sendNotification({
        kind: "APPROVAL_REQUESTED",
        decisionId,
        batchId,
        pendingDecisionId: pendingDecision.id,
        proposals: [proposal],
        riskClass,
        policy,
        reason
      });
    } else if (action === "APPLY_WITH_NOTIFY") {
      notificationDelivered = await sendNotification({
        kind: "CHANGE_NOTICE",
        decisionId,
        batchId,
        pendingDecisionId: null,
        proposals: [proposal],
        riskClass,
        policy,
        reason
      });
    }

    const auditRecord: EscalationAuditRecord = {
      decisionId,
      batchId,
      targetId: proposal.targetId,
      requestedBy: proposal.requestedBy,
      proposal,
      riskClass,
      policyOutcome: policy.outcome,
      policyMessages: policy.messages,
      policyEvaluationFailed: options?.policyEvaluationFailed ?? false,
      action,
      blockedBy: action === "BLOCKED" ? "POLICY" : null,
      reason,
      warnings,
      notificationDelivered,
      pendingDecisionId: pendingDecision?.id ?? null,
      decidedAt: deps.clock.now().toISOString()
    };
    await persist(auditRecord);

    return { action, auditRecord, pendingDecision };
  };

  const blockAtGate: EscalationEngine["blockAtGate"] = async (proposal, riskClass, reason) => {
    const auditRecord: EscalationAuditRecord = {
      decisionId: deps.ids(),
      batchId: null,
      targetId: proposal.targetId,
      requestedBy: proposal.requestedBy,
      proposal,
      riskClass,
      policyOutcome: null,
      policyMessages: [],
      policyEvaluationFailed: false,
      action: "BLOCKED",
      blockedBy: "GATE",
      reason,
      warnings: [],
      notificationDelivered: null,
      pendingDecisionId: null,
      decidedAt: deps.clock.now().toISOString()
    };
    await persist(auditRecord);
    return { action: "BLOCKED", auditRecord };
  };

  const blockWholeBatch = async (
    batchId: string,
    items: BatchItem[],
    aggregation: BatchRiskAggregation,
    effectiveRiskClass: RiskClass,
    effectiveOutcome: PolicyOutcome
  ): Promise<BatchDecision> => {
    const failed = items.filter((item) => item.policy.outcome === "FAIL").map((item) => item.proposal.targetId);
    const gated = items.filter((item) => item.gateReason).map((item) => item.proposal.targetId);
    const causes: string[] = [];
    if (failed.length > 0) {
      causes.push(`policy FAIL on ${failed.join(", ")}`);
    }
    if (gated.length > 0) {
      causes.push(`gate BLOCKED on ${gated.join(", ")}`);
    }
    const reason = `Batch blocked: ${causes.join("; ")}.`;
    const decisions: EscalationDecision[] = [];

    for (const item of items) {
      const ownFailure = item.policy.outcome === "FAIL";
      const memberReason = item.gateReason || (ownFailure ? blockedReason(item.proposal, item.policy) : reason);
      const auditRecord: EscalationAuditRecord = {
        decisionId: deps.ids(),
        batchId,
        targetId: item.proposal.targetId,
        requestedBy: item.proposal.requestedBy,
        proposal: item.proposal,
        riskClass: item.riskClass,
        policyOutcome: item.policy.outcome,
        policyMessages: item.policy.messages,
        policyEvaluationFailed: item.policyEvaluationFailed ?? false,
        action: "BLOCKED",
        blockedBy: item.gateReason ? "GATE" : ownFailure ? "POLICY" : "BATCH",
        reason: memberReason,
        warnings: [],
        notificationDelivered: null,
        pendingDecisionId: null,
        decidedAt: deps.clock.now().toISOString()
      };
      await persist(auditRecord);
      decisions.push({ action: "BLOCKED", auditRecord });
    }

    return {
      batchId,
      aggregation,
      action: "BLOCKED",
      effectiveRiskClass,
      effectiveOutcome,
      reason,
      decisions,
      pendingDecisions: []
    };
  };

  const decideBatch: EscalationEngine["decideBatch"] = async (items, aggregation = defaultAggregation) => {
    if (items.length === 0) {
      throw new InvalidProposalError("A batch must contain at least one proposal");
    }
    const batchId = deps.ids();
    const effectiveRiskClass = items.map((item) => item.riskClass).reduce(maxRisk);
    const effectiveOutcome = aggregateOutcomes(items.map((item) => item.policy.outcome));

    // Any FAIL or gate rejection blocks every member; partial application is never allowed.
    if (effectiveOutcome === "FAIL" || items.some((item) => item.gateReason)) {
      return blockWholeBatch(batchId, items, aggregation, effectiveRiskClass, effectiveOutcome);
    }

    if (aggregation === "per-item") {
      const results: EngineDecision[] = [];
      for (const item of items) {
        results.push(
          await decide(item.proposal, item.riskClass, item.policy, {
            batchId,
            policyEvaluationFailed: item.policyEvaluationFailed
          })
        );
      }
      const action = mostRestrictive(results.map((result) => result.action));
      return {
        batchId,
        aggregation,
        action,
        effectiveRiskClass,
        effectiveOutcome,
        reason: `Per-item escalation; most restrictive member action is ${action}.`,
        decisions: results.map(({ action: memberAction, auditRecord }) => ({ action: memberAction, auditRecord })),
        pendingDecisions: results.flatMap((result) => (result.pendingDecision ? [result.pendingDecision] : []))
      };
    }

    // max: the batch is treated as one change at its riskiest member's class.
    const decisionId = deps.ids();
    const action = resolveAction(effectiveRiskClass, effectiveOutcome);
    const proposals = items.map((item) => item.proposal);
    const policy: PolicyEvaluation = {
      outcome: effectiveOutcome,
      messages: items.flatMap((item) => item.policy.messages)
    };
    const reason = `Batch of ${items.length}: ${describeAction(action, effectiveRiskClass, effectiveOutcome)}`;
    const warnings = warningsFor(policy);

    if (warnings.length > 0) {
      deps.logger.warn({ batchId, riskClass: effectiveRiskClass, warnings }, "Applying batch with policy warnings");
    }

    let pendingDecision: PendingDecisionRecord | null = null;
    let notificationDelivered: boolean | null = null;
    if (action === "REQUIRE_APPROVAL") {
      pendingDecision = await openPending({ decisionId, batchId, proposals, riskClass: effectiveRiskClass, policy, reason });
      notificationDelivered = await sendNotification({
        kind: "APPROVAL_REQUESTED",
        decisionId,
        batchId,
        pendingDecisionId: pendingDecision.id,
        proposals,
        riskClass: effectiveRiskClass,
        policy,
        reason
      });
    } else if (action === "APPLY_WITH_NOTIFY") {
      notificationDelivered = await sendNotification({
        kind: "CHANGE_NOTICE",
        decisionId,
        batchId,
        pendingDecisionId: null,
        proposals,
        riskClass: effectiveRiskClass,
        policy,
        reason
      });
    }

    const decisions: EscalationDecision[] = [];
    for (const item of items) {
      const auditRecord: EscalationAuditRecord = {
        decisionId: `${decisionId}:${item.proposal.targetId}:${decisions.length}`,
        batchId,
        targetId: item.proposal.targetId,
        requestedBy: item.proposal.requestedBy,
        proposal: item.proposal,
        riskClass: item.riskClass,
        policyOutcome: item.policy.outcome,
        policyMessages: item.policy.messages,
        policyEvaluationFailed: item.policyEvaluationFailed ?? false,
        action,
        blockedBy: null,
        reason,
        warnings: warningsFor(item.policy),
        notificationDelivered,
        pendingDecisionId: pendingDecision?.id ?? null,
        decidedAt: deps.clock.now().toISOString()
      };
      await persist(auditRecord);
      decisions.push({ action, auditRecord });
    }

    return {
      batchId,
      aggregation,
      action,
      effectiveRiskClass,
      effectiveOutcome,
      reason,
      decisions,
      pendingDecisions: pendingDecision ? [pendingDecision] : []
    };
  };

  return { decide, blockAtGate, decideBatch };
}
