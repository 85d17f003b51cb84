import { createApprovalStore } from "./approvals/store";
import type { ApprovalStore } from "./approvals/types";
import { createApprovalWorkflow, type ApprovalWorkflow } from "./approvals/workflow";
import { createAuditStore } from "./audit/store";
import type { AuditQuery, AuditRecord, AuditStore } from "./audit/types";
import { randomIds, systemClock, type Clock, type IdGenerator } from "./clock";
import { config, type BatchRiskAggregation } from "./config";
import { LoggingChangeApplier, type ChangeApplier } from "./escalation/applier";
import { createEscalationEngine, type BatchDecision, type BatchItem, type EscalationEngine } from "./escalation/engine";
import type { EscalationAction, EscalationAuditRecord } from "./escalation/types";
import { createBreakGlassDesk, type BreakGlassDesk } from "./gate/break-glass";
import { createGateController, type GateController } from "./gate/controller";
import { createGateStore } from "./gate/store";
import type { GateCheckRequest, GateCheckResult, GateStore } from "./gate/types";
import { isGatedOperation } from "./gate/types";
import { logger as rootLogger, type Logger } from "./logger";
import { KafkaNotifier } from "./notifications/kafka";
import { LogNotifier } from "./notifications/notifier";
import type { Notifier } from "./notifications/types";
import { createRulePolicyEvaluator, PolicyEvaluationFailedError, type PolicyEvaluator } from "./policy/evaluator";
import { createHttpPolicyEvaluator } from "./policy/http-evaluator";
import { createPolicyLoader, type PolicyLoader, type PolicySnapshot } from "./policy/loader";
import type { PolicyEvaluation } from "./policy/types";
import { effectiveOperationKind, parseChangeProposal } from "./proposal/schema";
import type { ChangeProposal } from "./proposal/types";
import { createRiskClassifier, type RiskClassifier } from "./risk/classifier";
import { DEFAULT_RISK_TABLE } from "./risk/risk-table";
import type { RiskClass, RiskClassification } from "./risk/types";

export type GuardrailSettings = {
  failClosed: boolean;
  batchAggregation: BatchRiskAggregation;
  approvalExpirySeconds: number;
  breakGlassMaxTtlSeconds: number;
  annotationPrefix: string;
};

export type GuardrailServiceOptions = {
  policyLoader: PolicyLoader;
  evaluator?: PolicyEvaluator;
  classifier?: RiskClassifier;
  gateStore?: GateStore;
  approvalStore?: ApprovalStore;
  auditStore?: AuditStore;
  notifier?: Notifier;
  applier?: ChangeApplier;
  clock?: Clock;
  ids?: IdGenerator;
  logger?: Logger;
  settings?: Partial<GuardrailSettings>;
};

export type ChangeSubmission = {
  proposal: unknown;
  // a caller that already ran policy passes its result; otherwise the evaluator is asked
  policy?: PolicyEvaluation;
  annotations?: Record<string, string>;
};

export type SubmissionResult = {
  action: EscalationAction;
  riskClass: RiskClass;
  policy: PolicyEvaluation | null;
  gate: GateCheckResult | null;
  auditRecord: EscalationAuditRecord;
  pendingDecisionId: string | null;
  applied: boolean;
};

export type BatchSubmission = {
  items: ChangeSubmission[];
  aggregation?: BatchRiskAggregation;
};

export type BatchSubmissionResult = BatchDecision & {
  gates: Array<GateCheckResult | null>;
  applied: boolean;
};

export type GuardrailService = {
  classify: (input: unknown) => { proposal: ChangeProposal; classification: RiskClassification };
  submit: (submission: ChangeSubmission) => Promise<SubmissionResult>;
  submitBatch: (submission: BatchSubmission) => Promise<BatchSubmissionResult>;
  checkGate: (request: GateCheckRequest) => Promise<GateCheckResult>;
  breakGlass: BreakGlassDesk;
  approvals: ApprovalWorkflow;
  queryAudit: (filters?: AuditQuery) => Promise<AuditRecord[]>;
  currentPolicy: () => PolicySnapshot;
  reloadPolicy: () => PolicySnapshot;
  settings: GuardrailSettings;
};

const DEFAULT_SETTINGS: GuardrailSettings = {
  failClosed: true,
  batchAggregation: "max",
  approvalExpirySeconds: 0,
  breakGlassMaxTtlSeconds: 86400,
  annotationPrefix: "confighub.io/"
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function withEffectiveKind(proposal: ChangeProposal): ChangeProposal {
  const operationKind = effectiveOperationKind(proposal);
  return operationKind === proposal.operationKind ? proposal : Object.freeze({ ...proposal, operationKind });
}

/**
 * Wires the pipeline: gate (for delete/destroy), risk classification,
 * policy evaluation, escalation and then apply or park for approval.
 * Every collaborator can be swapped; defaults are the in-memory ones.
 */
export function createGuardrailService(options: GuardrailServiceOptions): GuardrailService {
  const settings: GuardrailSettings = { ...DEFAULT_SETTINGS, ...options.settings };
  const logger = options.logger ?? rootLogger;
  const clock = options.clock ?? systemClock;
  const ids = options.ids ?? randomIds;
  const policyLoader = options.policyLoader;
  const evaluator = options.evaluator ?? createRulePolicyEvaluator(policyLoader);
  const classifier =
    options.classifier ??
    createRiskClassifier({ table: () => policyLoader.getSnapshot().policy?.riskTable ?? DEFAULT_RISK_TABLE });
  const gateStore = options.gateStore ?? createGateStore();
  const approvalStore = options.approvalStore ?? createApprovalStore();
  const audit = options.auditStore ?? createAuditStore();
  const notifier = options.notifier ?? new LogNotifier(logger);
  const applier = options.applier ?? new LoggingChangeApplier(logger);

  const engine: EscalationEngine = createEscalationEngine({
    notifier,
    approvals: approvalStore,
    audit,
    clock,
    ids,
    logger,
    batchAggregation: settings.batchAggregation
  });
  const gate: GateController = createGateController({
    store: gateStore,
    audit,
    clock,
    ids,
    logger,
    annotationPrefix: settings.annotationPrefix
  });
  const breakGlass = createBreakGlassDesk({
    store: gateStore,
    audit,
    clock,
    ids,
    logger,
    maxTtlSeconds: settings.breakGlassMaxTtlSeconds
  });
  const approvals = createApprovalWorkflow({
    store: approvalStore,
    applier,
    audit,
    clock,
    ids,
    logger,
    expirySeconds: settings.approvalExpirySeconds
  });

  const evaluatePolicy = async (
    proposal: ChangeProposal,
    supplied: PolicyEvaluation | undefined
  ): Promise<{ policy: PolicyEvaluation; failed: boolean }> => {
    if (supplied) {
      return { policy: supplied, failed: false };
    }
    try {
      return { policy: await evaluator.evaluate(proposal), failed: false };
    } catch (error) {
      const failure =
        error instanceof PolicyEvaluationFailedError
          ? error
          : new PolicyEvaluationFailedError(`Policy evaluation failed: ${describeError(error)}`, { cause: error });
      if (!settings.failClosed) {
        throw failure;
      }
      logger.error({ error: failure.message, targetId: proposal.targetId }, "Policy evaluator failed; failing closed");
      return {
        policy: { outcome: "FAIL", messages: [`Policy evaluator unavailable; failing closed: ${failure.message}`] },
        failed: true
      };
    }
  };

  const runGate = async (
    proposal: ChangeProposal,
    annotations: Record<string, string> | undefined
  ): Promise<GateCheckResult | null> => {
    if (!isGatedOperation(proposal.operationKind)) {
      return null;
    }
    return gate.check({
      resourceId: proposal.targetId,
      operationKind: proposal.operationKind,
      requestedBy: proposal.requestedBy,
      annotations
    });
  };

  const submit: GuardrailService["submit"] = async (submission) => {
    const proposal = withEffectiveKind(parseChangeProposal(submission.proposal));
    const riskClass = classifier.classify(proposal);

    const gateResult = await runGate(proposal, submission.annotations);
    if (gateResult?.decision === "DENY") {
      const blocked = await engine.blockAtGate(proposal, riskClass, gateResult.reason);
      return {
        action: blocked.action,
        riskClass,
        policy: null,
        gate: gateResult,
        auditRecord: blocked.auditRecord,
        pendingDecisionId: null,
        applied: false
      };
    }

    const { policy, failed } = await evaluatePolicy(proposal, submission.policy);
    const decision = await engine.decide(proposal, riskClass, policy, { policyEvaluationFailed: failed });

    let applied = false;
    if (decision.action === "AUTO_APPLY" || decision.action === "APPLY_WITH_NOTIFY") {
      await applier.apply([proposal], { decisionId: decision.auditRecord.decisionId, trigger: decision.action });
      applied = true;
    }

    return {
      action: decision.action,
      riskClass,
      policy,
      gate: gateResult,
      auditRecord: decision.auditRecord,
      pendingDecisionId: decision.pendingDecision?.id ?? null,
      applied
    };
  };

  const submitBatch: GuardrailService["submitBatch"] = async (submission) => {
    const items: BatchItem[] = [];
    const gates: Array<GateCheckResult | null> = [];

    for (const entry of submission.items) {
      const proposal = withEffectiveKind(parseChangeProposal(entry.proposal));
      const gateResult = await runGate(proposal, entry.annotations);
      const { policy, failed } = await evaluatePolicy(proposal, entry.policy);
      gates.push(gateResult);
      items.push({
        proposal,
        riskClass: classifier.classify(proposal),
        policy,
        policyEvaluationFailed: failed,
        gateReason: gateResult?.decision === "DENY" ? gateResult.reason : null
      });
    }

    const decision = await engine.decideBatch(items, submission.aggregation ?? settings.batchAggregation);

    let applied = false;
    if (decision.aggregation === "max") {
      if (decision.action === "AUTO_APPLY" || decision.action === "APPLY_WITH_NOTIFY") {
        await applier.apply(
          items.map((item) => item.proposal),
          { decisionId: decision.batchId, trigger: decision.action }
        );
        applied = true;
      }
    } else {
      for (const member of decision.decisions) {
        if (member.action === "AUTO_APPLY" || member.action === "APPLY_WITH_NOTIFY") {
          await applier.apply([member.auditRecord.proposal], {
            decisionId: member.auditRecord.decisionId,
            trigger: member.action
          });
          applied = true;
        }
      }
    }

    return { ...decision, gates, applied };
  };

  return {
    classify: (input) => {
      const proposal = withEffectiveKind(parseChangeProposal(input));
      return { proposal, classification: classifier.explain(proposal) };
    },
    submit,
    submitBatch,
    checkGate: (request) => gate.check(request),
    breakGlass,
    approvals,
    queryAudit: (filters) => audit.query(filters),
    currentPolicy: () => policyLoader.getSnapshot(),
    reloadPolicy: () => policyLoader.reload(),
    settings
  };
}

export type ConfiguredGuardrailService = {
  service: GuardrailService;
  start: () => Promise<void>;
  stop: () => Promise<void>;
};

/** Builds the service from environment configuration, choosing Kafka or log notifications and the HTTP or rule evaluator. */
export function createConfiguredGuardrailService(logger: Logger = rootLogger): ConfiguredGuardrailService {
  const policyLoader = createPolicyLoader({
    path: config.policy.path,
    logger,
    handleSignals: config.policy.reloadEnabled
  });
  const evaluator = config.policy.evaluatorUrl
    ? createHttpPolicyEvaluator({ baseUrl: config.policy.evaluatorUrl, timeoutMs: config.policy.evaluatorTimeoutMs })
    : createRulePolicyEvaluator(policyLoader);
  const kafka =
    config.notifications.brokers.length > 0
      ? new KafkaNotifier({
          clientId: config.serviceName,
          brokers: config.notifications.brokers,
          topic: config.notifications.topic
        })
      : null;

  const service = createGuardrailService({
    policyLoader,
    evaluator,
    notifier: kafka ?? new LogNotifier(logger),
    logger,
    settings: {
      failClosed: config.policy.failClosed,
      batchAggregation: config.escalation.batchAggregation,
      approvalExpirySeconds: config.escalation.approvalExpirySeconds,
      breakGlassMaxTtlSeconds: config.breakGlass.maxTtlSeconds,
      annotationPrefix: config.annotationPrefix
    }
  });

  return {
    service,
    start: async () => {
      if (kafka) {
        await kafka.start();
      }
    },
    stop: async () => {
      if (kafka) {
        await kafka.stop();
      }
    }
  };
}
