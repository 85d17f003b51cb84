import pino from "pino";
import { InMemoryApprovalStore } from "../src/approvals/store";
import { InMemoryAuditStore } from "../src/audit/store";
import { ManualClock, sequentialIds } from "../src/clock";
import type { ApplyContext, ChangeApplier } from "../src/escalation/applier";
import { InMemoryGateStore } from "../src/gate/store";
import type { BreakGlassOverride, GateStore, PreciousResource } from "../src/gate/types";
import { createGuardrailService, type GuardrailSettings } from "../src/guardrails";
import type { EscalationNotification, Notifier } from "../src/notifications/types";
import { createStaticPolicyLoader } from "../src/policy/loader";
import type { PolicyDocument } from "../src/policy/types";
import type { ChangeProposal, ChangeProposalInput } from "../src/proposal/types";
import { parseChangeProposal } from "../src/proposal/schema";
import type { PolicyEvaluator } from "../src/policy/evaluator";

export const silentLogger = pino({ level: "silent" });

export const TEST_POLICY: PolicyDocument = {
  version: "v1",
  rules: [
    {
      id: "lambda-memory-ceiling",
      enabled: true,
      priority: 20,
      appliesTo: { fields: ["lambdaMemory"] },
      constraints: [{ type: "MAX_VALUE", params: { max: 3008 } }],
      outcome: "FAIL",
      message: "Lambda memory above 3008 MB is not allowed."
    },
    {
      id: "prod-lambda-memory-floor",
      enabled: true,
      priority: 10,
      appliesTo: { fields: ["lambdaMemory"], environments: ["prod"] },
      constraints: [{ type: "MIN_VALUE", params: { min: 256 } }],
      outcome: "WARN",
      message: "Production functions below 256 MB tend to time out under load."
    }
  ]
};

export function proposal(overrides: Partial<ChangeProposalInput> = {}): ChangeProposal {
  return parseChangeProposal({
    targetId: "orders-fn",
    field: "lambdaMemory",
    proposedValue: 512,
    currentValue: 256,
    environment: "dev",
    operationKind: "update",
    requestedBy: "ci-bot",
    ...overrides
  });
}

export class RecordingNotifier implements Notifier {
  readonly sent: EscalationNotification[] = [];
  failWith: Error | null = null;

  async notify(notification: EscalationNotification): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push(notification);
  }
}

export class RecordingApplier implements ChangeApplier {
  readonly applied: Array<{ proposals: ChangeProposal[]; context: ApplyContext }> = [];

  async apply(proposals: ChangeProposal[], context: ApplyContext): Promise<void> {
    this.applied.push({ proposals, context });
  }
}

/** Stands in for a database that refuses every connection. */
export class UnreachableGateStore implements GateStore {
  private fail(): never {
    throw new Error("connect ECONNREFUSED 127.0.0.1:5432");
  }

  async upsertPreciousResource(_resource: PreciousResource): Promise<PreciousResource> {
    return this.fail();
  }

  async getPreciousResource(_resourceId: string): Promise<PreciousResource | null> {
    return this.fail();
  }

  async listPreciousResources(): Promise<PreciousResource[]> {
    return this.fail();
  }

  async recordOverride(_override: BreakGlassOverride): Promise<BreakGlassOverride> {
    return this.fail();
  }

  async listOverrides(_resourceId: string): Promise<BreakGlassOverride[]> {
    return this.fail();
  }
}

export function buildHarness(options?: {
  gateStore?: GateStore;
  policy?: PolicyDocument;
  evaluator?: PolicyEvaluator;
  settings?: Partial<GuardrailSettings>;
}) {
  const clock = new ManualClock("2024-05-01T12:00:00.000Z");
  const gateStore = options?.gateStore ?? new InMemoryGateStore();
  const approvalStore = new InMemoryApprovalStore();
  const auditStore = new InMemoryAuditStore();
  const notifier = new RecordingNotifier();
  const applier = new RecordingApplier();
  const service = createGuardrailService({
    policyLoader: createStaticPolicyLoader(options?.policy ?? TEST_POLICY),
    evaluator: options?.evaluator,
    gateStore,
    approvalStore,
    auditStore,
    notifier,
    applier,
    clock,
    ids: sequentialIds("t"),
    logger: silentLogger,
    settings: options?.settings
  });
  return { service, clock, gateStore, approvalStore, auditStore, notifier, applier };
}
