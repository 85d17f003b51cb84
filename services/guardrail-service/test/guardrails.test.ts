import { expect, test } from "vitest";
import { PolicyEvaluationFailedError, type PolicyEvaluator } from "../src/policy/evaluator";
import { FailClosedGateStore, GateStateUnavailableError } from "../src/gate/store";
import { buildHarness, silentLogger, UnreachableGateStore } from "./helpers";

const PRECIOUS_TABLE = {
  precious: "true",
  "precious-resources": "dynamodb,s3",
  "delete-gate": "enabled"
};

function failingEvaluator(error: Error): PolicyEvaluator {
  return {
    evaluate: async () => {
      throw error;
    }
  };
}

const memoryChange = {
  targetId: "orders-fn",
  field: "lambdaMemory",
  proposedValue: 512,
  currentValue: 256,
  environment: "dev",
  operationKind: "update",
  requestedBy: "ci-bot"
};

test("low risk passing change is applied automatically", async () => {
  const { service, applier, notifier } = buildHarness();
  const result = await service.submit({ proposal: memoryChange });

  expect(result.riskClass).toBe("LOW");
  expect(result.policy?.outcome).toBe("PASS");
  expect(result.action).toBe("AUTO_APPLY");
  expect(result.gate).toBeNull();
  expect(result.applied).toBe(true);
  expect(applier.applied[0]?.context).toEqual({ decisionId: "t-0001", trigger: "AUTO_APPLY" });
  expect(notifier.sent).toHaveLength(0);
});

test("a field named after an object builtin is escalated as an unknown field", async () => {
  const { service } = buildHarness();
  const result = await service.submit({
    proposal: { targetId: "x", field: "toString", proposedValue: "a", environment: "dev", operationKind: "update" }
  });

  expect(result.riskClass).toBe("MEDIUM");
  expect(result.policy?.outcome).toBe("PASS");
  expect(result.action).toBe("APPLY_WITH_NOTIFY");
});

test("the same change in prod is applied and announced", async () => {
  const { service, applier, notifier } = buildHarness();
  const result = await service.submit({ proposal: { ...memoryChange, environment: "prod" } });

  expect(result.riskClass).toBe("MEDIUM");
  expect(result.action).toBe("APPLY_WITH_NOTIFY");
  expect(applier.applied).toHaveLength(1);
  expect(notifier.sent.map((notification) => notification.kind)).toEqual(["CHANGE_NOTICE"]);
});

test("a high risk change waits for approval and is applied once approved", async () => {
  const { service, applier } = buildHarness();
  const result = await service.submit({
    proposal: { ...memoryChange, field: "awsAccountId", proposedValue: "222233334444", environment: "prod" },
    policy: { outcome: "WARN", messages: ["[account-move] Needs a change ticket."] }
  });

  expect(result.riskClass).toBe("HIGH");
  expect(result.action).toBe("REQUIRE_APPROVAL");
  expect(result.applied).toBe(false);
  expect(result.pendingDecisionId).toBe("t-0002");
  expect(applier.applied).toHaveLength(0);

  const approved = await service.approvals.approve("t-0002", "sre-lead");
  expect(approved.status).toBe("APPROVED");
  expect(applier.applied).toHaveLength(1);
  expect(applier.applied[0]?.context).toEqual({ decisionId: "t-0001", trigger: "APPROVED", approvedBy: "sre-lead" });
});

test("a FAIL outcome blocks and nothing is applied", async () => {
  const { service, applier } = buildHarness();
  const result = await service.submit({ proposal: { ...memoryChange, proposedValue: 4096 } });

  expect(result.action).toBe("BLOCKED");
  expect(result.auditRecord.reason).toBe(
    "Change to lambdaMemory on orders-fn blocked: policy evaluation FAIL. [lambda-memory-ceiling] Lambda memory above 3008 MB is not allowed."
  );
  expect(applier.applied).toHaveLength(0);
});

test("the gate stops a delete on a precious resource before policy runs", async () => {
  const { service, auditStore } = buildHarness({ evaluator: failingEvaluator(new Error("must not be called")) });
  const result = await service.submit({
    proposal: { targetId: "orders-table", field: "table", environment: "prod", operationKind: "delete" },
    annotations: PRECIOUS_TABLE
  });

  expect(result.action).toBe("BLOCKED");
  expect(result.policy).toBeNull();
  expect(result.gate?.decision).toBe("DENY");
  expect(result.auditRecord.blockedBy).toBe("GATE");
  expect(result.auditRecord.reason).toBe(result.gate?.reason);
  expect(result.auditRecord.reason).toContain("(resources: dynamodb,s3,");

  const kinds = (await auditStore.query({ resourceId: "orders-table" })).map((record) => record.kind);
  expect(kinds).toEqual(["GATE_CHECK", "ESCALATION_DECISION"]);
});

test("a delete under an active override still needs approval", async () => {
  const { service } = buildHarness();
  const result = await service.submit({
    proposal: { targetId: "orders-table", field: "table", environment: "prod", operationKind: "delete" },
    annotations: { ...PRECIOUS_TABLE, "break-glass": "approved", "break-glass-expires": "2024-05-01T13:00:00.000Z" }
  });

  expect(result.gate?.state).toBe("OVERRIDE_ACTIVE");
  expect(result.riskClass).toBe("HIGH");
  expect(result.action).toBe("REQUIRE_APPROVAL");
});

test("moving a precious resource out of prod is gated as a destroy", async () => {
  const { service } = buildHarness();
  await service.breakGlass.upsertPreciousResource(
    "orders-table",
    {
      precious: true,
      preciousResourceTypes: ["dynamodb"],
      dataClassification: "customer-data",
      deleteGateEnabled: false,
      destroyGateEnabled: true
    },
    "platform-admin"
  );

  const result = await service.submit({
    proposal: {
      targetId: "orders-table",
      field: "spec.environment",
      currentValue: "prod",
      proposedValue: "staging",
      environment: "prod",
      operationKind: "update"
    }
  });

  expect(result.action).toBe("BLOCKED");
  expect(result.auditRecord.proposal.operationKind).toBe("destroy");
  expect(result.gate?.state).toBe("BLOCKED");
  expect(result.gate?.reason.startsWith('DESTROY BLOCKED: resource "orders-table"')).toBe(true);
});

test("evaluator failure fails closed by default", async () => {
  const { service, applier } = buildHarness({
    evaluator: failingEvaluator(new PolicyEvaluationFailedError("evaluator offline"))
  });
  const result = await service.submit({ proposal: memoryChange });

  expect(result.action).toBe("BLOCKED");
  expect(result.policy).toEqual({
    outcome: "FAIL",
    messages: ["Policy evaluator unavailable; failing closed: evaluator offline"]
  });
  expect(result.auditRecord.policyEvaluationFailed).toBe(true);
  expect(applier.applied).toHaveLength(0);
});

test("unexpected evaluator errors are wrapped", async () => {
  const { service } = buildHarness({ evaluator: failingEvaluator(new Error("boom")) });
  const result = await service.submit({ proposal: memoryChange });
  expect(result.policy?.messages).toEqual(["Policy evaluator unavailable; failing closed: Policy evaluation failed: boom"]);
});

test("with fail-closed off the evaluator failure propagates", async () => {
  const { service, auditStore } = buildHarness({
    evaluator: failingEvaluator(new PolicyEvaluationFailedError("evaluator offline")),
    settings: { failClosed: false }
  });
  await expect(service.submit({ proposal: memoryChange })).rejects.toBeInstanceOf(PolicyEvaluationFailedError);
  expect(await auditStore.query()).toHaveLength(0);
});

test("a passing batch is applied together under the batch id", async () => {
  const { service, applier } = buildHarness();
  const result = await service.submitBatch({
    items: [{ proposal: memoryChange }, { proposal: { ...memoryChange, targetId: "billing-fn", proposedValue: 1024 } }]
  });

  expect(result.aggregation).toBe("max");
  expect(result.action).toBe("AUTO_APPLY");
  expect(result.applied).toBe(true);
  expect(result.gates).toEqual([null, null]);
  expect(applier.applied).toHaveLength(1);
  expect(applier.applied[0]?.proposals.map((entry) => entry.targetId)).toEqual(["orders-fn", "billing-fn"]);
  expect(applier.applied[0]?.context.decisionId).toBe(result.batchId);
});

test("per-item batches apply only the members that may proceed", async () => {
  const { service, applier } = buildHarness({ settings: { batchAggregation: "per-item" } });
  const result = await service.submitBatch({
    items: [
      { proposal: memoryChange },
      { proposal: { ...memoryChange, targetId: "acct", field: "awsAccountId", proposedValue: "222233334444" } }
    ]
  });

  expect(result.aggregation).toBe("per-item");
  expect(result.action).toBe("REQUIRE_APPROVAL");
  expect(applier.applied.map((entry) => entry.proposals[0]?.targetId)).toEqual(["orders-fn"]);
  expect(result.pendingDecisions).toHaveLength(1);
});

test("a delete is refused and nothing applied when gate state cannot be read", async () => {
  const { service, applier, auditStore } = buildHarness({
    gateStore: new FailClosedGateStore(new UnreachableGateStore(), silentLogger)
  });

  await expect(
    service.submit({ proposal: { ...memoryChange, targetId: "orders-table", field: "table", operationKind: "delete" } })
  ).rejects.toBeInstanceOf(GateStateUnavailableError);
  expect(applier.applied).toHaveLength(0);
  expect(await auditStore.query()).toEqual([]);
});
