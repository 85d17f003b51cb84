import { expect, test } from "vitest";
import { InMemoryApprovalStore } from "../src/approvals/store";
import type { PendingDecisionInput } from "../src/approvals/types";
import { ApprovalStateError, createApprovalWorkflow } from "../src/approvals/workflow";
import { InMemoryAuditStore } from "../src/audit/store";
import { ManualClock, sequentialIds } from "../src/clock";
import { proposal, RecordingApplier, silentLogger } from "./helpers";

function pendingInput(overrides: Partial<PendingDecisionInput> = {}): PendingDecisionInput {
  return {
    id: "pending-1",
    decisionId: "decision-1",
    batchId: null,
    proposals: [proposal({ targetId: "acct", field: "awsAccountId", environment: "prod" })],
    riskClass: "HIGH",
    policyOutcome: "PASS",
    policyMessages: [],
    reason: "HIGH risk change, policy PASS: waiting for human approval before apply.",
    requestedBy: "ci-bot",
    createdAt: new Date("2024-05-01T12:00:00.000Z"),
    ...overrides
  };
}

function buildWorkflow(expirySeconds = 0) {
  const store = new InMemoryApprovalStore();
  const audit = new InMemoryAuditStore();
  const applier = new RecordingApplier();
  const clock = new ManualClock("2024-05-01T12:00:00.000Z");
  const workflow = createApprovalWorkflow({
    store,
    applier,
    audit,
    clock,
    ids: sequentialIds("a"),
    logger: silentLogger,
    expirySeconds
  });
  return { store, audit, applier, clock, workflow };
}

test("createPending is idempotent by id", async () => {
  const store = new InMemoryApprovalStore();
  const first = await store.createPending(pendingInput());
  const second = await store.createPending(pendingInput({ reason: "different" }));

  expect(second).toBe(first);
  expect(await store.listPending()).toHaveLength(1);
});

test("resolve only transitions a pending record once", async () => {
  const store = new InMemoryApprovalStore();
  await store.createPending(pendingInput());
  const resolution = {
    status: "APPROVED" as const,
    actor: "sre-lead",
    note: null,
    resolvedAt: new Date("2024-05-01T12:05:00.000Z")
  };

  const first = await store.resolve("pending-1", resolution);
  const second = await store.resolve("pending-1", { ...resolution, status: "REJECTED" });

  expect(first?.status).toBe("APPROVED");
  expect(second).toBeNull();
  expect((await store.getPending("pending-1"))?.status).toBe("APPROVED");
  expect(await store.listPending({ status: "PENDING" })).toHaveLength(0);
});

test("approval releases the change exactly once and is audited", async () => {
  const { store, audit, applier, workflow } = buildWorkflow();
  await store.createPending(pendingInput());

  const approved = await workflow.approve("pending-1", "sre-lead", "checked the account map");
  expect(approved).toMatchObject({
    status: "APPROVED",
    effectiveStatus: "APPROVED",
    resolvedBy: "sre-lead",
    resolutionNote: "checked the account map"
  });
  expect(applier.applied).toHaveLength(1);
  expect(applier.applied[0]?.context).toEqual({ decisionId: "decision-1", trigger: "APPROVED", approvedBy: "sre-lead" });

  await expect(workflow.approve("pending-1", "sre-lead")).rejects.toMatchObject({
    statusCode: 409,
    message: "Pending decision pending-1 is already APPROVED"
  });
  expect(applier.applied).toHaveLength(1);

  const records = await audit.query({ kind: "APPROVAL_RESOLVED" });
  expect(records).toHaveLength(1);
  expect(records[0]).toMatchObject({
    id: "a-0001",
    resourceId: "acct",
    actor: "sre-lead",
    action: "APPROVED",
    reason: "checked the account map"
  });
});

test("rejection discards the change", async () => {
  const { store, audit, applier, workflow } = buildWorkflow();
  await store.createPending(pendingInput());

  const rejected = await workflow.reject("pending-1", "sre-lead");
  expect(rejected.status).toBe("REJECTED");
  expect(applier.applied).toHaveLength(0);
  expect((await audit.query())[0]?.reason).toBe("rejected by sre-lead");
});

test("unknown pending decisions are 404", async () => {
  const { workflow } = buildWorkflow();
  await expect(workflow.approve("missing", "sre-lead")).rejects.toBeInstanceOf(ApprovalStateError);
  await expect(workflow.approve("missing", "sre-lead")).rejects.toMatchObject({
    statusCode: 404,
    message: "Pending decision missing not found"
  });
  expect(await workflow.get("missing")).toBeNull();
});

test("pending decisions stay pending forever without an expiry window", async () => {
  const { store, clock, workflow } = buildWorkflow(0);
  await store.createPending(pendingInput());
  clock.advance(30 * 24 * 60 * 60 * 1000);

  const view = await workflow.get("pending-1");
  expect(view?.effectiveStatus).toBe("PENDING");
  expect(view?.expiresAt).toBeNull();
});

test("an expired request can no longer be approved", async () => {
  const { store, clock, applier, workflow } = buildWorkflow(3600);
  await store.createPending(pendingInput());

  expect((await workflow.get("pending-1"))?.effectiveStatus).toBe("PENDING");
  clock.advance(3600 * 1000);

  const listed = await workflow.list();
  expect(listed[0]?.effectiveStatus).toBe("EXPIRED");
  expect(listed[0]?.expiresAt?.toISOString()).toBe("2024-05-01T13:00:00.000Z");
  await expect(workflow.approve("pending-1", "sre-lead")).rejects.toMatchObject({
    statusCode: 409,
    message: "Pending decision pending-1 expired at 2024-05-01T13:00:00.000Z; resubmit the change"
  });
  expect(applier.applied).toHaveLength(0);
});
