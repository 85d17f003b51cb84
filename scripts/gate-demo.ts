import { ManualClock, sequentialIds } from "../services/guardrail-service/src/clock";
import { createGuardrailService } from "../services/guardrail-service/src/guardrails";
import { logger } from "../services/guardrail-service/src/logger";
import { createPolicyLoader } from "../services/guardrail-service/src/policy/loader";

// Walks one precious table through the delete gate: blocked, break-glass, expiry, blocked again.
const clock = new ManualClock();
const service = createGuardrailService({
  policyLoader: createPolicyLoader({ logger }),
  clock,
  ids: sequentialIds("demo"),
  logger: logger.child({ demo: "gate" })
});

const deleteTable = {
  proposal: {
    targetId: "orders-table",
    field: "table",
    environment: "prod",
    operationKind: "delete",
    requestedBy: "demo-user"
  }
};

const print = (label: string, value: unknown) => {
  console.log(`\n== ${label}`);
  console.log(JSON.stringify(value, null, 2));
};

async function run(): Promise<void> {
  await service.breakGlass.upsertPreciousResource(
    "orders-table",
    {
      precious: true,
      preciousResourceTypes: ["dynamodb", "s3"],
      dataClassification: "customer-data",
      deleteGateEnabled: true,
      destroyGateEnabled: true
    },
    "platform-admin"
  );

  const blocked = await service.submit(deleteTable);
  print("delete without override", { action: blocked.action, reason: blocked.auditRecord.reason });

  const override = await service.breakGlass.issue({
    resourceId: "orders-table",
    approver: "oncall-lead",
    reason: "restore drill",
    ttlSeconds: 3600
  });
  print("break-glass issued", override);

  const allowed = await service.submit(deleteTable);
  print("delete under override", { gate: allowed.gate?.state, action: allowed.action, pending: allowed.pendingDecisionId });

  if (allowed.pendingDecisionId) {
    const approved = await service.approvals.approve(allowed.pendingDecisionId, "sre-lead", "drill approved");
    print("approval", { status: approved.status, resolvedBy: approved.resolvedBy });
  }

  clock.advance(3600 * 1000);
  const expired = await service.submit(deleteTable);
  print("delete after expiry", { action: expired.action, sameMessage: expired.auditRecord.reason === blocked.auditRecord.reason });

  print("audit trail", (await service.queryAudit({ resourceId: "orders-table" })).map((record) => `${record.kind} ${record.action}`));
}

run().catch((error) => {
  logger.error({ error }, "Gate demo failed");
  process.exit(1);
});
