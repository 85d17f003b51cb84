import type { AuditStore } from "../audit/types";
import type { Clock, IdGenerator } from "../clock";
import type { Logger } from "../logger";
import type { OperationKind } from "../proposal/types";
import { hasPreciousAnnotation, overrideFromAnnotations, preciousResourceFromAnnotations } from "./annotations";
import type {
  BreakGlassOverride,
  GateCheckRequest,
  GateCheckResult,
  GateName,
  GateRejection,
  GateStore,
  PreciousResource
} from "./types";
import { isGatedOperation, overrideStatus } from "./types";

export type GateController = {
  check: (request: GateCheckRequest) => Promise<GateCheckResult>;
};

function gateFor(operationKind: "delete" | "destroy"): GateName {
  return operationKind === "delete" ? "delete-gate" : "destroy-gate";
}

function gateEnabled(resource: PreciousResource, gate: GateName): boolean {
  return gate === "delete-gate" ? resource.deleteGateEnabled : resource.destroyGateEnabled;
}

function remediationFor(resourceId: string, gate: GateName): string[] {
  return [
    `Confirm a current backup of "${resourceId}" exists and the change is intended.`,
    "Request a time-boxed break-glass override naming an approver and a reason, then resubmit.",
    `If the resource no longer needs protection, disable the ${gate} through an administrative update.`
  ];
}

export function rejectionMessage(rejection: GateRejection): string {
  const types = rejection.preciousResourceTypes.length > 0 ? rejection.preciousResourceTypes.join(",") : "unspecified";
  const classification = rejection.dataClassification || "unspecified";
  const steps = rejection.remediation.map((step, index) => `${index + 1}) ${step}`).join(" ");
  return (
    `${rejection.operation.toUpperCase()} BLOCKED: resource "${rejection.resourceId}" is marked precious ` +
    `(resources: ${types}, data classification: ${classification}). ` +
    `The ${rejection.gate} is enabled and no active break-glass override exists. Remediation: ${steps}`
  );
}

/**
 * Returns the active override that lasts longest, or null. Expired and
 * unparseable overrides are skipped without distinction.
 */
function activeOverride(overrides: BreakGlassOverride[], now: Date): BreakGlassOverride | null {
  let best: BreakGlassOverride | null = null;
  for (const override of overrides) {
    if (overrideStatus(override, now) !== "ACTIVE") {
      continue;
    }
    if (!best || override.expiresAt.getTime() > best.expiresAt.getTime()) {
      best = override;
    }
  }
  return best;
}

export function createGateController(deps: {
  store: GateStore;
  audit: AuditStore;
  clock: Clock;
  ids: IdGenerator;
  logger: Logger;
  annotationPrefix: string;
}): GateController {
  const open = (resourceId: string, operationKind: OperationKind, reason: string): GateCheckResult => ({
    decision: "ALLOW",
    state: "OPEN",
    resourceId,
    operationKind,
    reason
  });

  const recordCheck = async (
    request: GateCheckRequest,
    now: Date,
    action: string,
    reason: string,
    details: Record<string, unknown>
  ): Promise<void> => {
    await deps.audit.append({
      id: deps.ids(),
      kind: "GATE_CHECK",
      resourceId: request.resourceId,
      actor: request.requestedBy ?? "unknown",
      action,
      reason,
      occurredAt: now,
      details: { operationKind: request.operationKind, ...details }
    });
  };

  const check: GateController["check"] = async (request) => {
    const { resourceId, operationKind } = request;
    if (!isGatedOperation(operationKind)) {
      return open(resourceId, operationKind, `Gate does not apply to ${operationKind} operations.`);
    }

    const now = deps.clock.now();
    const annotations = request.annotations ?? {};
    const resource = hasPreciousAnnotation(annotations, deps.annotationPrefix)
      ? preciousResourceFromAnnotations(resourceId, annotations, deps.annotationPrefix, now)
      : await deps.store.getPreciousResource(resourceId);

    if (!resource || !resource.precious) {
      return open(resourceId, operationKind, `Resource "${resourceId}" is not marked precious.`);
    }

    const gate = gateFor(operationKind);
    if (!gateEnabled(resource, gate)) {
      const reason = `The ${gate} is disabled for precious resource "${resourceId}".`;
      await recordCheck(request, now, "OPEN", reason, { gate });
      return open(resourceId, operationKind, reason);
    }

    const candidates = await deps.store.listOverrides(resourceId);
    const fromAnnotations = overrideFromAnnotations(resourceId, annotations, deps.annotationPrefix, now);
    if (fromAnnotations) {
      candidates.push(fromAnnotations);
    }

    // Status is recomputed against the clock on every check.
    const override = activeOverride(candidates, now);
    if (override) {
      const expiresAt = override.expiresAt.toISOString();
      const reason =
        `${operationKind.toUpperCase()} ALLOWED on precious resource "${resourceId}" under break-glass override ` +
        `approved by ${override.approver} until ${expiresAt}: ${override.reason}`;
      deps.logger.warn(
        { resourceId, operationKind, overrideId: override.id, approver: override.approver, expiresAt },
        "Break-glass override used"
      );
      await recordCheck(request, now, "OVERRIDE_ACTIVE", reason, {
        gate,
        overrideId: override.id,
        approver: override.approver,
        overrideReason: override.reason,
        expiresAt
      });
      return {
        decision: "ALLOW",
        state: "OVERRIDE_ACTIVE",
        resourceId,
        operationKind,
        reason,
        override: { id: override.id, approver: override.approver, reason: override.reason, expiresAt }
      };
    }

    const rejection: GateRejection = {
      resourceId,
      operation: operationKind,
      gate,
      preciousResourceTypes: resource.preciousResourceTypes,
      dataClassification: resource.dataClassification,
      remediation: remediationFor(resourceId, gate)
    };
    const reason = rejectionMessage(rejection);
    deps.logger.info({ resourceId, operationKind, gate }, "Gate blocked destructive operation");
    await recordCheck(request, now, "BLOCKED", reason, { gate });
    return { decision: "DENY", state: "BLOCKED", resourceId, operationKind, reason, rejection };
  };

  return { check };
}
