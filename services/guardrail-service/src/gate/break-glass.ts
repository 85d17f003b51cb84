import type { AuditStore } from "../audit/types";
import type { Clock, IdGenerator } from "../clock";
import { GuardrailError } from "../errors";
import type { Logger } from "../logger";
import type { BreakGlassOverride, BreakGlassOverrideView, GateStore, PreciousResource } from "./types";
import { overrideStatus } from "./types";

export class BreakGlassRequestError extends GuardrailError {
  constructor(message: string, statusCode: 400 | 404) {
    super(message, statusCode);
    this.name = "BreakGlassRequestError";
  }
}

export type BreakGlassRequest = {
  resourceId: string;
  approver: string;
  reason: string;
  ttlSeconds: number;
};

export type PreciousResourceInput = {
  precious: boolean;
  preciousResourceTypes: string[];
  dataClassification: string;
  deleteGateEnabled: boolean;
  destroyGateEnabled: boolean;
};

export type BreakGlassDesk = {
  issue: (request: BreakGlassRequest) => Promise<BreakGlassOverrideView>;
  listOverrides: (resourceId: string) => Promise<BreakGlassOverrideView[]>;
  upsertPreciousResource: (resourceId: string, input: PreciousResourceInput, actor: string) => Promise<PreciousResource>;
  getPreciousResource: (resourceId: string) => Promise<PreciousResource | null>;
  listPreciousResources: (filters?: { resourceType?: string }) => Promise<PreciousResource[]>;
};

/**
 * Administrative side of the gate: registering precious resources and
 * issuing break-glass overrides against them. Overrides are never deleted;
 * their status is derived from the clock whenever they are read.
 */
export function createBreakGlassDesk(deps: {
  store: GateStore;
  audit: AuditStore;
  clock: Clock;
  ids: IdGenerator;
  logger: Logger;
  maxTtlSeconds: number;
}): BreakGlassDesk {
  const toView = (override: BreakGlassOverride): BreakGlassOverrideView => ({
    ...override,
    status: overrideStatus(override, deps.clock.now())
  });

  const issue: BreakGlassDesk["issue"] = async (request) => {
    const reason = request.reason.trim();
    const approver = request.approver.trim();
    if (!reason) {
      throw new BreakGlassRequestError("Break-glass reason must not be empty", 400);
    }
    if (!approver) {
      throw new BreakGlassRequestError("Break-glass approver must not be empty", 400);
    }
    if (!Number.isFinite(request.ttlSeconds) || request.ttlSeconds <= 0) {
      throw new BreakGlassRequestError("Break-glass ttlSeconds must be a positive number", 400);
    }
    if (request.ttlSeconds > deps.maxTtlSeconds) {
      throw new BreakGlassRequestError(
        `Break-glass ttlSeconds ${request.ttlSeconds} exceeds the maximum of ${deps.maxTtlSeconds}`,
        400
      );
    }

    const resource = await deps.store.getPreciousResource(request.resourceId);
    if (!resource || !resource.precious) {
      throw new BreakGlassRequestError(`Resource ${request.resourceId} is not a registered precious resource`, 404);
    }

    const issuedAt = deps.clock.now();
    const override = await deps.store.recordOverride({
      id: deps.ids(),
      resourceId: request.resourceId,
      approver,
      reason,
      issuedAt,
      expiresAt: new Date(issuedAt.getTime() + request.ttlSeconds * 1000)
    });

    await deps.audit.append({
      id: deps.ids(),
      kind: "BREAK_GLASS_ISSUED",
      resourceId: override.resourceId,
      actor: approver,
      action: "ISSUED",
      reason,
      occurredAt: issuedAt,
      details: {
        overrideId: override.id,
        ttlSeconds: request.ttlSeconds,
        expiresAt: override.expiresAt.toISOString()
      }
    });
    deps.logger.warn(
      { resourceId: override.resourceId, overrideId: override.id, approver, expiresAt: override.expiresAt.toISOString() },
      "Break-glass override issued"
    );
    return toView(override);
  };

  const upsertPreciousResource: BreakGlassDesk["upsertPreciousResource"] = async (resourceId, input, actor) => {
    const now = deps.clock.now();
    const resource = await deps.store.upsertPreciousResource({
      resourceId,
      precious: input.precious,
      preciousResourceTypes: Array.from(new Set(input.preciousResourceTypes.map((type) => type.trim()).filter(Boolean))),
      dataClassification: input.dataClassification,
      deleteGateEnabled: input.deleteGateEnabled,
      destroyGateEnabled: input.destroyGateEnabled,
      updatedAt: now
    });
    await deps.audit.append({
      id: deps.ids(),
      kind: "PRECIOUS_RESOURCE_UPDATED",
      resourceId,
      actor,
      action: resource.precious ? "PROTECTED" : "UNPROTECTED",
      reason: `Precious resource settings updated by ${actor}`,
      occurredAt: now,
      details: {
        preciousResourceTypes: resource.preciousResourceTypes,
        dataClassification: resource.dataClassification,
        deleteGateEnabled: resource.deleteGateEnabled,
        destroyGateEnabled: resource.destroyGateEnabled
      }
    });
    return resource;
  };

  return {
    issue,
    listOverrides: async (resourceId) => (await deps.store.listOverrides(resourceId)).map(toView),
    upsertPreciousResource,
    getPreciousResource: (resourceId) => deps.store.getPreciousResource(resourceId),
    listPreciousResources: (filters) => deps.store.listPreciousResources(filters)
  };
}
