import type { OperationKind } from "../proposal/types";

export type PreciousResource = {
  resourceId: string;
  precious: boolean;
  preciousResourceTypes: string[];
  dataClassification: string;
  deleteGateEnabled: boolean;
  destroyGateEnabled: boolean;
  updatedAt: Date;
};

export type BreakGlassOverride = {
  id: string;
  resourceId: string;
  approver: string;
  reason: string;
  issuedAt: Date;
  expiresAt: Date;
};

export type OverrideStatus = "ACTIVE" | "EXPIRED";

export type BreakGlassOverrideView = BreakGlassOverride & {
  status: OverrideStatus;
};

export type GateState = "OPEN" | "BLOCKED" | "OVERRIDE_ACTIVE";

export type GateName = "delete-gate" | "destroy-gate";

export type GateCheckRequest = {
  resourceId: string;
  operationKind: OperationKind;
  requestedBy?: string;
  annotations?: Record<string, string>;
};

export type GateRejection = {
  resourceId: string;
  operation: OperationKind;
  gate: GateName;
  preciousResourceTypes: string[];
  dataClassification: string;
  remediation: string[];
};

export type GateCheckResult =
  | {
      decision: "ALLOW";
      state: "OPEN";
      resourceId: string;
      operationKind: OperationKind;
      reason: string;
    }
  | {
      decision: "ALLOW";
      state: "OVERRIDE_ACTIVE";
      resourceId: string;
      operationKind: OperationKind;
      reason: string;
      override: {
        id: string;
        approver: string;
        reason: string;
        expiresAt: string;
      };
    }
  | {
      decision: "DENY";
      state: "BLOCKED";
      resourceId: string;
      operationKind: OperationKind;
      reason: string;
      rejection: GateRejection;
    };

export type GateStore = {
  upsertPreciousResource: (resource: PreciousResource) => Promise<PreciousResource>;
  getPreciousResource: (resourceId: string) => Promise<PreciousResource | null>;
  listPreciousResources: (filters?: { resourceType?: string }) => Promise<PreciousResource[]>;
  recordOverride: (override: BreakGlassOverride) => Promise<BreakGlassOverride>;
  listOverrides: (resourceId: string) => Promise<BreakGlassOverride[]>;
};

export function overrideStatus(override: BreakGlassOverride, now: Date): OverrideStatus {
  // An unparseable expiry compares false and therefore reads as EXPIRED.
  return now.getTime() < override.expiresAt.getTime() ? "ACTIVE" : "EXPIRED";
}

export function isGatedOperation(operationKind: OperationKind): operationKind is "delete" | "destroy" {
  return operationKind === "delete" || operationKind === "destroy";
}
