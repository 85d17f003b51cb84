import type { BreakGlassOverride, PreciousResource } from "./types";

export const ANNOTATION_KEYS = {
  precious: "precious",
  preciousResources: "precious-resources",
  dataClassification: "data-classification",
  deleteGate: "delete-gate",
  destroyGate: "destroy-gate",
  breakGlass: "break-glass",
  breakGlassReason: "break-glass-reason",
  breakGlassApprover: "break-glass-approver",
  breakGlassExpires: "break-glass-expires"
} as const;

type AnnotationKey = (typeof ANNOTATION_KEYS)[keyof typeof ANNOTATION_KEYS];

const UNSPECIFIED = "unspecified";

function read(annotations: Record<string, string>, key: AnnotationKey, prefix: string): string | undefined {
  const value = annotations[`${prefix}${key}`] ?? annotations[key];
  return value === undefined ? undefined : value.trim();
}

export function parseResourceTypes(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  const types = value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return Array.from(new Set(types));
}

function gateEnabled(value: string | undefined): boolean {
  return value?.toLowerCase() !== "disabled";
}

export function hasPreciousAnnotation(annotations: Record<string, string>, prefix: string): boolean {
  return read(annotations, ANNOTATION_KEYS.precious, prefix) !== undefined;
}

export function preciousResourceFromAnnotations(
  resourceId: string,
  annotations: Record<string, string>,
  prefix: string,
  now: Date
): PreciousResource {
  return {
    resourceId,
    precious: read(annotations, ANNOTATION_KEYS.precious, prefix)?.toLowerCase() === "true",
    preciousResourceTypes: parseResourceTypes(read(annotations, ANNOTATION_KEYS.preciousResources, prefix)),
    dataClassification: read(annotations, ANNOTATION_KEYS.dataClassification, prefix) ?? "",
    deleteGateEnabled: gateEnabled(read(annotations, ANNOTATION_KEYS.deleteGate, prefix)),
    destroyGateEnabled: gateEnabled(read(annotations, ANNOTATION_KEYS.destroyGate, prefix)),
    updatedAt: now
  };
}

/**
 * Reads the break-glass annotations. Only `break-glass=approved` with an
 * expiry is an override; approver and reason are recorded when present.
 * A missing or unparseable expiry yields an override that is already
 * expired, which the gate treats exactly like no override at all.
 */
export function overrideFromAnnotations(
  resourceId: string,
  annotations: Record<string, string>,
  prefix: string,
  now: Date
): BreakGlassOverride | null {
  if (read(annotations, ANNOTATION_KEYS.breakGlass, prefix)?.toLowerCase() !== "approved") {
    return null;
  }
  const expires = read(annotations, ANNOTATION_KEYS.breakGlassExpires, prefix);
  return {
    id: `annotation:${resourceId}`,
    resourceId,
    approver: read(annotations, ANNOTATION_KEYS.breakGlassApprover, prefix) || UNSPECIFIED,
    reason: read(annotations, ANNOTATION_KEYS.breakGlassReason, prefix) || UNSPECIFIED,
    issuedAt: now,
    expiresAt: new Date(expires ?? Number.NaN)
  };
}

export function preciousResourceToAnnotations(resource: PreciousResource, prefix: string): Record<string, string> {
  return {
    [`${prefix}${ANNOTATION_KEYS.precious}`]: String(resource.precious),
    [`${prefix}${ANNOTATION_KEYS.preciousResources}`]: resource.preciousResourceTypes.join(","),
    [`${prefix}${ANNOTATION_KEYS.dataClassification}`]: resource.dataClassification,
    [`${prefix}${ANNOTATION_KEYS.deleteGate}`]: resource.deleteGateEnabled ? "enabled" : "disabled",
    [`${prefix}${ANNOTATION_KEYS.destroyGate}`]: resource.destroyGateEnabled ? "enabled" : "disabled"
  };
}
