export type AuditKind =
  | "ESCALATION_DECISION"
  | "GATE_CHECK"
  | "BREAK_GLASS_ISSUED"
  | "APPROVAL_RESOLVED"
  | "PRECIOUS_RESOURCE_UPDATED";

export type AuditRecord = {
  id: string;
  kind: AuditKind;
  resourceId: string;
  actor: string;
  action: string;
  reason: string;
  occurredAt: Date;
  details: Record<string, unknown>;
};

export type AuditQuery = {
  resourceId?: string;
  kind?: AuditKind;
  since?: Date;
  until?: Date;
  limit?: number;
};

export type AuditStore = {
  append: (record: AuditRecord) => Promise<AuditRecord>;
  query: (filters?: AuditQuery) => Promise<AuditRecord[]>;
};
