import type { Pool } from "pg";
import type { AuditKind, AuditQuery, AuditRecord, AuditStore } from "./types";

type AuditRow = {
  id: string;
  kind: AuditKind;
  resource_id: string;
  actor: string;
  action: string;
  reason: string;
  occurred_at: Date;
  details: Record<string, unknown>;
};

function mapRow(row: AuditRow): AuditRecord {
  return {
    id: row.id,
    kind: row.kind,
    resourceId: row.resource_id,
    actor: row.actor,
    action: row.action,
    reason: row.reason,
    occurredAt: new Date(row.occurred_at),
    details: row.details
  };
}

export class PostgresAuditStore implements AuditStore {
  constructor(private readonly pool: Pool) {}

  async append(record: AuditRecord): Promise<AuditRecord> {
    await this.pool.query(
      `INSERT INTO audit_records (id, kind, resource_id, actor, action, reason, occurred_at, details)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8)
       ON CONFLICT (id) DO NOTHING`,
      [
        record.id,
        record.kind,
        record.resourceId,
        record.actor,
        record.action,
        record.reason,
        record.occurredAt,
        JSON.stringify(record.details)
      ]
    );
    return record;
  }

  async query(filters?: AuditQuery): Promise<AuditRecord[]> {
    const clauses: string[] = [];
    const values: unknown[] = [];
    const push = (clause: string, value: unknown) => {
      values.push(value);
      clauses.push(clause.replace("?", `$${values.length}`));
    };

    if (filters?.resourceId) {
      push("resource_id = ?", filters.resourceId);
    }
    if (filters?.kind) {
      push("kind = ?", filters.kind);
    }
    if (filters?.since) {
      push("occurred_at >= ?", filters.since);
    }
    if (filters?.until) {
      push("occurred_at <= ?", filters.until);
    }
    values.push(filters?.limit ?? 200);

    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const result = await this.pool.query<AuditRow>(
      `SELECT * FROM (
         SELECT id, kind, resource_id, actor, action, reason, occurred_at, details
         FROM audit_records
         ${where}
         ORDER BY occurred_at DESC, id DESC
         LIMIT $${values.length}
       ) latest
       ORDER BY occurred_at ASC, id ASC`,
      values
    );
    return result.rows.map(mapRow);
  }
}
