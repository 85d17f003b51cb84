import type { Pool } from "pg";
import type { ChangeProposal } from "../proposal/types";
import type { PolicyOutcome } from "../policy/types";
import type { RiskClass } from "../risk/types";
import type {
  ApprovalStore,
  PendingDecisionInput,
  PendingDecisionRecord,
  PendingDecisionResolution,
  PendingDecisionStatus
} from "./types";

type PendingDecisionRow = {
  id: string;
  decision_id: string;
  batch_id: string | null;
  proposals: ChangeProposal[];
  risk_class: RiskClass;
  policy_outcome: PolicyOutcome;
  policy_messages: string[];
  reason: string;
  requested_by: string;
  status: PendingDecisionStatus;
  created_at: Date;
  resolved_at: Date | null;
  resolved_by: string | null;
  resolution_note: string | null;
};

const COLUMNS =
  "id, decision_id, batch_id, proposals, risk_class, policy_outcome, policy_messages, reason, requested_by, status, created_at, resolved_at, resolved_by, resolution_note";

function mapRow(row: PendingDecisionRow): PendingDecisionRecord {
  return {
    id: row.id,
    decisionId: row.decision_id,
    batchId: row.batch_id,
    proposals: row.proposals,
    riskClass: row.risk_class,
    policyOutcome: row.policy_outcome,
    policyMessages: row.policy_messages,
    reason: row.reason,
    requestedBy: row.requested_by,
    status: row.status,
    createdAt: new Date(row.created_at),
    resolvedAt: row.resolved_at ? new Date(row.resolved_at) : null,
    resolvedBy: row.resolved_by,
    resolutionNote: row.resolution_note
  };
}

export class PostgresApprovalStore implements ApprovalStore {
  constructor(private readonly pool: Pool) {}

  async createPending(input: PendingDecisionInput): Promise<PendingDecisionRecord> {
    const result = await this.pool.query<PendingDecisionRow>(
      `INSERT INTO pending_decisions
       (id, decision_id, batch_id, proposals, risk_class, policy_outcome, policy_messages, reason, requested_by, status, created_at)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,'PENDING',$10)
       ON CONFLICT (id) DO NOTHING
       RETURNING ${COLUMNS}`,
      [
        input.id,
        input.decisionId,
        input.batchId,
        JSON.stringify(input.proposals),
        input.riskClass,
        input.policyOutcome,
        JSON.stringify(input.policyMessages),
        input.reason,
        input.requestedBy,
        input.createdAt
      ]
    );
    if (result.rows.length > 0) {
      return mapRow(result.rows[0]);
    }
    const existing = await this.getPending(input.id);
    if (!existing) {
      throw new Error(`Pending decision ${input.id} vanished after insert conflict`);
    }
    return existing;
  }

  async getPending(id: string): Promise<PendingDecisionRecord | null> {
    const result = await this.pool.query<PendingDecisionRow>(
      `SELECT ${COLUMNS} FROM pending_decisions WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? mapRow(result.rows[0]) : null;
  }

  async listPending(filters?: { status?: PendingDecisionStatus; limit?: number }): Promise<PendingDecisionRecord[]> {
    const result = await this.pool.query<PendingDecisionRow>(
      `SELECT ${COLUMNS} FROM pending_decisions
       WHERE ($1::text IS NULL OR status = $1)
       ORDER BY created_at ASC, id ASC
       LIMIT $2`,
      [filters?.status ?? null, filters?.limit ?? 200]
    );
    return result.rows.map(mapRow);
  }

  async resolve(id: string, resolution: PendingDecisionResolution): Promise<PendingDecisionRecord | null> {
    // The status predicate makes the transition happen at most once under concurrent approvers.
    const result = await this.pool.query<PendingDecisionRow>(
      `UPDATE pending_decisions
       SET status = $2, resolved_at = $3, resolved_by = $4, resolution_note = $5
       WHERE id = $1 AND status = 'PENDING'
       RETURNING ${COLUMNS}`,
      [id, resolution.status, resolution.resolvedAt, resolution.actor, resolution.note]
    );
    return result.rows.length > 0 ? mapRow(result.rows[0]) : null;
  }
}
