import type { Pool } from "pg";
import type { BreakGlassOverride, GateStore, PreciousResource } from "./types";

type PreciousResourceRow = {
  resource_id: string;
  precious: boolean;
  precious_resource_types: string[];
  data_classification: string;
  delete_gate_enabled: boolean;
  destroy_gate_enabled: boolean;
  updated_at: Date;
};

type OverrideRow = {
  id: string;
  resource_id: string;
  approver: string;
  reason: string;
  issued_at: Date;
  expires_at: Date;
};

function mapResource(row: PreciousResourceRow): PreciousResource {
  return {
    resourceId: row.resource_id,
    precious: row.precious,
    preciousResourceTypes: row.precious_resource_types,
    dataClassification: row.data_classification,
    deleteGateEnabled: row.delete_gate_enabled,
    destroyGateEnabled: row.destroy_gate_enabled,
    updatedAt: new Date(row.updated_at)
  };
}

function mapOverride(row: OverrideRow): BreakGlassOverride {
  return {
    id: row.id,
    resourceId: row.resource_id,
    approver: row.approver,
    reason: row.reason,
    issuedAt: new Date(row.issued_at),
    expiresAt: new Date(row.expires_at)
  };
}

export class PostgresGateStore implements GateStore {
  constructor(private readonly pool: Pool) {}

  async upsertPreciousResource(resource: PreciousResource): Promise<PreciousResource> {
    await this.pool.query(
      `INSERT INTO precious_resources
       (resource_id, precious, precious_resource_types, data_classification, delete_gate_enabled, destroy_gate_enabled, updated_at)
       VALUES ($1,$2,$3,$4,$5,$6,$7)
       ON CONFLICT (resource_id) DO UPDATE SET
         precious = EXCLUDED.precious,
         precious_resource_types = EXCLUDED.precious_resource_types,
         data_classification = EXCLUDED.data_classification,
         delete_gate_enabled = EXCLUDED.delete_gate_enabled,
         destroy_gate_enabled = EXCLUDED.destroy_gate_enabled,
         updated_at = EXCLUDED.updated_at`,
      [
        resource.resourceId,
        resource.precious,
        resource.preciousResourceTypes,
        resource.dataClassification,
        resource.deleteGateEnabled,
        resource.destroyGateEnabled,
        resource.updatedAt
      ]
    );
    return resource;
  }

  async getPreciousResource(resourceId: string): Promise<PreciousResource | null> {
    const result = await this.pool.query<PreciousResourceRow>(
      `SELECT resource_id, precious, precious_resource_types, data_classification, delete_gate_enabled, destroy_gate_enabled, updated_at
       FROM precious_resources WHERE resource_id = $1`,
      [resourceId]
    );
    return result.rows.length > 0 ? mapResource(result.rows[0]) : null;
  }

  async listPreciousResources(filters?: { resourceType?: string }): Promise<PreciousResource[]> {
    const result = await this.pool.query<PreciousResourceRow>(
      `SELECT resource_id, precious, precious_resource_types, data_classification, delete_gate_enabled, destroy_gate_enabled, updated_at
       FROM precious_resources
       WHERE precious = TRUE AND ($1::text IS NULL OR $1 = ANY(precious_resource_types))
       ORDER BY resource_id ASC`,
      [filters?.resourceType ?? null]
    );
    return result.rows.map(mapResource);
  }

  async recordOverride(override: BreakGlassOverride): Promise<BreakGlassOverride> {
    await this.pool.query(
      `INSERT INTO break_glass_overrides (id, resource_id, approver, reason, issued_at, expires_at)
       VALUES ($1,$2,$3,$4,$5,$6)`,
      [override.id, override.resourceId, override.approver, override.reason, override.issuedAt, override.expiresAt]
    );
    return override;
  }

  async listOverrides(resourceId: string): Promise<BreakGlassOverride[]> {
    const result = await this.pool.query<OverrideRow>(
      `SELECT id, resource_id, approver, reason, issued_at, expires_at
       FROM break_glass_overrides WHERE resource_id = $1
       ORDER BY issued_at ASC, id ASC`,
      [resourceId]
    );
    return result.rows.map(mapOverride);
  }
}
