import { Pool } from "pg";
import { config } from "../config";
import { logger } from "../logger";

let pool: Pool | null = null;

export function getDb(): Pool | null {
  if (!config.db.enabled) {
    return null;
  }
  if (!pool) {
    pool = new Pool({
      host: config.db.host,
      port: config.db.port,
      user: config.db.user,
      password: config.db.password,
      database: config.db.database
    });
  }
  return pool;
}

export async function migrate(): Promise<void> {
  const db = getDb();
  if (!db || config.useInMemoryStore) {
    logger.warn("DB not configured; guardrail state is held in memory");
    return;
  }
  await db.query(
    `CREATE TABLE IF NOT EXISTS precious_resources (
      resource_id TEXT PRIMARY KEY,
      precious BOOLEAN NOT NULL,
      precious_resource_types TEXT[] NOT NULL,
      data_classification TEXT NOT NULL,
      delete_gate_enabled BOOLEAN NOT NULL,
      destroy_gate_enabled BOOLEAN NOT NULL,
      updated_at TIMESTAMPTZ NOT NULL
    )`
  );
  await db.query(
    `CREATE TABLE IF NOT EXISTS break_glass_overrides (
      id TEXT PRIMARY KEY,
      resource_id TEXT NOT NULL,
      approver TEXT NOT NULL,
      reason TEXT NOT NULL,
      issued_at TIMESTAMPTZ NOT NULL,
      expires_at TIMESTAMPTZ NOT NULL
    )`
  );
  await db.query("CREATE INDEX IF NOT EXISTS break_glass_overrides_resource_idx ON break_glass_overrides (resource_id)");
  await db.query(
    `CREATE TABLE IF NOT EXISTS pending_decisions (
      id TEXT PRIMARY KEY,
      decision_id TEXT NOT NULL,
      batch_id TEXT,
      proposals JSONB NOT NULL,
      risk_class TEXT NOT NULL,
      policy_outcome TEXT NOT NULL,
      policy_messages JSONB NOT NULL,
      reason TEXT NOT NULL,
      requested_by TEXT NOT NULL,
      status TEXT NOT NULL,
      created_at TIMESTAMPTZ NOT NULL,
      resolved_at TIMESTAMPTZ,
      resolved_by TEXT,
      resolution_note TEXT
    )`
  );
  await db.query(
    `CREATE TABLE IF NOT EXISTS audit_records (
      id TEXT PRIMARY KEY,
      kind TEXT NOT NULL,
      resource_id TEXT NOT NULL,
      actor TEXT NOT NULL,
      action TEXT NOT NULL,
      reason TEXT NOT NULL,
      occurred_at TIMESTAMPTZ NOT NULL,
      details JSONB NOT NULL
    )`
  );
  await db.query("CREATE INDEX IF NOT EXISTS audit_records_resource_idx ON audit_records (resource_id, occurred_at)");
  logger.info("Guardrail storage ready");
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
