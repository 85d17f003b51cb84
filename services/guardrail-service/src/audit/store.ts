import { config } from "../config";
import { getDb } from "../db";
import { logger } from "../logger";
import type { AuditQuery, AuditRecord, AuditStore } from "./types";
import { PostgresAuditStore } from "./store.pg";

const DEFAULT_LIMIT = 200;

function sortRecords(a: AuditRecord, b: AuditRecord): number {
  const timeDiff = a.occurredAt.getTime() - b.occurredAt.getTime();
  if (timeDiff !== 0) {
    return timeDiff;
  }
  return a.id.localeCompare(b.id);
}

export class InMemoryAuditStore implements AuditStore {
  private readonly records: AuditRecord[] = [];

  async append(record: AuditRecord): Promise<AuditRecord> {
    this.records.push(record);
    return record;
  }

  /** The most recent `limit` matches, oldest first. */
  async query(filters?: AuditQuery): Promise<AuditRecord[]> {
    const since = filters?.since?.getTime();
    const until = filters?.until?.getTime();

    return this.records
      .filter((record) => {
        if (filters?.resourceId && record.resourceId !== filters.resourceId) {
          return false;
        }
        if (filters?.kind && record.kind !== filters.kind) {
          return false;
        }
        const occurredAt = record.occurredAt.getTime();
        if (since !== undefined && occurredAt < since) {
          return false;
        }
        if (until !== undefined && occurredAt > until) {
          return false;
        }
        return true;
      })
      .sort(sortRecords)
      .slice(-(filters?.limit ?? DEFAULT_LIMIT));
  }
}

class FallbackAuditStore implements AuditStore {
  constructor(
    private readonly primary: AuditStore,
    private readonly fallback: AuditStore
  ) {}

  async append(record: AuditRecord): Promise<AuditRecord> {
    try {
      return await this.primary.append(record);
    } catch (error) {
      logger.warn({ error, auditId: record.id }, "Audit append failed on primary store; using memory");
      return this.fallback.append(record);
    }
  }

  async query(filters?: AuditQuery): Promise<AuditRecord[]> {
    try {
      return await this.primary.query(filters);
    } catch (error) {
      logger.warn({ error }, "Audit query failed on primary store; using memory");
      return this.fallback.query(filters);
    }
  }
}

export function createAuditStore(): AuditStore {
  const db = getDb();
  if (config.useInMemoryStore || !db) {
    return new InMemoryAuditStore();
  }
  return new FallbackAuditStore(new PostgresAuditStore(db), new InMemoryAuditStore());
}
