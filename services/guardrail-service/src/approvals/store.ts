import { config } from "../config";
import { getDb } from "../db";
import { logger } from "../logger";
import { PostgresApprovalStore } from "./store.pg";
import type {
  ApprovalStore,
  PendingDecisionInput,
  PendingDecisionRecord,
  PendingDecisionResolution,
  PendingDecisionStatus
} from "./types";

function sortPending(a: PendingDecisionRecord, b: PendingDecisionRecord): number {
  const timeDiff = a.createdAt.getTime() - b.createdAt.getTime();
  if (timeDiff !== 0) {
    return timeDiff;
  }
  return a.id.localeCompare(b.id);
}

export class InMemoryApprovalStore implements ApprovalStore {
  private readonly records = new Map<string, PendingDecisionRecord>();

  async createPending(input: PendingDecisionInput): Promise<PendingDecisionRecord> {
    const existing = this.records.get(input.id);
    if (existing) {
      return existing;
    }
    const record: PendingDecisionRecord = {
      ...input,
      status: "PENDING",
      resolvedAt: null,
      resolvedBy: null,
      resolutionNote: null
    };
    this.records.set(record.id, record);
    return record;
  }

  async getPending(id: string): Promise<PendingDecisionRecord | null> {
    return this.records.get(id) ?? null;
  }

  async listPending(filters?: { status?: PendingDecisionStatus; limit?: number }): Promise<PendingDecisionRecord[]> {
    return Array.from(this.records.values())
      .filter((record) => !filters?.status || record.status === filters.status)
      .sort(sortPending)
      .slice(0, filters?.limit ?? 200);
  }

  async resolve(id: string, resolution: PendingDecisionResolution): Promise<PendingDecisionRecord | null> {
    const existing = this.records.get(id);
    if (!existing || existing.status !== "PENDING") {
      return null;
    }
    const resolved: PendingDecisionRecord = {
      ...existing,
      status: resolution.status,
      resolvedAt: resolution.resolvedAt,
      resolvedBy: resolution.actor,
      resolutionNote: resolution.note
    };
    this.records.set(id, resolved);
    return resolved;
  }
}

class FallbackApprovalStore implements ApprovalStore {
  constructor(
    private readonly primary: ApprovalStore,
    private readonly fallback: ApprovalStore
  ) {}

  async createPending(input: PendingDecisionInput): Promise<PendingDecisionRecord> {
    try {
      return await this.primary.createPending(input);
    } catch (error) {
      logger.warn({ error, pendingDecisionId: input.id }, "Pending decision write failed on primary store; using memory");
      return this.fallback.createPending(input);
    }
  }

  async getPending(id: string): Promise<PendingDecisionRecord | null> {
    try {
      return await this.primary.getPending(id);
    } catch (error) {
      logger.warn({ error, pendingDecisionId: id }, "Pending decision read failed on primary store; using memory");
      return this.fallback.getPending(id);
    }
  }

  async listPending(filters?: { status?: PendingDecisionStatus; limit?: number }): Promise<PendingDecisionRecord[]> {
    try {
      return await this.primary.listPending(filters);
    } catch (error) {
      logger.warn({ error }, "Pending decision list failed on primary store; using memory");
      return this.fallback.listPending(filters);
    }
  }

  async resolve(id: string, resolution: PendingDecisionResolution): Promise<PendingDecisionRecord | null> {
    try {
      return await this.primary.resolve(id, resolution);
    } catch (error) {
      logger.warn({ error, pendingDecisionId: id }, "Pending decision resolve failed on primary store; using memory");
      return this.fallback.resolve(id, resolution);
    }
  }
}

export function createApprovalStore(): ApprovalStore {
  const db = getDb();
  if (config.useInMemoryStore || !db) {
    return new InMemoryApprovalStore();
  }
  return new FallbackApprovalStore(new PostgresApprovalStore(db), new InMemoryApprovalStore());
}
