import { config } from "../config";
import { getDb } from "../db";
import { GuardrailError } from "../errors";
import { logger, type Logger } from "../logger";
import { PostgresGateStore } from "./store.pg";
import type { BreakGlassOverride, GateStore, PreciousResource } from "./types";

function sortOverrides(a: BreakGlassOverride, b: BreakGlassOverride): number {
  const timeDiff = a.issuedAt.getTime() - b.issuedAt.getTime();
  if (timeDiff !== 0) {
    return timeDiff;
  }
  return a.id.localeCompare(b.id);
}

export class InMemoryGateStore implements GateStore {
  private readonly resources = new Map<string, PreciousResource>();
  private readonly overrides = new Map<string, BreakGlassOverride[]>();

  async upsertPreciousResource(resource: PreciousResource): Promise<PreciousResource> {
    this.resources.set(resource.resourceId, resource);
    return resource;
  }

  async getPreciousResource(resourceId: string): Promise<PreciousResource | null> {
    return this.resources.get(resourceId) ?? null;
  }

  async listPreciousResources(filters?: { resourceType?: string }): Promise<PreciousResource[]> {
    return Array.from(this.resources.values())
      .filter((resource) => resource.precious)
      .filter((resource) => !filters?.resourceType || resource.preciousResourceTypes.includes(filters.resourceType))
      .sort((a, b) => a.resourceId.localeCompare(b.resourceId));
  }

  async recordOverride(override: BreakGlassOverride): Promise<BreakGlassOverride> {
    // Appending to a fresh array keeps readers on either the old or the new list, never a partial one.
    const existing = this.overrides.get(override.resourceId) ?? [];
    this.overrides.set(override.resourceId, [...existing, override]);
    return override;
  }

  async listOverrides(resourceId: string): Promise<BreakGlassOverride[]> {
    return (this.overrides.get(resourceId) ?? []).slice().sort(sortOverrides);
  }
}

export class GateStateUnavailableError extends GuardrailError {
  constructor(operation: string, cause: unknown) {
    super(`Gate state is unavailable (${operation}); destructive operations are refused until the store recovers`, 503, {
      cause
    });
    this.name = "GateStateUnavailableError";
  }
}

/**
 * Gate state has no in-memory fallback. A precious flag or override that
 * cannot be read must never be mistaken for an absent one.
 */
export class FailClosedGateStore implements GateStore {
  constructor(
    private readonly primary: GateStore,
    private readonly log: Logger = logger
  ) {}

  private async guard<T>(operation: string, context: Record<string, unknown>, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      this.log.error({ error, ...context }, `Gate store ${operation} failed; refusing`);
      throw new GateStateUnavailableError(operation, error);
    }
  }

  upsertPreciousResource(resource: PreciousResource): Promise<PreciousResource> {
    return this.guard("upsertPreciousResource", { resourceId: resource.resourceId }, () =>
      this.primary.upsertPreciousResource(resource)
    );
  }

  getPreciousResource(resourceId: string): Promise<PreciousResource | null> {
    return this.guard("getPreciousResource", { resourceId }, () => this.primary.getPreciousResource(resourceId));
  }

  listPreciousResources(filters?: { resourceType?: string }): Promise<PreciousResource[]> {
    return this.guard("listPreciousResources", {}, () => this.primary.listPreciousResources(filters));
  }

  recordOverride(override: BreakGlassOverride): Promise<BreakGlassOverride> {
    return this.guard("recordOverride", { resourceId: override.resourceId }, () => this.primary.recordOverride(override));
  }

  listOverrides(resourceId: string): Promise<BreakGlassOverride[]> {
    return this.guard("listOverrides", { resourceId }, () => this.primary.listOverrides(resourceId));
  }
}

export function createGateStore(): GateStore {
  const db = getDb();
  if (config.useInMemoryStore || !db) {
    return new InMemoryGateStore();
  }
  return new FailClosedGateStore(new PostgresGateStore(db));
}
