import type { FastifyInstance } from "fastify";
import { getDb } from "./db";
import type { GuardrailService } from "./guardrails";

export async function registerHealthRoutes(app: FastifyInstance, service: GuardrailService): Promise<void> {
  app.get("/health", async () => ({ status: "ok" }));

  app.get("/ready", async (_request, reply) => {
    const db = getDb();
    if (db) {
      await db.query("SELECT 1");
    }
    const policy = service.currentPolicy();
    if (!policy.policy) {
      reply.code(503);
      return { status: "degraded", policy: policy.source, error: policy.error ?? null };
    }
    return { status: "ready", policy: policy.source };
  });
}
