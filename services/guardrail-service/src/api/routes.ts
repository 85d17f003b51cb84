import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z, ZodError } from "zod";
import { GuardrailError } from "../errors";
import { preciousResourceToAnnotations } from "../gate/annotations";
import type { GuardrailService } from "../guardrails";
import { logger } from "../logger";
import { policyEvaluationSchema } from "../policy/schema";
import type { PolicySnapshot } from "../policy/loader";
import { operationKindSchema } from "../proposal/schema";
import { getTraceIdFromRequest, requestLogger, withTraceId } from "../trace";

const annotationsSchema = z.record(z.string());

const submissionSchema = z.object({
  proposal: z.unknown(),
  policy: policyEvaluationSchema.optional(),
  annotations: annotationsSchema.optional()
});

const batchSchema = z.object({
  items: z.array(submissionSchema).min(1),
  aggregation: z.enum(["max", "per-item"]).optional()
});

const approvalListQuerySchema = z.object({
  status: z.enum(["PENDING", "APPROVED", "REJECTED"]).optional(),
  limit: z.coerce.number().int().positive().max(1000).optional()
});

const resolutionSchema = z.object({
  actor: z.string().min(1),
  note: z.string().optional()
});

const gateCheckSchema = z.object({
  resourceId: z.string().min(1),
  operationKind: operationKindSchema,
  requestedBy: z.string().min(1).optional(),
  annotations: annotationsSchema.optional()
});

const preciousResourceSchema = z.object({
  precious: z.boolean().default(true),
  preciousResourceTypes: z
    .union([z.array(z.string()), z.string()])
    .default([])
    .transform((value) => (typeof value === "string" ? value.split(",") : value)),
  dataClassification: z.string().default(""),
  deleteGateEnabled: z.boolean().default(true),
  destroyGateEnabled: z.boolean().default(true),
  actor: z.string().min(1).default("unknown")
});

const preciousListQuerySchema = z.object({
  resourceType: z.string().min(1).optional()
});

const breakGlassSchema = z.object({
  resourceId: z.string().min(1),
  approver: z.string(),
  reason: z.string(),
  ttlSeconds: z.number()
});

const auditQuerySchema = z.object({
  resourceId: z.string().min(1).optional(),
  kind: z
    .enum(["ESCALATION_DECISION", "GATE_CHECK", "BREAK_GLASS_ISSUED", "APPROVAL_RESOLVED", "PRECIOUS_RESOURCE_UPDATED"])
    .optional(),
  since: z.string().datetime().optional(),
  until: z.string().datetime().optional(),
  limit: z.coerce.number().int().positive().max(1000).optional()
});

const resourceParamsSchema = z.object({ resourceId: z.string().min(1) });
const idParamsSchema = z.object({ id: z.string().min(1) });

function describePolicy(snapshot: PolicySnapshot) {
  return {
    ...snapshot.info,
    source: snapshot.source,
    error: snapshot.error ?? null,
    ruleCount: snapshot.policy?.rules.length ?? 0
  };
}

function notFound(reply: FastifyReply, request: FastifyRequest, message: string) {
  reply.code(404);
  return { message, traceId: getTraceIdFromRequest(request) };
}

export async function registerRoutes(app: FastifyInstance, service: GuardrailService): Promise<void> {
  app.setErrorHandler((error, request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    if (error instanceof ZodError) {
      reply.code(400).send({
        message: "Invalid request",
        issues: error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`),
        traceId
      });
      return;
    }
    if (error instanceof GuardrailError) {
      if (error.statusCode >= 500) {
        requestLogger(logger, request).error({ error: error.message, statusCode: error.statusCode }, "Request failed");
      }
      reply.code(error.statusCode).send({ message: error.message, traceId });
      return;
    }
    const statusCode = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    if (statusCode === 500) {
      requestLogger(logger, request).error({ error }, "Unhandled request error");
    }
    reply.code(statusCode).send({ message: statusCode === 500 ? "Internal error" : error.message, traceId });
  });

  app.post("/v1/changes/classify", async (request) => {
    const { proposal, classification } = service.classify(request.body);
    return { ...classification, proposal, traceId: getTraceIdFromRequest(request) };
  });

  app.post("/v1/changes/decide", async (request) => {
    const body = submissionSchema.parse(request.body);
    const traceId = getTraceIdFromRequest(request);
    const result = await service.submit({ proposal: body.proposal, policy: body.policy, annotations: body.annotations });
    withTraceId(logger, traceId).info(
      { decisionId: result.auditRecord.decisionId, targetId: result.auditRecord.targetId, action: result.action },
      "Change decided"
    );
    return { ...result, traceId };
  });

  app.post("/v1/changes/batch", async (request) => {
    const body = batchSchema.parse(request.body);
    const result = await service.submitBatch({
      aggregation: body.aggregation,
      items: body.items.map((item) => ({ proposal: item.proposal, policy: item.policy, annotations: item.annotations }))
    });
    return { ...result, traceId: getTraceIdFromRequest(request) };
  });

  app.get("/v1/approvals", async (request) => {
    const query = approvalListQuerySchema.parse(request.query);
    return { items: await service.approvals.list(query) };
  });

  app.get("/v1/approvals/:id", async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const pending = await service.approvals.get(id);
    if (!pending) {
      return notFound(reply, request, `Pending decision ${id} not found`);
    }
    return pending;
  });

  app.post("/v1/approvals/:id/approve", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const body = resolutionSchema.parse(request.body);
    return service.approvals.approve(id, body.actor, body.note);
  });

  app.post("/v1/approvals/:id/reject", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const body = resolutionSchema.parse(request.body);
    return service.approvals.reject(id, body.actor, body.note);
  });

  app.post("/v1/gate/check", async (request) => {
    const body = gateCheckSchema.parse(request.body);
    const result = await service.checkGate(body);
    return { ...result, traceId: getTraceIdFromRequest(request) };
  });

  app.put("/v1/precious-resources/:resourceId", async (request) => {
    const { resourceId } = resourceParamsSchema.parse(request.params);
    const { actor, ...input } = preciousResourceSchema.parse(request.body ?? {});
    const resource = await service.breakGlass.upsertPreciousResource(resourceId, input, actor);
    return { resource, annotations: preciousResourceToAnnotations(resource, service.settings.annotationPrefix) };
  });

  app.get("/v1/precious-resources", async (request) => {
    const query = preciousListQuerySchema.parse(request.query);
    return { items: await service.breakGlass.listPreciousResources(query) };
  });

  app.get("/v1/precious-resources/:resourceId", async (request, reply) => {
    const { resourceId } = resourceParamsSchema.parse(request.params);
    const resource = await service.breakGlass.getPreciousResource(resourceId);
    if (!resource) {
      return notFound(reply, request, `Precious resource ${resourceId} not found`);
    }
    return { resource, annotations: preciousResourceToAnnotations(resource, service.settings.annotationPrefix) };
  });

  app.get("/v1/precious-resources/:resourceId/break-glass", async (request) => {
    const { resourceId } = resourceParamsSchema.parse(request.params);
    return { items: await service.breakGlass.listOverrides(resourceId) };
  });

  app.post("/v1/break-glass", async (request, reply) => {
    const body = breakGlassSchema.parse(request.body);
    const override = await service.breakGlass.issue(body);
    reply.code(201);
    return override;
  });

  app.get("/v1/audit", async (request) => {
    const query = auditQuerySchema.parse(request.query);
    const items = await service.queryAudit({
      resourceId: query.resourceId,
      kind: query.kind,
      since: query.since ? new Date(query.since) : undefined,
      until: query.until ? new Date(query.until) : undefined,
      limit: query.limit
    });
    return { items };
  });

  app.get("/v1/policy/current", async () => describePolicy(service.currentPolicy()));

  app.post("/v1/policy/reload", async (request, reply) => {
    const snapshot = service.reloadPolicy();
    if (snapshot.source !== "loaded") {
      reply.code(422);
    }
    return { ...describePolicy(snapshot), traceId: getTraceIdFromRequest(request) };
  });
}
