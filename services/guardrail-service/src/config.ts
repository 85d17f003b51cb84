import dotenv from "dotenv";

dotenv.config();

export type BatchRiskAggregation = "max" | "per-item";

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (value.toLowerCase() === "true") {
    return true;
  }
  if (value.toLowerCase() === "false") {
    return false;
  }
  return fallback;
}

function parseBatchAggregation(value: string | undefined, fallback: BatchRiskAggregation): BatchRiskAggregation {
  if (!value) {
    return fallback;
  }
  const normalized = value.toLowerCase();
  if (normalized === "max" || normalized === "per-item") {
    return normalized;
  }
  return fallback;
}

export const config = {
  port: Number(process.env.PORT ?? 3000),
  serviceName: process.env.SERVICE_NAME ?? "guardrail-service",
  logLevel: process.env.LOG_LEVEL ?? "info",
  useInMemoryStore: process.env.USE_INMEMORY_STORE === "true",
  telemetryEnabled: parseBoolean(process.env.TELEMETRY_ENABLED, false),
  annotationPrefix: process.env.ANNOTATION_PREFIX ?? "confighub.io/",
  policy: {
    path: process.env.POLICY_PATH,
    reloadEnabled: parseBoolean(process.env.POLICY_RELOAD_ENABLED, false),
    evaluatorUrl: process.env.POLICY_EVALUATOR_URL,
    evaluatorTimeoutMs: parseNumber(process.env.POLICY_EVALUATOR_TIMEOUT_MS, 5000),
    failClosed: parseBoolean(process.env.POLICY_FAIL_CLOSED, true)
  },
  escalation: {
    batchAggregation: parseBatchAggregation(process.env.BATCH_RISK_AGGREGATION, "max"),
    approvalExpirySeconds: parseNumber(process.env.APPROVAL_EXPIRY_SECONDS, 0)
  },
  breakGlass: {
    maxTtlSeconds: parseNumber(process.env.BREAK_GLASS_MAX_TTL_SECONDS, 86400)
  },
  notifications: {
    brokers: process.env.NOTIFY_BROKERS ? process.env.NOTIFY_BROKERS.split(",") : [],
    topic: process.env.NOTIFY_TOPIC ?? "guardrails.escalations"
  },
  db: {
    enabled: parseBoolean(process.env.DB_ENABLED, false),
    host: process.env.DB_HOST ?? "localhost",
    port: Number(process.env.DB_PORT ?? 5432),
    user: process.env.DB_USER ?? "guardrails",
    password: process.env.DB_PASSWORD ?? "guardrails",
    database: process.env.DB_NAME ?? "guardrails"
  }
};

export type ServiceConfig = typeof config;
