import Fastify from "fastify";
import { config } from "./config";
import { logger } from "./logger";
import { registerHealthRoutes } from "./health";
import { registerRoutes } from "./api/routes";
import { startTelemetry, stopTelemetry } from "./telemetry";
import { closeDb, migrate } from "./db";
import { attachTraceId } from "./trace";
import { createConfiguredGuardrailService } from "./guardrails";

const app = Fastify({ logger: false });
const guardrails = createConfiguredGuardrailService(logger);

async function start(): Promise<void> {
  await startTelemetry(guardrails.service.settings);
  await migrate();
  await guardrails.start();
  app.addHook("onRequest", (request, reply, done) => {
    attachTraceId(request, reply);
    done();
  });
  await registerHealthRoutes(app, guardrails.service);
  await registerRoutes(app, guardrails.service);

  await app.listen({ port: config.port, host: "0.0.0.0" });
  logger.info({ port: config.port, traceId: "system" }, "Guardrail service listening");
}

async function shutdown(): Promise<void> {
  logger.info({ traceId: "system" }, "Shutting down guardrail service");
  await app.close();
  await guardrails.stop();
  await closeDb();
  await stopTelemetry();
}

function handleSignal(): void {
  shutdown().catch((error) => {
    logger.error({ error, traceId: "system" }, "Shutdown failed");
    process.exit(1);
  });
}

process.on("SIGINT", handleSignal);
process.on("SIGTERM", handleSignal);

start().catch((error) => {
  logger.error({ error, traceId: "system" }, "Failed to start guardrail service");
  process.exit(1);
});
