import type { IncomingMessage } from "node:http";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { ConsoleSpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { Resource } from "@opentelemetry/resources";
import { SEMRESATTRS_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import { config } from "./config";
import type { GuardrailSettings } from "./guardrails";

const PROBE_PATHS = new Set(["/health", "/ready"]);

let sdk: NodeSDK | null = null;

/** Resource attributes that let spans be filtered by how the guardrails were configured. */
export function telemetryAttributes(serviceName: string, settings: GuardrailSettings): Record<string, string | boolean | number> {
  return {
    [SEMRESATTRS_SERVICE_NAME]: serviceName,
    "guardrail.fail_closed": settings.failClosed,
    "guardrail.batch_aggregation": settings.batchAggregation,
    "guardrail.break_glass_max_ttl_seconds": settings.breakGlassMaxTtlSeconds,
    "guardrail.annotation_prefix": settings.annotationPrefix
  };
}

export function isProbeRequest(request: Pick<IncomingMessage, "url">): boolean {
  const path = (request.url ?? "").split("?")[0] ?? "";
  return PROBE_PATHS.has(path);
}

export async function startTelemetry(settings: GuardrailSettings): Promise<void> {
  if (!config.telemetryEnabled || sdk) {
    return;
  }
  sdk = new NodeSDK({
    resource: new Resource(telemetryAttributes(config.serviceName, settings)),
    spanProcessor: new SimpleSpanProcessor(new ConsoleSpanExporter()),
    instrumentations: [
      getNodeAutoInstrumentations({
        // Policy reloads read the YAML file from disk on every SIGHUP.
        "@opentelemetry/instrumentation-fs": { enabled: false },
        "@opentelemetry/instrumentation-http": { ignoreIncomingRequestHook: isProbeRequest }
      })
    ]
  });
  await sdk.start();
}

export async function stopTelemetry(): Promise<void> {
  if (sdk) {
    await sdk.shutdown();
    sdk = null;
  }
}
