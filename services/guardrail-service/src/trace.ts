import type { FastifyReply, FastifyRequest } from "fastify";
import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";

export const TRACE_HEADER = "x-trace-id";

// Caller-supplied ids are echoed into logs and response bodies.
const TRACE_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

export function isUsableTraceId(value: string | undefined): value is string {
  return value !== undefined && TRACE_ID_PATTERN.test(value);
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value?.trim();
}

/** Reuses the caller's trace id when it is well formed, otherwise mints one. */
export function ensureTraceId(headers?: Record<string, string | string[] | undefined>): string {
  const candidate = headers ? firstHeader(headers[TRACE_HEADER]) : undefined;
  return isUsableTraceId(candidate) ? candidate : uuidv4();
}

export function getTraceIdFromRequest(request: Pick<FastifyRequest, "headers">): string {
  return ensureTraceId(request.headers);
}

export function attachTraceId(request: FastifyRequest, reply: FastifyReply): string {
  const traceId = getTraceIdFromRequest(request);
  request.headers[TRACE_HEADER] = traceId;
  reply.header(TRACE_HEADER, traceId);
  return traceId;
}

export function withTraceId(logger: Logger, traceId: string): Logger {
  return logger.child({ traceId });
}

export function requestLogger(logger: Logger, request: Pick<FastifyRequest, "headers" | "method" | "url">): Logger {
  return logger.child({ traceId: getTraceIdFromRequest(request), method: request.method, url: request.url });
}
