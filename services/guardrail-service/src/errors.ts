/**
 * Base for errors that carry their own HTTP status. The route error handler
 * maps any subclass straight onto a `{ message, traceId }` response.
 */
export class GuardrailError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GuardrailError";
  }
}
