import { policyEvaluationSchema } from "./schema";
import { PolicyEvaluationFailedError, type PolicyEvaluator } from "./evaluator";

/**
 * Delegates to an external admission/policy service that answers
 * `POST {baseUrl}/v1/evaluate` with `{ outcome, messages }`.
 */
export function createHttpPolicyEvaluator(options: {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}): PolicyEvaluator {
  const fetchImpl = options.fetchImpl ?? fetch;

  return {
    evaluate: async (proposal) => {
      let response: Response;
      try {
        response = await fetchImpl(`${options.baseUrl}/v1/evaluate`, {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify({ proposal }),
          signal: AbortSignal.timeout(options.timeoutMs)
        });
      } catch (error) {
        throw new PolicyEvaluationFailedError(`Policy evaluator unreachable at ${options.baseUrl}`, { cause: error });
      }

      if (!response.ok) {
        throw new PolicyEvaluationFailedError(`Policy evaluator responded with status ${response.status}`);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new PolicyEvaluationFailedError("Policy evaluator returned invalid JSON", { cause: error });
      }

      const parsed = policyEvaluationSchema.safeParse(body);
      if (!parsed.success) {
        throw new PolicyEvaluationFailedError(
          `Policy evaluator returned an unexpected payload: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`
        );
      }
      return parsed.data;
    }
  };
}
