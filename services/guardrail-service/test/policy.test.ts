import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { expect, test } from "vitest";
import { aggregateOutcomes } from "../src/policy/aggregate";
import { createRulePolicyEvaluator, evaluateRules, PolicyEvaluationFailedError } from "../src/policy/evaluator";
import { createPolicyLoader, createStaticPolicyLoader } from "../src/policy/loader";
import type { PolicyRule } from "../src/policy/types";
import { proposal, silentLogger, TEST_POLICY } from "./helpers";

const regionRule: PolicyRule = {
  id: "approved-regions",
  enabled: true,
  priority: 10,
  appliesTo: { fields: ["region"] },
  constraints: [{ type: "ALLOWED_VALUES", params: { values: ["us-east-1", "eu-west-1"] } }],
  outcome: "FAIL",
  message: "Region is not on the approved list."
};

const VALID_POLICY = `version: v1
rules:
  - id: timeout-ceiling
    appliesTo:
      fields: [lambdaTimeout]
    constraints:
      - type: MAX_VALUE
        params: { max: 900 }
    outcome: FAIL
    message: Timeout too long.
`;

test("aggregation is worst-outcome-wins", () => {
  expect(aggregateOutcomes([])).toBe("PASS");
  expect(aggregateOutcomes(["PASS", "WARN", "PASS"])).toBe("WARN");
  expect(aggregateOutcomes(["WARN", "FAIL", "PASS"])).toBe("FAIL");
});

test("a firing FAIL rule produces a prefixed message", () => {
  const result = evaluateRules(TEST_POLICY.rules, proposal({ proposedValue: 4096 }));
  expect(result).toEqual({
    outcome: "FAIL",
    messages: ["[lambda-memory-ceiling] Lambda memory above 3008 MB is not allowed."],
    results: [
      {
        ruleId: "lambda-memory-ceiling",
        outcome: "FAIL",
        message: "Lambda memory above 3008 MB is not allowed."
      }
    ]
  });
});

test("rules are scoped by environment and ordered by priority", () => {
  const result = evaluateRules(TEST_POLICY.rules, proposal({ environment: "prod", proposedValue: 128 }));
  expect(result.outcome).toBe("WARN");
  expect(result.results?.map((entry) => [entry.ruleId, entry.outcome])).toEqual([
    ["lambda-memory-ceiling", "PASS"],
    ["prod-lambda-memory-floor", "WARN"]
  ]);
  expect(result.messages).toEqual([
    "[prod-lambda-memory-floor] Production functions below 256 MB tend to time out under load."
  ]);
});

test("allowed values reject missing and unlisted values", () => {
  const rules = [regionRule];
  expect(evaluateRules(rules, proposal({ field: "region", proposedValue: "us-east-1" })).outcome).toBe("PASS");
  expect(evaluateRules(rules, proposal({ field: "region", proposedValue: "ap-south-1" })).outcome).toBe("FAIL");
  expect(evaluateRules(rules, proposal({ field: "region", proposedValue: null })).outcome).toBe("FAIL");
});

test("disabled rules and unrelated fields do not participate", () => {
  const rules = [{ ...regionRule, enabled: false }];
  const result = evaluateRules(rules, proposal({ field: "region", proposedValue: "ap-south-1" }));
  expect(result).toEqual({ outcome: "PASS", messages: [], results: [] });
  expect(evaluateRules([regionRule], proposal()).results).toEqual([]);
});

test("the shipped policy document loads", () => {
  const loader = createPolicyLoader({ logger: silentLogger });
  const snapshot = loader.getSnapshot();
  expect(snapshot.source).toBe("loaded");
  expect(snapshot.policy?.riskTable?.defaultClass).toBe("MEDIUM");
  expect(snapshot.policy?.rules.map((rule) => rule.id)).toContain("approved-regions");
  expect(snapshot.info.hash).toMatch(/^[0-9a-f]{64}$/);
});

test("a broken reload keeps serving the last good document", () => {
  const dir = mkdtempSync(path.join(tmpdir(), "guardrail-policy-"));
  const file = path.join(dir, "policy.yaml");
  writeFileSync(file, VALID_POLICY);

  const loader = createPolicyLoader({ path: file, logger: silentLogger });
  const first = loader.getSnapshot();
  expect(first.source).toBe("loaded");

  writeFileSync(file, "version: v2\nrules: nope\n");
  const reloaded = loader.reload();
  expect(reloaded.source).toBe("last-good");
  expect(reloaded.error).toBeDefined();
  expect(reloaded.policy?.rules[0]?.id).toBe("timeout-ceiling");
  expect(reloaded.info.hash).toBe(first.info.hash);
});

test("no document at all makes rule evaluation fail loudly", async () => {
  const dir = mkdtempSync(path.join(tmpdir(), "guardrail-policy-"));
  const loader = createPolicyLoader({ path: path.join(dir, "missing.yaml"), logger: silentLogger });
  expect(loader.getSnapshot().source).toBe("fallback");

  const evaluator = createRulePolicyEvaluator(loader);
  await expect(evaluator.evaluate(proposal())).rejects.toBeInstanceOf(PolicyEvaluationFailedError);
  await expect(evaluator.evaluate(proposal())).rejects.toMatchObject({ statusCode: 503 });
});

test("the rule evaluator reads the loader's current document", async () => {
  const evaluator = createRulePolicyEvaluator(createStaticPolicyLoader(TEST_POLICY));
  const result = await evaluator.evaluate(proposal({ proposedValue: 1024 }));
  expect(result.outcome).toBe("PASS");
  expect(result.messages).toEqual([]);
});
