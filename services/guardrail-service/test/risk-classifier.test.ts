import { expect, test } from "vitest";
import { InvalidProposalError, parseChangeProposal } from "../src/proposal/schema";
import { createRiskClassifier } from "../src/risk/classifier";
import { riskRank, type RiskTable } from "../src/risk/types";
import { proposal } from "./helpers";

const classifier = createRiskClassifier();

test("lambdaMemory in dev is LOW", () => {
  expect(classifier.classify(proposal())).toBe("LOW");
});

test("prod elevates lambdaMemory one step to MEDIUM", () => {
  const result = classifier.explain(proposal({ environment: "prod" }));
  expect(result).toEqual({
    riskClass: "MEDIUM",
    baseClass: "LOW",
    matchedField: "lambdaMemory",
    elevators: ["PROD_ENVIRONMENT"]
  });
});

test("awsAccountId stays HIGH in prod", () => {
  expect(classifier.classify(proposal({ field: "awsAccountId", environment: "prod" }))).toBe("HIGH");
});

test("field names shared with object builtins fall back to MEDIUM", () => {
  for (const field of ["constructor", "toString", "spec.constructor", "__proto__"]) {
    const result = classifier.explain(proposal({ field }));
    expect(result.riskClass).toBe("MEDIUM");
    expect(result.baseClass).toBe("MEDIUM");
    expect(result.matchedField).toBeNull();
  }
});

test("unknown fields default to MEDIUM", () => {
  const result = classifier.explain(proposal({ field: "spec.forProvider.tags" }));
  expect(result.riskClass).toBe("MEDIUM");
  expect(result.matchedField).toBeNull();
});

test("dotted paths match the table on their last segment", () => {
  const result = classifier.explain(proposal({ field: "spec.parameters.lambdaTimeout" }));
  expect(result.riskClass).toBe("LOW");
  expect(result.matchedField).toBe("lambdaTimeout");
});

test("delete and destroy force HIGH without stacking", () => {
  for (const operationKind of ["delete", "destroy"] as const) {
    expect(classifier.classify(proposal({ operationKind }))).toBe("HIGH");
    expect(classifier.classify(proposal({ operationKind, environment: "prod" }))).toBe("HIGH");
  }
  expect(classifier.explain(proposal({ operationKind: "delete", environment: "prod" })).elevators).toEqual([
    "PROD_ENVIRONMENT",
    "DELETE_OPERATION"
  ]);
});

test("moving to prod never lowers the class", () => {
  const fields = ["awsAccountId", "environment", "resourcePrefix", "region", "eventSource", "somethingElse"];
  for (const field of fields) {
    for (const environment of ["dev", "staging"] as const) {
      const before = classifier.classify(proposal({ field, environment }));
      const after = classifier.classify(proposal({ field, environment: "prod" }));
      expect(riskRank(after)).toBeGreaterThanOrEqual(riskRank(before));
    }
  }
});

test("classification is repeatable on the same proposal", () => {
  const input = proposal({ field: "region", environment: "prod" });
  expect(classifier.classify(input)).toBe(classifier.classify(input));
  expect(Object.isFrozen(input)).toBe(true);
});

test("custom tables are read on every call", () => {
  let table: RiskTable = { defaultClass: "MEDIUM", fields: { lambdaMemory: "LOW" } };
  const dynamic = createRiskClassifier({ table: () => table });
  expect(dynamic.classify(proposal())).toBe("LOW");
  table = { defaultClass: "MEDIUM", fields: { lambdaMemory: "HIGH" } };
  expect(dynamic.classify(proposal())).toBe("HIGH");
});

test("malformed proposals are rejected", () => {
  const malformed = { targetId: "orders-fn", environment: "dev", operationKind: "update" };
  expect(() => parseChangeProposal(malformed)).toThrow(InvalidProposalError);
  expect(() => parseChangeProposal(malformed)).toThrow("Invalid change proposal: field: Required");
  expect(() => parseChangeProposal({ ...malformed, field: "region", environment: "qa" })).toThrow(
    /^Invalid change proposal: environment: /
  );
});
