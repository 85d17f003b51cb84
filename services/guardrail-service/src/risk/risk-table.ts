import type { RiskTable } from "./types";

// Fields of the serverless event app claim and how much damage a bad value does.
export const DEFAULT_RISK_TABLE: RiskTable = {
  defaultClass: "MEDIUM",
  fields: {
    awsAccountId: "HIGH",
    environment: "MEDIUM",
    resourcePrefix: "LOW",
    region: "MEDIUM",
    lambdaMemory: "LOW",
    lambdaTimeout: "LOW",
    eventSource: "LOW",
    artifactBucket: "MEDIUM"
  }
};
