import { z } from "zod";
import { environmentSchema, operationKindSchema } from "../proposal/schema";
import { POLICY_OUTCOMES } from "./types";

const riskClassSchema = z.enum(["LOW", "MEDIUM", "HIGH"]);
const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const policyOutcomeSchema = z.enum(POLICY_OUTCOMES);

const constraintSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("MAX_VALUE"),
    params: z.object({ max: z.number() })
  }),
  z.object({
    type: z.literal("MIN_VALUE"),
    params: z.object({ min: z.number() })
  }),
  z.object({
    type: z.literal("ALLOWED_VALUES"),
    params: z.object({ values: z.array(scalarSchema).min(1) })
  }),
  z.object({
    type: z.literal("DENIED_VALUES"),
    params: z.object({ values: z.array(scalarSchema).min(1) })
  }),
  z.object({
    type: z.literal("NEW_RESOURCE"),
    params: z.object({ value: z.boolean() })
  })
]);

const policyRuleSchema = z.object({
  id: z.string().min(1),
  enabled: z.boolean().default(true),
  priority: z.number().int().default(0),
  appliesTo: z
    .object({
      fields: z.array(z.string().min(1)).min(1).optional(),
      environments: z.array(environmentSchema).min(1).optional(),
      operationKinds: z.array(operationKindSchema).min(1).optional()
    })
    .default({}),
  constraints: z.array(constraintSchema).default([]),
  outcome: z.enum(["WARN", "FAIL"]),
  message: z.string().min(1)
});

export const riskTableSchema = z.object({
  defaultClass: riskClassSchema.default("MEDIUM"),
  fields: z.record(riskClassSchema)
});

export const policyDocumentSchema = z.object({
  version: z.literal("v1"),
  riskTable: riskTableSchema.optional(),
  rules: z.array(policyRuleSchema).default([])
});

export const policyEvaluationSchema = z.object({
  outcome: policyOutcomeSchema,
  messages: z.array(z.string()).default([]),
  results: z
    .array(
      z.object({
        ruleId: z.string(),
        outcome: policyOutcomeSchema,
        message: z.string().nullable()
      })
    )
    .optional()
});
