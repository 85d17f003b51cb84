import { z } from "zod";
import { GuardrailError } from "../errors";
import type { ChangeProposal, OperationKind } from "./types";

export const environmentSchema = z.enum(["dev", "staging", "prod"]);
export const operationKindSchema = z.enum(["create", "update", "delete", "destroy"]);
export const proposalValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const changeProposalSchema = z.object({
  targetId: z.string().min(1),
  field: z.string().min(1),
  proposedValue: proposalValueSchema.default(null),
  currentValue: proposalValueSchema.default(null),
  environment: environmentSchema,
  operationKind: operationKindSchema,
  isNewResource: z.boolean().default(false),
  requestedBy: z.string().min(1).default("unknown")
});

export class InvalidProposalError extends GuardrailError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 400);
    this.name = "InvalidProposalError";
  }
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "proposal";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validates raw input and returns a frozen proposal. Anything that is not a
 * well-formed proposal raises InvalidProposalError rather than being
 * defaulted into a risk class.
 */
export function parseChangeProposal(input: unknown): ChangeProposal {
  const parsed = changeProposalSchema.safeParse(input);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    throw new InvalidProposalError(`Invalid change proposal: ${issues.join("; ")}`, issues);
  }
  return Object.freeze(parsed.data);
}

export function lastFieldSegment(field: string): string {
  const segments = field.split(".").filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? field;
}

/**
 * Moving a prod resource to a non-prod environment replaces it, taking its
 * data with it, so it is gated as a destroy.
 */
export function effectiveOperationKind(proposal: ChangeProposal): OperationKind {
  if (proposal.operationKind !== "update") {
    return proposal.operationKind;
  }
  if (lastFieldSegment(proposal.field) !== "environment") {
    return proposal.operationKind;
  }
  if (proposal.currentValue === "prod" && proposal.proposedValue !== "prod") {
    return "destroy";
  }
  return proposal.operationKind;
}
