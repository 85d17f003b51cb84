import type { z } from "zod";
import type { changeProposalSchema, environmentSchema, operationKindSchema, proposalValueSchema } from "./schema";

export type Environment = z.infer<typeof environmentSchema>;
export type OperationKind = z.infer<typeof operationKindSchema>;
export type ProposalValue = z.infer<typeof proposalValueSchema>;

export type ChangeProposal = Readonly<z.infer<typeof changeProposalSchema>>;

export type ChangeProposalInput = z.input<typeof changeProposalSchema>;
