import type { Logger } from "../logger";
import type { ChangeProposal } from "../proposal/types";

export type ApplyContext = {
  decisionId: string;
  trigger: "AUTO_APPLY" | "APPLY_WITH_NOTIFY" | "APPROVED";
  approvedBy?: string;
};

/** Hands an allowed change to whatever actually writes it (revision store, GitOps repo). */
export type ChangeApplier = {
  apply: (proposals: ChangeProposal[], context: ApplyContext) => Promise<void>;
};

export class LoggingChangeApplier implements ChangeApplier {
  constructor(private readonly logger: Logger) {}

  async apply(proposals: ChangeProposal[], context: ApplyContext): Promise<void> {
    for (const proposal of proposals) {
      this.logger.info(
        {
          decisionId: context.decisionId,
          trigger: context.trigger,
          approvedBy: context.approvedBy,
          targetId: proposal.targetId,
          field: proposal.field,
          proposedValue: proposal.proposedValue
        },
        "Change released for apply"
      );
    }
  }
}
