import type { Logger } from "../logger";
import type { EscalationNotification, Notifier } from "./types";

/** Writes notifications to the service log. Used when no broker is configured. */
export class LogNotifier implements Notifier {
  constructor(private readonly logger: Logger) {}

  async notify(notification: EscalationNotification): Promise<void> {
    this.logger.info(
      {
        notificationId: notification.id,
        kind: notification.kind,
        decisionId: notification.decisionId,
        pendingDecisionId: notification.pendingDecisionId,
        targets: notification.proposals.map((proposal) => proposal.targetId),
        riskClass: notification.riskClass,
        policyOutcome: notification.policyOutcome,
        policyMessages: notification.policyMessages
      },
      notification.kind === "APPROVAL_REQUESTED" ? "Approval requested" : "Change notice"
    );
  }
}
