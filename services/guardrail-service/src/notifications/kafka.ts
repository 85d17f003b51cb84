import { Kafka, type Producer } from "kafkajs";
import type { EventEnvelope } from "../events/envelope";
import type { EscalationNotification, Notifier } from "./types";

export class KafkaNotifier implements Notifier {
  private readonly producer: Producer;

  constructor(
    private readonly options: {
      clientId: string;
      brokers: string[];
      topic: string;
    }
  ) {
    const kafka = new Kafka({ clientId: options.clientId, brokers: options.brokers });
    this.producer = kafka.producer();
  }

  async start(): Promise<void> {
    await this.producer.connect();
  }

  async stop(): Promise<void> {
    await this.producer.disconnect();
  }

  async notify(notification: EscalationNotification): Promise<void> {
    const envelope: EventEnvelope<EscalationNotification> = {
      id: notification.id,
      type: `guardrails.${notification.kind.toLowerCase()}`,
      source: this.options.clientId,
      time: notification.occurredAt,
      subject: notification.pendingDecisionId ?? notification.decisionId,
      traceId: notification.decisionId,
      data: notification
    };
    await this.producer.send({
      topic: this.options.topic,
      messages: [{ key: notification.decisionId, value: JSON.stringify(envelope) }]
    });
  }
}
