import type { OutboxEnvelope } from '@txbox/shared';

export interface OutgoingMessageHeaders {
  messageId: string;
  correlationId: string;
  type: string;
  format: string;
  /** ISO-8601 */
  occurredAt: string;
}

export interface OutgoingMessage {
  topic: string;
  key: string;
  payload: string;
  headers: OutgoingMessageHeaders;
}

/**
 * Outbound side of the outbox. `publish` resolves once the broker has
 * accepted the message; a rejection counts as a failed delivery and the
 * envelope stays undispatched.
 */
export interface MessageBroker {
  publish(message: OutgoingMessage): Promise<void>;
}

export function toOutgoingMessage(envelope: OutboxEnvelope): OutgoingMessage {
  return {
    topic: envelope.topic,
    key: envelope.key,
    payload: envelope.data,
    headers: {
      messageId: envelope.id,
      correlationId: envelope.correlationId,
      type: envelope.type,
      format: envelope.format,
      occurredAt: envelope.occurredAt.toISOString(),
    },
  };
}
