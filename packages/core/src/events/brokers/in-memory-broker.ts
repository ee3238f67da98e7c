import type { MessageBroker, OutgoingMessage } from '../broker';

type FailurePredicate = (message: OutgoingMessage) => boolean;

/**
 * Records every accepted publish. Failures can be injected per message
 * (`failWhen`) or for the next N publishes (`failNext`).
 */
export class InMemoryBroker implements MessageBroker {
  readonly published: OutgoingMessage[] = [];
  private predicates: FailurePredicate[] = [];
  private failuresLeft = 0;
  private attempts = 0;

  get publishAttempts(): number {
    return this.attempts;
  }

  async publish(message: OutgoingMessage): Promise<void> {
    this.attempts++;
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error(`Broker unavailable for ${message.headers.messageId}`);
    }
    if (this.predicates.some((p) => p(message))) {
      throw new Error(`Broker rejected ${message.headers.messageId}`);
    }
    this.published.push(message);
  }

  failWhen(predicate: FailurePredicate): void {
    this.predicates.push(predicate);
  }

  failNext(count = 1): void {
    this.failuresLeft += count;
  }

  clearFailures(): void {
    this.predicates = [];
    this.failuresLeft = 0;
  }

  publishedIds(): string[] {
    return this.published.map((m) => m.headers.messageId);
  }

  publishedTo(topic: string): OutgoingMessage[] {
    return this.published.filter((m) => m.topic === topic);
  }
}
