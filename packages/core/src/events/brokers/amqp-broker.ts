import amqp from 'amqplib';
import type { Options } from 'amqplib';
import { logger, errorFields } from '../../observability/logger';
import type { MessageBroker, OutgoingMessage } from '../broker';

/** The slice of an amqplib `ConfirmChannel` the broker uses. */
export interface ConfirmPublisher {
  publish(
    exchange: string,
    routingKey: string,
    content: Buffer,
    options: Options.Publish,
    callback: (err: unknown) => void,
  ): boolean;
}

export interface AmqpBrokerOptions {
  /** Maps a topic to an exchange name. Defaults to the topic itself. */
  exchangeFor?: (topic: string) => string;
  persistent?: boolean;
  /** First reconnect delay; later ones grow by 1.5x up to a minute. */
  reconnectBaseMs?: number;
  /** Failed reconnects in a row before giving up until the next publish. */
  maxReconnectAttempts?: number;
}

type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;

const MAX_RECONNECT_DELAY_MS = 60_000;

/**
 * Publishes to RabbitMQ over a confirm channel: `topic` is the exchange,
 * `key` the routing key. `publish` resolves on the broker's ack and rejects
 * on nack.
 *
 * A broker made by `connect` owns its connection. When the channel or the
 * connection goes away, publishes in flight reject, later ones reject until a
 * new channel is up, and the broker reconnects in the background.
 */
export class AmqpBroker implements MessageBroker {
  private readonly exchangeFor: (topic: string) => string;
  private readonly persistent: boolean;
  private readonly reconnectBaseMs: number;
  private readonly maxReconnectAttempts: number;

  private url: string | null = null;
  private connection: AmqpConnection | null = null;
  private closed = false;
  private reconnecting = false;
  private attempts = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private readonly unconfirmed = new Set<(err: Error) => void>();

  constructor(
    private channel: ConfirmPublisher | null,
    options: AmqpBrokerOptions = {},
  ) {
    this.exchangeFor = options.exchangeFor ?? ((topic) => topic);
    this.persistent = options.persistent ?? true;
    this.reconnectBaseMs = options.reconnectBaseMs ?? 1_000;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? 10;
  }

  static async connect(url: string, options: AmqpBrokerOptions = {}): Promise<AmqpBroker> {
    const broker = new AmqpBroker(null, options);
    broker.url = url;
    await broker.open();
    logger.info('AMQP broker connected');
    return broker;
  }

  isConnected(): boolean {
    return this.channel !== null;
  }

  publish(message: OutgoingMessage): Promise<void> {
    const channel = this.channel;
    if (!channel) {
      this.scheduleReconnect();
      return Promise.reject(new Error('AMQP channel unavailable'));
    }
    const { headers } = message;
    return new Promise<void>((resolve, reject) => {
      this.unconfirmed.add(reject);
      const settle = (err: unknown) => {
        this.unconfirmed.delete(reject);
        if (err) reject(err);
        else resolve();
      };
      try {
        channel.publish(
          this.exchangeFor(message.topic),
          message.key,
          Buffer.from(message.payload),
          {
            persistent: this.persistent,
            messageId: headers.messageId,
            correlationId: headers.correlationId,
            type: headers.type,
            contentType: headers.format,
            timestamp: Math.floor(Date.parse(headers.occurredAt) / 1000),
            headers: { occurredAt: headers.occurredAt },
          },
          settle,
        );
      } catch (err) {
        settle(err);
      }
    });
  }

  /** Stop reconnecting and close the connection. */
  async close(): Promise<void> {
    this.closed = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    const connection = this.connection;
    this.connection = null;
    this.markUnavailable(new Error('AMQP broker closed'));
    if (connection) await connection.close();
  }

  private async open(): Promise<void> {
    if (this.url === null) return;
    const connection = await amqp.connect(this.url);
    if (this.closed) {
      await connection.close();
      return;
    }
    this.connection = connection;
    connection.on('error', (err: unknown) => {
      if (this.connection !== connection) return;
      logger.error('AMQP connection error', { error: errorFields(err) });
    });
    connection.on('close', () => {
      if (this.connection !== connection) return;
      this.connection = null;
      this.lost(new Error('AMQP connection closed'));
    });

    const channel = await connection.createConfirmChannel().catch(async (err: unknown) => {
      this.connection = null;
      await connection.close().catch((closeErr: unknown) => {
        logger.warn('AMQP connection close failed', { error: errorFields(closeErr) });
      });
      throw err;
    });
    // close() or a dropped connection got here first
    if (this.closed) return;
    if (this.connection !== connection) {
      throw new Error('AMQP connection closed while opening a channel');
    }
    const onLost = (reason: Error) => {
      if (this.channel !== channel) return;
      this.lost(reason);
    };
    channel.on('error', (err: unknown) => {
      logger.error('AMQP channel error', { error: errorFields(err) });
      onLost(err instanceof Error ? err : new Error(String(err)));
    });
    channel.on('close', () => onLost(new Error('AMQP channel closed')));
    this.channel = channel;
  }

  private lost(reason: Error): void {
    logger.warn('AMQP broker unavailable', { reason: reason.message });
    this.markUnavailable(reason);
    this.scheduleReconnect();
  }

  private markUnavailable(reason: Error): void {
    this.channel = null;
    for (const reject of this.unconfirmed) reject(reason);
    this.unconfirmed.clear();
  }

  private scheduleReconnect(): void {
    if (this.closed || this.reconnecting || this.url === null) return;
    this.reconnecting = true;
    this.attempts = 0;
    this.reconnectAfter(0);
  }

  private reconnectAfter(ms: number): void {
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.reconnect().catch((err: unknown) => {
        this.reconnecting = false;
        logger.error('AMQP reconnect failed unexpectedly', { error: errorFields(err) });
      });
    }, ms);
  }

  private async reconnect(): Promise<void> {
    if (this.closed) {
      this.reconnecting = false;
      return;
    }
    const stale = this.connection;
    this.connection = null;
    this.channel = null;
    if (stale) {
      await stale.close().catch((err: unknown) => {
        logger.warn('AMQP connection close failed', { error: errorFields(err) });
      });
    }
    try {
      await this.open();
      this.reconnecting = false;
      logger.info('AMQP broker reconnected', { attempts: this.attempts + 1 });
    } catch (err) {
      this.attempts++;
      if (this.attempts >= this.maxReconnectAttempts) {
        this.reconnecting = false;
        logger.error('AMQP reconnect attempts exhausted, waiting for the next publish', {
          attempts: this.attempts,
          error: errorFields(err),
        });
        return;
      }
      const wait = Math.min(this.reconnectBaseMs * Math.pow(1.5, this.attempts), MAX_RECONNECT_DELAY_MS);
      logger.warn('AMQP reconnect failed', { attempt: this.attempts, retryInMs: wait, error: errorFields(err) });
      this.reconnectAfter(wait);
    }
  }
}
