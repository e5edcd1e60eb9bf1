import { connect, DebugEvents, Events, JSONCodec, type NatsConnection } from "nats";
import type { Logger } from "pino";
import type { EventPublisher, PublisherStats } from "../types/interfaces.js";
import type { VmEvent } from "../types/vm.js";
import { buildEnvelope, type CloudEventEnvelope, type EnvelopeAttributes } from "./envelope.js";

export class PublisherNotConnectedError extends Error {
  constructor() {
    super("event publisher is not connected");
    this.name = "PublisherNotConnectedError";
  }
}

export class PublishTimeoutError extends Error {
  constructor(subject: string, timeoutMs: number) {
    super(`flush for ${subject} did not complete within ${timeoutMs}ms`);
    this.name = "PublishTimeoutError";
  }
}

export type PublisherConnection = Pick<NatsConnection, "publish" | "flush" | "isClosed" | "close">;

export interface PublisherOptions extends EnvelopeAttributes {
  flushTimeoutMs: number;
  logger: Logger;
}

export interface ConnectOptions extends PublisherOptions {
  url: string;
  maxReconnect: number;
}

const RECONNECT_WAIT_MS = 2_000;

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}

/**
 * Publishes VM phase changes as CloudEvents on `vm.<id>`. Delivery is at most once:
 * a publish while disconnected fails fast instead of buffering.
 */
export class NatsEventPublisher implements EventPublisher {
  private readonly codec = JSONCodec<CloudEventEnvelope<VmEvent>>();
  private readonly logger: Logger;
  private connected = true;
  private published = 0;
  private failed = 0;

  constructor(
    private readonly conn: PublisherConnection,
    private readonly options: PublisherOptions
  ) {
    this.logger = options.logger;
  }

  static async connect(options: ConnectOptions): Promise<NatsEventPublisher> {
    const nc = await connect({
      servers: options.url,
      name: options.source,
      maxReconnectAttempts: options.maxReconnect,
      reconnectTimeWait: RECONNECT_WAIT_MS
    });
    const publisher = new NatsEventPublisher(nc, options);
    publisher.followStatus(nc.status()).catch((err: unknown) => {
      options.logger.warn({ err }, "nats status stream ended with an error");
    });
    options.logger.info({ url: options.url }, "connected to nats");
    return publisher;
  }

  /** Tracks connectivity from the client's status notifications until the stream ends. */
  async followStatus(statuses: AsyncIterable<{ type: string }>): Promise<void> {
    for await (const status of statuses) {
      switch (status.type) {
        case Events.Disconnect:
        case DebugEvents.Reconnecting:
          if (this.connected) this.logger.warn({ status: status.type }, "nats connection lost");
          this.connected = false;
          break;
        case Events.Reconnect:
          this.connected = true;
          this.logger.info("nats connection restored");
          break;
        default:
          break;
      }
    }
  }

  isConnected(): boolean {
    return this.connected && !this.conn.isClosed();
  }

  async publish(event: VmEvent): Promise<void> {
    if (!this.isConnected()) {
      this.failed += 1;
      throw new PublisherNotConnectedError();
    }
    const envelope = buildEnvelope(event, { source: this.options.source, type: this.options.type });
    try {
      this.conn.publish(envelope.subject, this.codec.encode(envelope));
      await withTimeout(
        this.conn.flush(),
        this.options.flushTimeoutMs,
        () => new PublishTimeoutError(envelope.subject, this.options.flushTimeoutMs)
      );
    } catch (err) {
      this.failed += 1;
      throw err;
    }
    this.published += 1;
    this.logger.debug({ subject: envelope.subject, phase: event.phase, eventId: envelope.id }, "published vm event");
  }

  stats(): PublisherStats {
    return { connected: this.isConnected(), published: this.published, failed: this.failed };
  }

  async close(): Promise<void> {
    this.connected = false;
    if (this.conn.isClosed()) return;
    await this.conn.close();
  }
}

/** Stand-in used when event publishing is switched off. */
export class DisabledEventPublisher implements EventPublisher {
  async publish(): Promise<void> {
    return;
  }

  isConnected(): boolean {
    return false;
  }

  stats(): PublisherStats {
    return { connected: false, published: 0, failed: 0 };
  }

  async close(): Promise<void> {
    return;
  }
}
