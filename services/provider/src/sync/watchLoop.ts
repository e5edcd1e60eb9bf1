import type { Logger } from "pino";
import type { WatchEvent, WatchHandle, WatchRequest, WatchSource } from "../types/interfaces.js";
import { backoffDelay, sleep, type RetryPolicy } from "./retryPolicy.js";

export interface WatchLoopOptions {
  source: WatchSource;
  request: WatchRequest;
  retry: RetryPolicy;
  logger: Logger;
  onEvent(event: WatchEvent): Promise<void>;
  /** Consulted before every reconnect; false ends the loop. */
  shouldContinue?: () => Promise<boolean>;
}

export interface WatchLoopStats {
  reconnects: number;
  /** Consecutive failed streams since the last delivered event. */
  attempt: number;
  events: number;
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Keeps one watch stream open until the signal aborts, reopening it with backoff when it ends.
 * Events are handed to `onEvent` one at a time in arrival order.
 */
export class WatchLoop {
  private reconnects = 0;
  private attempt = 0;
  private events = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly options: WatchLoopOptions) {}

  stats(): WatchLoopStats {
    return { reconnects: this.reconnects, attempt: this.attempt, events: this.events };
  }

  async run(signal: AbortSignal): Promise<void> {
    const { logger, retry } = this.options;
    while (!signal.aborted) {
      const err = await this.runOnce(signal);
      if (signal.aborted) break;
      if (this.options.shouldContinue && !(await this.options.shouldContinue())) {
        logger.debug("watch no longer needed");
        break;
      }
      this.attempt += 1;
      this.reconnects += 1;
      const delayMs = backoffDelay(this.attempt, retry);
      logger.warn({ err, attempt: this.attempt, delayMs }, "watch stream closed, reconnecting");
      await sleep(delayMs, signal);
    }
    await this.tail;
  }

  private async runOnce(signal: AbortSignal): Promise<Error | undefined> {
    const closed = deferred<Error | undefined>();
    let handle: WatchHandle;
    try {
      handle = await this.options.source.watch(this.options.request, {
        onEvent: (event) => this.enqueue(event, signal),
        onClose: (err) => closed.resolve(err)
      });
    } catch (err) {
      return toError(err);
    }

    const onAbort = () => closed.resolve(undefined);
    if (signal.aborted) onAbort();
    signal.addEventListener("abort", onAbort, { once: true });
    try {
      return await closed.promise;
    } finally {
      signal.removeEventListener("abort", onAbort);
      handle.stop();
      await this.tail;
    }
  }

  private enqueue(event: WatchEvent, signal: AbortSignal): void {
    this.attempt = 0;
    this.events += 1;
    this.tail = this.tail.then(async () => {
      if (signal.aborted) return;
      try {
        await this.options.onEvent(event);
      } catch (err) {
        this.options.logger.error({ err }, "watch event handler failed");
      }
    });
  }
}
