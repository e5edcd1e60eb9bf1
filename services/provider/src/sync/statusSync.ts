import type { Logger } from "pino";
import { instanceSelector } from "../kubevirt/labels.js";
import { derivePhase, phaseForDeletion, rawStatusOf } from "../kubevirt/phase.js";
import type { EventPublisher, VmStore, VmTracker, WatchEvent, WatchKind, WatchSource } from "../types/interfaces.js";
import type { Phase, VmEvent, VmRecord } from "../types/vm.js";
import { backoffDelay, DEFAULT_RETRY_POLICY, sleep, type RetryPolicy } from "./retryPolicy.js";
import { WatchLoop, type WatchLoopStats } from "./watchLoop.js";

export interface StatusSynchronizerOptions {
  store: VmStore;
  source: WatchSource;
  publisher: EventPublisher;
  logger: Logger;
  retry?: RetryPolicy;
  watchKind?: WatchKind;
  now?: () => Date;
}

export interface SessionStats extends WatchLoopStats {
  vmId: string;
  namespace: string;
  startedAt: string;
}

interface WatchSession {
  vmId: string;
  namespace: string;
  controller: AbortController;
  loop: WatchLoop;
  startedAt: string;
  done: Promise<void>;
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
}

/**
 * Keeps one watch per tracked VM and mirrors every phase change into the store and onto the
 * event bus. Session bookkeeping is synchronous, so a VM can never have two live watches.
 */
export class StatusSynchronizer implements VmTracker {
  private readonly sessions = new Map<string, WatchSession>();
  private readonly store: VmStore;
  private readonly source: WatchSource;
  private readonly publisher: EventPublisher;
  private readonly logger: Logger;
  private readonly retry: RetryPolicy;
  private readonly watchKind: WatchKind;
  private readonly now: () => Date;
  private stopped = false;

  constructor(options: StatusSynchronizerOptions) {
    this.store = options.store;
    this.source = options.source;
    this.publisher = options.publisher;
    this.logger = options.logger;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.watchKind = options.watchKind ?? "VirtualMachineInstance";
    this.now = options.now ?? (() => new Date());
  }

  /** Tracks every stored VM, then waits until `signal` aborts and all sessions have wound down. */
  async startAll(signal: AbortSignal): Promise<void> {
    if (signal.aborted) return;
    const records = await this.loadRecords(signal);
    if (records && !signal.aborted) {
      for (const record of records) {
        this.track(record.id, record.namespace);
      }
      this.logger.info({ sessions: this.sessions.size }, "status synchronizer started");
    }
    await waitForAbort(signal);
    await this.stop();
  }

  /** Lists the store until it answers or `signal` aborts; null means aborted. */
  private async loadRecords(signal: AbortSignal): Promise<VmRecord[] | null> {
    let attempt = 0;
    while (!signal.aborted) {
      try {
        return await this.store.list();
      } catch (err) {
        attempt += 1;
        const delayMs = backoffDelay(attempt, this.retry);
        this.logger.error({ err, attempt, delayMs }, "failed to list vm records, retrying");
        await sleep(delayMs, signal);
      }
    }
    return null;
  }

  track(vmId: string, namespace: string): boolean {
    if (this.stopped || this.sessions.has(vmId)) {
      return false;
    }
    const controller = new AbortController();
    const logger = this.logger.child({ vmId, namespace });
    const loop = new WatchLoop({
      source: this.source,
      request: { kind: this.watchKind, namespace, labelSelector: instanceSelector(vmId) },
      retry: this.retry,
      logger,
      onEvent: (event) => this.handleEvent(vmId, namespace, controller, logger, event),
      shouldContinue: () => this.recordExists(vmId, logger)
    });
    const session: WatchSession = {
      vmId,
      namespace,
      controller,
      loop,
      startedAt: this.now().toISOString(),
      done: Promise.resolve()
    };
    this.sessions.set(vmId, session);
    session.done = loop
      .run(controller.signal)
      .catch((err: unknown) => {
        logger.error({ err }, "watch session failed");
      })
      .finally(() => this.removeSession(vmId, controller));
    logger.debug("watch session started");
    return true;
  }

  async untrack(vmId: string): Promise<void> {
    const session = this.sessions.get(vmId);
    if (!session) return;
    this.sessions.delete(vmId);
    session.controller.abort();
    await session.done;
  }

  async stop(): Promise<void> {
    this.stopped = true;
    const sessions = Array.from(this.sessions.values());
    this.sessions.clear();
    for (const s of sessions) s.controller.abort();
    await Promise.all(sessions.map((s) => s.done));
  }

  sessionCount(): number {
    return this.sessions.size;
  }

  isTracking(vmId: string): boolean {
    return this.sessions.has(vmId);
  }

  sessionStats(vmId: string): SessionStats | null {
    const session = this.sessions.get(vmId);
    if (!session) return null;
    return { vmId, namespace: session.namespace, startedAt: session.startedAt, ...session.loop.stats() };
  }

  private removeSession(vmId: string, controller: AbortController): void {
    controller.abort();
    if (this.sessions.get(vmId)?.controller === controller) {
      this.sessions.delete(vmId);
    }
  }

  private async recordExists(vmId: string, logger: Logger): Promise<boolean> {
    try {
      return (await this.store.get(vmId)) !== null;
    } catch (err) {
      logger.warn({ err }, "could not check vm record before reconnecting");
      return true;
    }
  }

  private async handleEvent(
    vmId: string,
    namespace: string,
    controller: AbortController,
    logger: Logger,
    event: WatchEvent
  ): Promise<void> {
    let record: VmRecord | null;
    try {
      record = await this.store.get(vmId);
    } catch (err) {
      logger.error({ err }, "failed to read vm record");
      return;
    }
    if (!record) {
      logger.info("vm record no longer exists, ending watch");
      this.removeSession(vmId, controller);
      return;
    }

    const deleted = event.type === "delete";
    let phase: Phase;
    if (deleted) {
      phase = phaseForDeletion();
    } else {
      const raw = rawStatusOf(event.object);
      if (!raw) {
        logger.debug({ kind: event.object.kind }, "ignoring object of unsupported kind");
        return;
      }
      phase = derivePhase(raw);
    }

    const previous = record.status;
    const changed = previous !== phase;
    if (changed) {
      try {
        await this.store.update(vmId, { status: phase });
      } catch (err) {
        logger.error({ err, phase, previous }, "failed to persist vm phase");
        if (deleted) this.removeSession(vmId, controller);
        return;
      }
      logger.info({ phase, previous }, "vm phase changed");
    }

    if (changed || deleted) {
      const vmEvent: VmEvent = {
        vmId,
        vmName: event.object.metadata.name ?? record.name,
        namespace,
        phase,
        timestamp: this.now().toISOString()
      };
      try {
        await this.publisher.publish(vmEvent);
      } catch (err) {
        logger.warn({ err, phase }, "dropping vm event");
      }
    }

    if (deleted) {
      logger.info("vm resource deleted, ending watch");
      this.removeSession(vmId, controller);
    }
  }
}
