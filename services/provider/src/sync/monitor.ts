import type { Logger } from "pino";
import { LABEL_INSTANCE_ID, managedBySelector } from "../kubevirt/labels.js";
import { derivePhase, phaseForDeletion, rawStatusOf } from "../kubevirt/phase.js";
import type { EventPublisher, WatchEvent, WatchKind, WatchSource } from "../types/interfaces.js";
import type { Phase } from "../types/vm.js";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "./retryPolicy.js";
import { WatchLoop, type WatchLoopStats } from "./watchLoop.js";

export interface VmMonitorOptions {
  source: WatchSource;
  publisher: EventPublisher;
  logger: Logger;
  namespace: string;
  watchKind?: WatchKind;
  retry?: RetryPolicy;
  now?: () => Date;
}

/** One watch over every managed VM in a namespace. Publishes phase changes; never writes the store. */
export class VmMonitor {
  private readonly lastPhase = new Map<string, Phase>();
  private readonly loop: WatchLoop;
  private readonly publisher: EventPublisher;
  private readonly logger: Logger;
  private readonly namespace: string;
  private readonly now: () => Date;

  constructor(options: VmMonitorOptions) {
    this.publisher = options.publisher;
    this.logger = options.logger;
    this.namespace = options.namespace;
    this.now = options.now ?? (() => new Date());
    this.loop = new WatchLoop({
      source: options.source,
      request: {
        kind: options.watchKind ?? "VirtualMachine",
        namespace: options.namespace,
        labelSelector: managedBySelector()
      },
      retry: options.retry ?? DEFAULT_RETRY_POLICY,
      logger: options.logger,
      onEvent: (event) => this.handleEvent(event)
    });
  }

  run(signal: AbortSignal): Promise<void> {
    this.logger.info({ namespace: this.namespace }, "vm monitor started");
    return this.loop.run(signal);
  }

  stats(): WatchLoopStats & { tracked: number } {
    return { ...this.loop.stats(), tracked: this.lastPhase.size };
  }

  private async handleEvent(event: WatchEvent): Promise<void> {
    const meta = event.object.metadata;
    const vmId = meta.labels?.[LABEL_INSTANCE_ID];
    if (!vmId) {
      this.logger.debug({ name: meta.name }, "ignoring vm without instance id");
      return;
    }

    let phase: Phase;
    if (event.type === "delete") {
      phase = phaseForDeletion();
      this.lastPhase.delete(vmId);
    } else {
      const raw = rawStatusOf(event.object);
      if (!raw) return;
      phase = derivePhase(raw);
      if (this.lastPhase.get(vmId) === phase) return;
      this.lastPhase.set(vmId, phase);
    }

    try {
      await this.publisher.publish({
        vmId,
        vmName: meta.name ?? vmId,
        namespace: meta.namespace ?? this.namespace,
        phase,
        timestamp: this.now().toISOString()
      });
    } catch (err) {
      this.logger.warn({ err, vmId, phase }, "dropping vm event");
    }
  }
}
