import { CustomObjectsApi, KubeConfig, Watch } from "@kubernetes/client-node";
import type { Logger } from "pino";
import type { ClusterClient, WatchEvent, WatchHandle, WatchHandlers, WatchRequest } from "../types/interfaces.js";
import { isNotFound, toKubeApiError } from "./errors.js";
import { instanceSelector, managedBySelector } from "./labels.js";
import {
  KUBEVIRT_GROUP,
  KUBEVIRT_VERSION,
  PLURALS,
  readArray,
  readString,
  toKubeObject,
  type KubeObject,
  type VirtualMachineResource
} from "./resource.js";

export interface KubeVirtClientOptions {
  /** Path to a kubeconfig file. Without it the in-cluster or default config is used. */
  kubeconfigPath?: string;
  logger: Logger;
}

export type TranslatedWatchEvent = WatchEvent | { type: "error"; message: string } | null;

/**
 * Maps one raw watch notification onto the adapter's event vocabulary.
 * Bookmarks and objects without metadata are dropped.
 */
export function translateWatchEvent(phase: string, raw: unknown): TranslatedWatchEvent {
  if (phase === "ERROR") {
    return { type: "error", message: readString(raw, "message") ?? "watch stream reported an error" };
  }
  const object = toKubeObject(raw);
  if (!object) return null;
  switch (phase) {
    case "ADDED":
    case "MODIFIED":
      return { type: "upsert", object };
    case "DELETED":
      return { type: "delete", object };
    default:
      return null;
  }
}

export function loadKubeConfig(kubeconfigPath?: string): KubeConfig {
  const kc = new KubeConfig();
  if (kubeconfigPath) {
    kc.loadFromFile(kubeconfigPath);
  } else {
    kc.loadFromDefault();
  }
  return kc;
}

async function callKube<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw toKubeApiError(err) ?? err;
  }
}

export class KubeVirtClient implements ClusterClient {
  private readonly api: CustomObjectsApi;
  private readonly watcher: Watch;
  private readonly logger: Logger;

  constructor(kc: KubeConfig, logger: Logger) {
    this.api = kc.makeApiClient(CustomObjectsApi);
    this.watcher = new Watch(kc);
    this.logger = logger;
  }

  static fromOptions(options: KubeVirtClientOptions): KubeVirtClient {
    return new KubeVirtClient(loadKubeConfig(options.kubeconfigPath), options.logger);
  }

  async createVirtualMachine(resource: VirtualMachineResource): Promise<KubeObject> {
    const created: unknown = await callKube(() =>
      this.api.createNamespacedCustomObject({
        group: KUBEVIRT_GROUP,
        version: KUBEVIRT_VERSION,
        namespace: resource.metadata.namespace,
        plural: PLURALS.VirtualMachine,
        body: resource
      })
    );
    return toKubeObject(created) ?? resource;
  }

  async findVirtualMachine(namespace: string, vmId: string): Promise<KubeObject | null> {
    const items = await this.listByLabel(namespace, instanceSelector(vmId));
    return items[0] ?? null;
  }

  async listVirtualMachines(namespace: string): Promise<KubeObject[]> {
    return this.listByLabel(namespace, managedBySelector());
  }

  async deleteVirtualMachine(namespace: string, name: string): Promise<void> {
    try {
      await callKube(() =>
        this.api.deleteNamespacedCustomObject({
          group: KUBEVIRT_GROUP,
          version: KUBEVIRT_VERSION,
          namespace,
          plural: PLURALS.VirtualMachine,
          name
        })
      );
    } catch (err) {
      // Already gone is the outcome the caller asked for.
      if (isNotFound(err)) return;
      throw err;
    }
  }

  async watch(request: WatchRequest, handlers: WatchHandlers): Promise<WatchHandle> {
    const path = `/apis/${KUBEVIRT_GROUP}/${KUBEVIRT_VERSION}/namespaces/${request.namespace}/${PLURALS[request.kind]}`;
    let closed = false;
    const close = (err?: Error) => {
      if (closed) return;
      closed = true;
      handlers.onClose(err);
    };

    const controller = await this.watcher.watch(
      path,
      { labelSelector: request.labelSelector },
      (phase: string, raw: unknown) => {
        if (closed) return;
        const event = translateWatchEvent(phase, raw);
        if (!event) return;
        if (event.type === "error") {
          close(new Error(event.message));
          return;
        }
        handlers.onEvent(event);
      },
      (err: unknown) => {
        if (err === null || err === undefined) {
          close();
          return;
        }
        close(toKubeApiError(err) ?? (err instanceof Error ? err : new Error(String(err))));
      }
    );

    this.logger.debug({ path, labelSelector: request.labelSelector }, "watch opened");
    return {
      stop: () => {
        closed = true;
        controller.abort();
      }
    };
  }

  private async listByLabel(namespace: string, labelSelector: string): Promise<KubeObject[]> {
    const list: unknown = await callKube(() =>
      this.api.listNamespacedCustomObject({
        group: KUBEVIRT_GROUP,
        version: KUBEVIRT_VERSION,
        namespace,
        plural: PLURALS.VirtualMachine,
        labelSelector
      })
    );
    const items: KubeObject[] = [];
    for (const raw of readArray(list, "items")) {
      const obj = toKubeObject(raw);
      if (obj) items.push(obj);
    }
    return items;
  }
}
