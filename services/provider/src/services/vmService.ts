import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { HttpError } from "../api/httpErrors.js";
import { mapKubeError, toKubeApiError } from "../kubevirt/errors.js";
import { LABEL_INSTANCE_ID } from "../kubevirt/labels.js";
import { fromNativeResource, toNativeResource } from "../kubevirt/mapper.js";
import type { KubeObject } from "../kubevirt/resource.js";
import type { ClusterClient, CreateVmResult, VmOperations, VmStore, VmTracker } from "../types/interfaces.js";
import { STATUS_IN_PROGRESS, type VmRecord, type VmRecordStatus, type VmSpec, type VmView } from "../types/vm.js";

export interface VmServiceOptions {
  store: VmStore;
  cluster: ClusterClient;
  tracker: VmTracker;
  namespace: string;
  logger: Logger;
  now?: () => Date;
}

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function vmNameFor(id: string): string {
  return `vm-${id.replace(/-/g, "").slice(0, 8).toLowerCase()}`;
}

export const vmPathFor = (id: string) => `vms/${id}`;

export class VmService implements VmOperations {
  private readonly store: VmStore;
  private readonly cluster: ClusterClient;
  private readonly tracker: VmTracker;
  private readonly namespace: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: VmServiceOptions) {
    this.store = options.store;
    this.cluster = options.cluster;
    this.tracker = options.tracker;
    this.namespace = options.namespace;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async create(spec: VmSpec, options: { id?: string } = {}): Promise<CreateVmResult> {
    const id = options.id ?? randomUUID();
    if (!UUID_RE.test(id)) {
      throw new HttpError(400, "id must be a UUID");
    }

    const existing = await this.kube("look up", () => this.cluster.findVirtualMachine(this.namespace, id));
    if (existing) {
      const record = await this.store.get(id);
      this.logger.info({ vmId: id }, "vm already exists, returning it");
      return { vm: this.toView(id, existing, record?.status), created: false };
    }

    const name = vmNameFor(id);
    const resource = toNativeResource(spec, { id, name, namespace: this.namespace });
    const memory = resource.spec.template.spec.domain.resources.requests.memory;
    await this.kube("create", () => this.cluster.createVirtualMachine(resource));

    const record: VmRecord = {
      id,
      namespace: this.namespace,
      name,
      cpu: spec.vcpu,
      memory,
      guestOS: spec.guestOS.trim(),
      architecture: spec.architecture?.trim() ?? "",
      hostname: spec.hostname?.trim() ?? "",
      status: STATUS_IN_PROGRESS,
      createdAt: this.now().toISOString()
    };
    try {
      await this.store.create(record);
    } catch (err) {
      await this.cluster.deleteVirtualMachine(this.namespace, name).catch((cleanupErr: unknown) => {
        this.logger.error({ err: cleanupErr, vmId: id }, "failed to roll back vm resource");
      });
      throw err;
    }

    this.tracker.track(id, this.namespace);
    this.logger.info({ vmId: id, name, namespace: this.namespace }, "vm created");
    return {
      vm: { id, name, namespace: this.namespace, path: vmPathFor(id), status: record.status, spec: { ...spec, memory } },
      created: true
    };
  }

  async get(id: string): Promise<VmView> {
    const resource = await this.kube("get", () => this.cluster.findVirtualMachine(this.namespace, id));
    if (!resource) {
      throw new HttpError(404, "VM not found");
    }
    const record = await this.store.get(id);
    return this.toView(id, resource, record?.status);
  }

  async list(): Promise<VmView[]> {
    const resources = await this.kube("list", () => this.cluster.listVirtualMachines(this.namespace));
    const records = new Map((await this.store.list()).map((r) => [r.id, r] as const));
    const views: VmView[] = [];
    for (const resource of resources) {
      const id = resource.metadata.labels?.[LABEL_INSTANCE_ID];
      if (!id) continue;
      views.push(this.toView(id, resource, records.get(id)?.status));
    }
    return views;
  }

  async delete(id: string): Promise<void> {
    const resource = await this.kube("look up", () => this.cluster.findVirtualMachine(this.namespace, id));
    if (!resource) {
      throw new HttpError(404, "VM not found");
    }
    const namespace = resource.metadata.namespace ?? this.namespace;
    const name = resource.metadata.name ?? vmNameFor(id);
    await this.kube("delete", () => this.cluster.deleteVirtualMachine(namespace, name));
    await this.tracker.untrack(id);
    await this.store.delete(id);
    this.logger.info({ vmId: id, name, namespace }, "vm deleted");
  }

  private toView(id: string, resource: KubeObject, status: VmRecordStatus | undefined): VmView {
    return {
      id,
      name: resource.metadata.name ?? vmNameFor(id),
      namespace: resource.metadata.namespace ?? this.namespace,
      path: vmPathFor(id),
      status: status ?? "Unknown",
      spec: fromNativeResource(resource)
    };
  }

  private async kube<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      const apiErr = toKubeApiError(err);
      if (!apiErr) throw err;
      this.logger.error({ err: apiErr, statusCode: apiErr.statusCode }, `kubernetes ${action} failed`);
      throw mapKubeError(apiErr, action);
    }
  }
}
