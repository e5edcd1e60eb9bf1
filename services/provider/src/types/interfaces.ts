import type { KubeObject, VirtualMachineResource, WatchKind } from "../kubevirt/resource.js";
import type { VmEvent, VmRecord, VmSpec, VmView } from "./vm.js";

export type { WatchKind };

export interface VmStore {
  create(vm: VmRecord): Promise<void>;
  update(id: string, patch: Partial<VmRecord>): Promise<void>;
  get(id: string): Promise<VmRecord | null>;
  list(): Promise<VmRecord[]>;
  delete(id: string): Promise<void>;
}

export interface WatchRequest {
  kind: WatchKind;
  namespace: string;
  labelSelector: string;
}

export interface WatchEvent {
  type: "upsert" | "delete";
  object: KubeObject;
}

export interface WatchHandlers {
  onEvent(event: WatchEvent): void;
  /** Called once when the stream ends, with the error that ended it if any. */
  onClose(err?: Error): void;
}

export interface WatchHandle {
  stop(): void;
}

export interface WatchSource {
  watch(request: WatchRequest, handlers: WatchHandlers): Promise<WatchHandle>;
}

export interface ClusterClient extends WatchSource {
  createVirtualMachine(resource: VirtualMachineResource): Promise<KubeObject>;
  findVirtualMachine(namespace: string, vmId: string): Promise<KubeObject | null>;
  listVirtualMachines(namespace: string): Promise<KubeObject[]>;
  deleteVirtualMachine(namespace: string, name: string): Promise<void>;
}

export interface PublisherStats {
  connected: boolean;
  published: number;
  failed: number;
}

export interface EventPublisher {
  publish(event: VmEvent): Promise<void>;
  isConnected(): boolean;
  stats(): PublisherStats;
  close(): Promise<void>;
}

export interface VmTracker {
  /** Returns false when the id already has a live session. */
  track(id: string, namespace: string): boolean;
  untrack(id: string): Promise<void>;
}

export interface CreateVmResult {
  vm: VmView;
  created: boolean;
}

export interface VmOperations {
  create(spec: VmSpec, options?: { id?: string }): Promise<CreateVmResult>;
  get(id: string): Promise<VmView>;
  list(): Promise<VmView[]>;
  delete(id: string): Promise<void>;
}
