export const KUBEVIRT_GROUP = "kubevirt.io";
export const KUBEVIRT_VERSION = "v1";
export const KUBEVIRT_API_VERSION = "kubevirt.io/v1";

export type WatchKind = "VirtualMachine" | "VirtualMachineInstance";

export const PLURALS: Record<WatchKind, string> = {
  VirtualMachine: "virtualmachines",
  VirtualMachineInstance: "virtualmachineinstances"
};

export interface ObjectMeta {
  name?: string;
  namespace?: string;
  labels?: Record<string, string>;
  uid?: string;
  resourceVersion?: string;
  creationTimestamp?: string;
}

/** Any object read back from the cluster; only metadata is trusted to be shaped. */
export interface KubeObject {
  apiVersion?: string;
  kind?: string;
  metadata: ObjectMeta;
  spec?: unknown;
  status?: unknown;
}

export interface VirtualMachineDisk {
  name: string;
  bootOrder?: number;
  disk: { bus: "virtio" };
}

export interface VirtualMachineVolume {
  name: string;
  containerDisk?: { image: string };
  emptyDisk?: { capacity: string };
  cloudInitNoCloud?: { userData: string };
}

export interface VirtualMachineResource extends KubeObject {
  apiVersion: typeof KUBEVIRT_API_VERSION;
  kind: "VirtualMachine";
  metadata: { name: string; namespace: string; labels: Record<string, string> };
  spec: {
    running: boolean;
    template: {
      metadata: { labels: Record<string, string> };
      spec: {
        architecture?: string;
        domain: {
          machine: { type: string };
          resources: { requests: { cpu: string; memory: string } };
          devices: {
            disks: VirtualMachineDisk[];
            interfaces: Array<{ name: string; masquerade: Record<string, never>; model: "virtio" }>;
          };
        };
        networks: Array<{ name: string; pod: Record<string, never> }>;
        volumes: VirtualMachineVolume[];
        terminationGracePeriodSeconds: number;
      };
    };
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readPath(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function readString(value: unknown, ...path: string[]): string | undefined {
  const v = readPath(value, ...path);
  return typeof v === "string" ? v : undefined;
}

export function readBoolean(value: unknown, ...path: string[]): boolean | undefined {
  const v = readPath(value, ...path);
  return typeof v === "boolean" ? v : undefined;
}

export function readArray(value: unknown, ...path: string[]): unknown[] {
  const v = readPath(value, ...path);
  return Array.isArray(v) ? v : [];
}

function readLabels(raw: unknown): Record<string, string> | undefined {
  if (!isRecord(raw)) return undefined;
  const labels: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw)) {
    if (typeof v === "string") labels[k] = v;
  }
  return labels;
}

export function toKubeObject(raw: unknown): KubeObject | null {
  if (!isRecord(raw) || !isRecord(raw.metadata)) return null;
  const meta = raw.metadata;
  return {
    apiVersion: typeof raw.apiVersion === "string" ? raw.apiVersion : undefined,
    kind: typeof raw.kind === "string" ? raw.kind : undefined,
    metadata: {
      name: typeof meta.name === "string" ? meta.name : undefined,
      namespace: typeof meta.namespace === "string" ? meta.namespace : undefined,
      labels: readLabels(meta.labels),
      uid: typeof meta.uid === "string" ? meta.uid : undefined,
      resourceVersion: typeof meta.resourceVersion === "string" ? meta.resourceVersion : undefined,
      creationTimestamp: typeof meta.creationTimestamp === "string" ? meta.creationTimestamp : undefined
    },
    spec: raw.spec,
    status: raw.status
  };
}
