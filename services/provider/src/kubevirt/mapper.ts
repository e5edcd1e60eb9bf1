import type { VmDiskSpec, VmSpec } from "../types/vm.js";
import { ValidationError } from "./errors.js";
import { ownershipLabels } from "./labels.js";
import { parseMemorySize } from "./quantity.js";
import {
  KUBEVIRT_API_VERSION,
  readArray,
  readPath,
  readString,
  isRecord,
  type KubeObject,
  type VirtualMachineDisk,
  type VirtualMachineResource,
  type VirtualMachineVolume
} from "./resource.js";

export const CONTAINER_DISK_IMAGES: Readonly<Record<string, string>> = {
  ubuntu: "quay.io/kubevirt/ubuntu-container-disk-demo:latest",
  centos: "quay.io/kubevirt/centos-container-disk-demo:latest",
  fedora: "quay.io/kubevirt/fedora-container-disk-demo:latest",
  cirros: "quay.io/kubevirt/cirros-container-disk-demo:latest"
};

export const DEFAULT_GUEST_OS = "cirros";
export const DEFAULT_BOOT_DISK = "boot";
export const DEFAULT_EMPTY_DISK_CAPACITY = "10Gi";
export const CLOUD_INIT_VOLUME = "cloudinitdisk";
export const NETWORK_NAME = "default";
export const MACHINE_TYPE = "q35";
export const TERMINATION_GRACE_PERIOD_SECONDS = 180;

export interface ResourceIdentity {
  id: string;
  name: string;
  namespace: string;
}

export function getContainerImage(guestOS: string): string {
  return CONTAINER_DISK_IMAGES[guestOS.trim().toLowerCase()] ?? CONTAINER_DISK_IMAGES[DEFAULT_GUEST_OS];
}

export function inferGuestOS(image: string): string {
  const lowered = image.toLowerCase();
  return Object.keys(CONTAINER_DISK_IMAGES).find((os) => lowered.includes(os)) ?? DEFAULT_GUEST_OS;
}

function validateDisks(disks: VmDiskSpec[]): VmDiskSpec[] {
  const seen = new Set<string>();
  for (const disk of disks) {
    const name = disk.name.trim();
    if (!name) throw new ValidationError("disk name must not be empty");
    if (name === CLOUD_INIT_VOLUME) throw new ValidationError(`disk name "${CLOUD_INIT_VOLUME}" is reserved`);
    if (seen.has(name)) throw new ValidationError(`duplicate disk name: ${name}`);
    seen.add(name);
  }
  return disks.length > 0 ? disks.map((d) => ({ ...d, name: d.name.trim() })) : [{ name: DEFAULT_BOOT_DISK }];
}

function bootDiskIndex(disks: VmDiskSpec[]): number {
  const named = disks.findIndex((d) => d.name === DEFAULT_BOOT_DISK);
  return named >= 0 ? named : 0;
}

export function buildCloudInitUserData(spec: Pick<VmSpec, "hostname" | "sshKeys">): string | null {
  const keys = (spec.sshKeys ?? []).map((k) => k.trim()).filter(Boolean);
  const hostname = spec.hostname?.trim();
  if (!hostname && keys.length === 0) return null;

  const lines = ["#cloud-config"];
  if (hostname) lines.push(`hostname: ${JSON.stringify(hostname)}`);
  if (keys.length > 0) {
    lines.push("ssh_authorized_keys:");
    for (const key of keys) lines.push(`  - ${JSON.stringify(key)}`);
  }
  return `${lines.join("\n")}\n`;
}

/** Builds the kubevirt.io/v1 VirtualMachine for a declared VM. Pure; throws ValidationError. */
export function toNativeResource(spec: VmSpec, identity: ResourceIdentity): VirtualMachineResource {
  if (!Number.isInteger(spec.vcpu) || spec.vcpu <= 0) {
    throw new ValidationError("vcpu must be a positive integer");
  }
  if (!spec.guestOS.trim()) {
    throw new ValidationError("guestOS must not be empty");
  }
  const memory = parseMemorySize(spec.memory);
  const disks = validateDisks(spec.disks);
  const boot = bootDiskIndex(disks);
  const image = getContainerImage(spec.guestOS);

  const domainDisks = disks.map((d, i): VirtualMachineDisk =>
    i === boot ? { name: d.name, bootOrder: 1, disk: { bus: "virtio" } } : { name: d.name, disk: { bus: "virtio" } }
  );
  const volumes = disks.map((d, i): VirtualMachineVolume =>
    i === boot
      ? { name: d.name, containerDisk: { image } }
      : { name: d.name, emptyDisk: { capacity: DEFAULT_EMPTY_DISK_CAPACITY } }
  );

  const userData = buildCloudInitUserData(spec);
  if (userData) {
    domainDisks.push({ name: CLOUD_INIT_VOLUME, disk: { bus: "virtio" } });
    volumes.push({ name: CLOUD_INIT_VOLUME, cloudInitNoCloud: { userData } });
  }

  const labels = ownershipLabels(identity.id);
  const architecture = spec.architecture?.trim();

  return {
    apiVersion: KUBEVIRT_API_VERSION,
    kind: "VirtualMachine",
    metadata: { name: identity.name, namespace: identity.namespace, labels: { ...labels } },
    spec: {
      running: true,
      template: {
        metadata: { labels: { ...labels } },
        spec: {
          ...(architecture ? { architecture } : {}),
          domain: {
            machine: { type: MACHINE_TYPE },
            resources: { requests: { cpu: String(spec.vcpu), memory } },
            devices: {
              disks: domainDisks,
              interfaces: [{ name: NETWORK_NAME, masquerade: {}, model: "virtio" }]
            }
          },
          networks: [{ name: NETWORK_NAME, pod: {} }],
          volumes,
          terminationGracePeriodSeconds: TERMINATION_GRACE_PERIOD_SECONDS
        }
      }
    }
  };
}

function parseCpu(raw: unknown): number {
  const n = typeof raw === "number" ? raw : typeof raw === "string" && /^\d+$/.test(raw) ? Number(raw) : NaN;
  return Number.isInteger(n) && n > 0 ? n : 1;
}

/**
 * Best-effort reverse mapping. Disk capacities and cloud-init settings are not recovered,
 * and the guest OS is inferred from the boot image name.
 */
export function fromNativeResource(resource: KubeObject): VmSpec {
  const template = readPath(resource.spec, "template", "spec");
  const requests = readPath(template, "domain", "resources", "requests");

  const volumes = readArray(template, "volumes").filter(isRecord);
  const userVolumes = volumes.filter((v) => v.cloudInitNoCloud === undefined && v.name !== CLOUD_INIT_VOLUME);
  const bootImage = userVolumes
    .map((v) => readString(v, "containerDisk", "image"))
    .find((image): image is string => typeof image === "string");

  const disks: VmDiskSpec[] = readArray(template, "domain", "devices", "disks")
    .map((d) => readString(d, "name"))
    .filter((name): name is string => typeof name === "string" && name.length > 0 && name !== CLOUD_INIT_VOLUME)
    .map((name) => ({ name }));

  const spec: VmSpec = {
    vcpu: parseCpu(readPath(requests, "cpu")),
    memory: readString(requests, "memory") ?? "1Gi",
    guestOS: bootImage ? inferGuestOS(bootImage) : DEFAULT_GUEST_OS,
    disks: disks.length > 0 ? disks : [{ name: DEFAULT_BOOT_DISK }]
  };
  const architecture = readString(template, "architecture");
  if (architecture) spec.architecture = architecture;
  return spec;
}
