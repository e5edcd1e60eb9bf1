import { describe, expect, it } from "vitest";
import { ValidationError } from "../errors.js";
import {
  buildCloudInitUserData,
  fromNativeResource,
  getContainerImage,
  inferGuestOS,
  toNativeResource
} from "../mapper.js";
import type { VmSpec } from "../../types/vm.js";

const identity = {
  id: "0f8fad5b-d9cb-469f-a165-70867728950e",
  name: "vm-0f8fad5b",
  namespace: "default"
};

const labels = {
  "vm-provider.io/managed-by": "vm-provider",
  "vm-provider.io/instance-id": identity.id
};

function spec(overrides: Partial<VmSpec> = {}): VmSpec {
  return { vcpu: 2, memory: "2Gi", guestOS: "fedora", disks: [{ name: "boot" }], ...overrides };
}

describe("getContainerImage", () => {
  it("maps known guest operating systems case-insensitively", () => {
    expect(getContainerImage("Ubuntu")).toBe("quay.io/kubevirt/ubuntu-container-disk-demo:latest");
  });

  it("falls back to cirros", () => {
    expect(getContainerImage("plan9")).toBe("quay.io/kubevirt/cirros-container-disk-demo:latest");
  });
});

describe("inferGuestOS", () => {
  it("finds the OS in an image reference", () => {
    expect(inferGuestOS("registry.local/centos-container-disk-demo:9")).toBe("centos");
    expect(inferGuestOS("registry.local/custom:1")).toBe("cirros");
  });
});

describe("buildCloudInitUserData", () => {
  it("returns null without hostname or keys", () => {
    expect(buildCloudInitUserData({})).toBeNull();
    expect(buildCloudInitUserData({ hostname: " ", sshKeys: [""] })).toBeNull();
  });

  it("renders hostname and keys as cloud-config", () => {
    expect(buildCloudInitUserData({ hostname: "web-1", sshKeys: ["ssh-ed25519 AAAA test@host"] })).toBe(
      '#cloud-config\nhostname: "web-1"\nssh_authorized_keys:\n  - "ssh-ed25519 AAAA test@host"\n'
    );
  });
});

describe("toNativeResource", () => {
  it("builds a running VirtualMachine with a container boot disk", () => {
    const vm = toNativeResource(spec(), identity);

    expect(vm).toEqual({
      apiVersion: "kubevirt.io/v1",
      kind: "VirtualMachine",
      metadata: { name: "vm-0f8fad5b", namespace: "default", labels },
      spec: {
        running: true,
        template: {
          metadata: { labels },
          spec: {
            domain: {
              machine: { type: "q35" },
              resources: { requests: { cpu: "2", memory: "2Gi" } },
              devices: {
                disks: [{ name: "boot", bootOrder: 1, disk: { bus: "virtio" } }],
                interfaces: [{ name: "default", masquerade: {}, model: "virtio" }]
              }
            },
            networks: [{ name: "default", pod: {} }],
            volumes: [{ name: "boot", containerDisk: { image: "quay.io/kubevirt/fedora-container-disk-demo:latest" } }],
            terminationGracePeriodSeconds: 180
          }
        }
      }
    });
  });

  it("canonicalizes memory", () => {
    const vm = toNativeResource(spec({ memory: "2GB" }), identity);
    expect(vm.spec.template.spec.domain.resources.requests.memory).toBe("2G");
  });

  it("adds a boot disk when none is declared", () => {
    const vm = toNativeResource(spec({ disks: [] }), identity);
    expect(vm.spec.template.spec.domain.devices.disks).toEqual([{ name: "boot", bootOrder: 1, disk: { bus: "virtio" } }]);
  });

  it("boots from the disk named boot and gives other disks empty storage", () => {
    const vm = toNativeResource(spec({ disks: [{ name: "data" }, { name: "boot" }] }), identity);
    const template = vm.spec.template.spec;

    expect(template.domain.devices.disks).toEqual([
      { name: "data", disk: { bus: "virtio" } },
      { name: "boot", bootOrder: 1, disk: { bus: "virtio" } }
    ]);
    expect(template.volumes).toEqual([
      { name: "data", emptyDisk: { capacity: "10Gi" } },
      { name: "boot", containerDisk: { image: "quay.io/kubevirt/fedora-container-disk-demo:latest" } }
    ]);
  });

  it("boots from the first disk when none is named boot", () => {
    const vm = toNativeResource(spec({ disks: [{ name: "root" }, { name: "scratch" }] }), identity);
    expect(vm.spec.template.spec.domain.devices.disks[0]).toEqual({ name: "root", bootOrder: 1, disk: { bus: "virtio" } });
    expect(vm.spec.template.spec.volumes[1]).toEqual({ name: "scratch", emptyDisk: { capacity: "10Gi" } });
  });

  it("attaches a cloud-init disk for hostname and keys", () => {
    const vm = toNativeResource(spec({ hostname: "web-1", sshKeys: ["ssh-ed25519 AAAA"] }), identity);
    const template = vm.spec.template.spec;

    expect(template.domain.devices.disks.at(-1)).toEqual({ name: "cloudinitdisk", disk: { bus: "virtio" } });
    expect(template.volumes.at(-1)).toEqual({
      name: "cloudinitdisk",
      cloudInitNoCloud: { userData: '#cloud-config\nhostname: "web-1"\nssh_authorized_keys:\n  - "ssh-ed25519 AAAA"\n' }
    });
  });

  it("sets the architecture only when given", () => {
    expect(toNativeResource(spec({ architecture: "arm64" }), identity).spec.template.spec.architecture).toBe("arm64");
    expect("architecture" in toNativeResource(spec(), identity).spec.template.spec).toBe(false);
  });

  it("rejects invalid input", () => {
    expect(() => toNativeResource(spec({ vcpu: 0 }), identity)).toThrow("vcpu must be a positive integer");
    expect(() => toNativeResource(spec({ vcpu: 1.5 }), identity)).toThrow(ValidationError);
    expect(() => toNativeResource(spec({ guestOS: "" }), identity)).toThrow("guestOS must not be empty");
    expect(() => toNativeResource(spec({ memory: "lots" }), identity)).toThrow('invalid memory quantity: "lots"');
    expect(() => toNativeResource(spec({ disks: [{ name: "a" }, { name: "a" }] }), identity)).toThrow(
      "duplicate disk name: a"
    );
    expect(() => toNativeResource(spec({ disks: [{ name: "cloudinitdisk" }] }), identity)).toThrow(
      'disk name "cloudinitdisk" is reserved'
    );
    expect(() => toNativeResource(spec({ disks: [{ name: " " }] }), identity)).toThrow("disk name must not be empty");
  });
});

describe("fromNativeResource", () => {
  it("recovers the declared shape of a mapped VM", () => {
    const vm = toNativeResource(
      spec({ vcpu: 4, memory: "1.5Gi", guestOS: "ubuntu", disks: [{ name: "boot" }, { name: "data" }], hostname: "db" }),
      identity
    );

    expect(fromNativeResource(vm)).toEqual({
      vcpu: 4,
      memory: "1536Mi",
      guestOS: "ubuntu",
      disks: [{ name: "boot" }, { name: "data" }]
    });
  });

  it("keeps the architecture", () => {
    const vm = toNativeResource(spec({ architecture: "amd64" }), identity);
    expect(fromNativeResource(vm).architecture).toBe("amd64");
  });

  it("fills defaults for a resource without a template", () => {
    expect(fromNativeResource({ kind: "VirtualMachine", metadata: { name: "bare" }, spec: {} })).toEqual({
      vcpu: 1,
      memory: "1Gi",
      guestOS: "cirros",
      disks: [{ name: "boot" }]
    });
  });
});
