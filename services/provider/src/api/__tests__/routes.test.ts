import pino from "pino";
import { describe, expect, it } from "vitest";
import { buildApp } from "../../app.js";
import { ValidationError } from "../../kubevirt/errors.js";
import type { CreateVmResult, VmOperations } from "../../types/interfaces.js";
import type { VmSpec, VmView } from "../../types/vm.js";
import { HttpError } from "../httpErrors.js";

const VM_ID = "0f8fad5b-d9cb-469f-a165-70867728950e";

function view(overrides: Partial<VmView> = {}): VmView {
  return {
    id: VM_ID,
    name: "vm-0f8fad5b",
    namespace: "default",
    path: `vms/${VM_ID}`,
    status: "IN_PROGRESS",
    spec: { vcpu: 2, memory: "2Gi", guestOS: "fedora", disks: [{ name: "boot" }] },
    ...overrides
  };
}

class FakeVmService implements VmOperations {
  public listResult: VmView[] = [];
  public createCalls: Array<{ spec: VmSpec; id?: string }> = [];
  public deleted: string[] = [];
  public createResult: CreateVmResult = { vm: view(), created: true };
  public createError: Error | null = null;

  async list() {
    return this.listResult;
  }

  async get(id: string) {
    const vm = this.listResult.find((v) => v.id === id);
    if (!vm) throw new HttpError(404, "VM not found");
    return vm;
  }

  async create(spec: VmSpec, options: { id?: string } = {}) {
    this.createCalls.push({ spec, id: options.id });
    if (this.createError) throw this.createError;
    return this.createResult;
  }

  async delete(id: string) {
    if (!this.listResult.some((v) => v.id === id)) throw new HttpError(404, "VM not found");
    this.deleted.push(id);
  }
}

const apiKey = "test-key";
const headers = { "x-api-key": apiKey };

function buildTestApp(service: FakeVmService) {
  return buildApp({
    apiKey,
    logger: pino({ level: "silent" }),
    deps: {
      vmService: service,
      health: () => ({ status: "ok", events: { connected: true, published: 3, failed: 0 }, sessions: 2 })
    }
  });
}

describe("provider API", () => {
  it("rejects missing API key", async () => {
    const app = buildTestApp(new FakeVmService());
    const res = await app.inject({ method: "GET", url: "/api/v1alpha1/vms" });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ message: "Unauthorized" });
  });

  it("rejects a wrong API key", async () => {
    const app = buildTestApp(new FakeVmService());
    const res = await app.inject({ method: "GET", url: "/api/v1alpha1/vms", headers: { "x-api-key": "other-key" } });
    expect(res.statusCode).toBe(401);
  });

  it("serves health without an API key", async () => {
    const app = buildTestApp(new FakeVmService());
    const res = await app.inject({ method: "GET", url: "/api/v1alpha1/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok", events: { connected: true, published: 3, failed: 0 }, sessions: 2 });
  });

  it("lists VMs", async () => {
    const service = new FakeVmService();
    service.listResult = [view({ status: "Running" })];
    const app = buildTestApp(service);

    const res = await app.inject({ method: "GET", url: "/api/v1alpha1/vms", headers });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toHaveLength(1);
    expect(body[0].status).toBe("Running");
    expect(body[0].spec.guestOS).toBe("fedora");
  });

  it("returns 404 for missing VM", async () => {
    const app = buildTestApp(new FakeVmService());
    const res = await app.inject({ method: "GET", url: "/api/v1alpha1/vms/missing", headers });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ message: "VM not found" });
  });

  it("creates a VM and defaults disks to an empty list", async () => {
    const service = new FakeVmService();
    const app = buildTestApp(service);

    const res = await app.inject({
      method: "POST",
      url: "/api/v1alpha1/vms",
      headers,
      payload: { vcpu: 2, memory: "2Gi", guestOS: "fedora" }
    });

    expect(res.statusCode).toBe(201);
    expect(res.json().id).toBe(VM_ID);
    expect(service.createCalls).toEqual([{ spec: { vcpu: 2, memory: "2Gi", guestOS: "fedora", disks: [] }, id: undefined }]);
  });

  it("passes the requested id through and answers 200 when the VM already exists", async () => {
    const service = new FakeVmService();
    service.createResult = { vm: view({ status: "Running" }), created: false };
    const app = buildTestApp(service);

    const res = await app.inject({
      method: "POST",
      url: `/api/v1alpha1/vms?id=${VM_ID}`,
      headers,
      payload: { vcpu: 2, memory: "2Gi", guestOS: "fedora", disks: [{ name: "boot" }] }
    });

    expect(res.statusCode).toBe(200);
    expect(service.createCalls[0].id).toBe(VM_ID);
  });

  it("rejects a body that fails schema validation", async () => {
    const service = new FakeVmService();
    const app = buildTestApp(service);

    const res = await app.inject({
      method: "POST",
      url: "/api/v1alpha1/vms",
      headers,
      payload: { vcpu: 0, memory: "2Gi", guestOS: "fedora" }
    });

    expect(res.statusCode).toBe(400);
    expect(service.createCalls).toHaveLength(0);
  });

  it("maps mapper validation errors to 400", async () => {
    const service = new FakeVmService();
    service.createError = new ValidationError('invalid memory quantity: "abc"');
    const app = buildTestApp(service);

    const res = await app.inject({
      method: "POST",
      url: "/api/v1alpha1/vms",
      headers,
      payload: { vcpu: 1, memory: "abc", guestOS: "cirros" }
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ message: 'invalid memory quantity: "abc"' });
  });

  it("masks unexpected failures", async () => {
    const service = new FakeVmService();
    service.createError = new Error("connection refused to 10.0.0.1");
    const app = buildTestApp(service);

    const res = await app.inject({
      method: "POST",
      url: "/api/v1alpha1/vms",
      headers,
      payload: { vcpu: 1, memory: "1Gi", guestOS: "cirros" }
    });

    expect(res.statusCode).toBe(500);
    expect(res.json().message).toBe("Internal Server Error");
  });

  it("deletes a VM", async () => {
    const service = new FakeVmService();
    service.listResult = [view()];
    const app = buildTestApp(service);

    const res = await app.inject({ method: "DELETE", url: `/api/v1alpha1/vms/${VM_ID}`, headers });

    expect(res.statusCode).toBe(204);
    expect(service.deleted).toEqual([VM_ID]);
  });
});
