import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import { VmMonitor } from "../monitor.js";
import { FakePublisher, FakeWatchSource, machineObject } from "./fakes.js";

const VM_ID = "0f8fad5b-d9cb-469f-a165-70867728950e";
const NOW = new Date("2026-01-01T00:00:00.000Z");

function setup() {
  const source = new FakeWatchSource();
  const publisher = new FakePublisher();
  const monitor = new VmMonitor({
    source,
    publisher,
    logger: pino({ level: "silent" }),
    namespace: "default",
    retry: { baseDelayMs: 1, maxDelayMs: 5, jitterRatio: 0 },
    now: () => NOW
  });
  const controller = new AbortController();
  const running = monitor.run(controller.signal);
  return { source, publisher, monitor, controller, running };
}

describe("VmMonitor", () => {
  it("watches every managed VM in the namespace", async () => {
    const { source, controller, running } = setup();

    await vi.waitFor(() => expect(source.streams).toHaveLength(1));
    expect(source.latest().request).toEqual({
      kind: "VirtualMachine",
      namespace: "default",
      labelSelector: "vm-provider.io/managed-by=vm-provider"
    });

    controller.abort();
    await running;
    expect(source.latest().stopped).toBe(true);
  });

  it("publishes phase changes derived from the resource status", async () => {
    const { source, publisher, monitor, controller, running } = setup();
    await vi.waitFor(() => expect(source.streams).toHaveLength(1));
    const stream = source.latest();

    stream.emit({ type: "upsert", object: machineObject(VM_ID, { created: false }) });
    stream.emit({ type: "upsert", object: machineObject(VM_ID, { created: false }) });
    stream.emit({ type: "upsert", object: machineObject(VM_ID, { created: true, ready: true }) });
    stream.emit({ type: "upsert", object: machineObject(VM_ID, {}, { running: false }) });

    await vi.waitFor(() => expect(publisher.events).toHaveLength(3));
    expect(publisher.events.map((e) => e.phase)).toEqual(["Pending", "Running", "Stopped"]);
    expect(publisher.events[0]).toEqual({
      vmId: VM_ID,
      vmName: "vm-0f8fad5b",
      namespace: "default",
      phase: "Pending",
      timestamp: "2026-01-01T00:00:00.000Z"
    });
    expect(monitor.stats().tracked).toBe(1);

    controller.abort();
    await running;
  });

  it("reports a deleted VM as Stopped and forgets it", async () => {
    const { source, publisher, monitor, controller, running } = setup();
    await vi.waitFor(() => expect(source.streams).toHaveLength(1));
    const stream = source.latest();

    stream.emit({ type: "upsert", object: machineObject(VM_ID, { ready: true }) });
    stream.emit({ type: "delete", object: machineObject(VM_ID, { ready: true }) });

    await vi.waitFor(() => expect(publisher.events).toHaveLength(2));
    expect(publisher.events.map((e) => e.phase)).toEqual(["Running", "Stopped"]);
    expect(monitor.stats().tracked).toBe(0);

    controller.abort();
    await running;
  });

  it("ignores VMs without an instance id label", async () => {
    const { source, publisher, monitor, controller, running } = setup();
    await vi.waitFor(() => expect(source.streams).toHaveLength(1));
    const stream = source.latest();

    stream.emit({ type: "upsert", object: machineObject(null, { ready: true }) });
    stream.emit({ type: "upsert", object: machineObject(VM_ID, { ready: true }) });

    await vi.waitFor(() => expect(publisher.events).toHaveLength(1));
    expect(publisher.events[0].vmId).toBe(VM_ID);
    expect(monitor.stats().events).toBe(2);

    controller.abort();
    await running;
  });

  it("keeps running when publishing fails", async () => {
    const { source, publisher, monitor, controller, running } = setup();
    await vi.waitFor(() => expect(source.streams).toHaveLength(1));
    const stream = source.latest();

    publisher.failWith = new Error("not connected");
    stream.emit({ type: "upsert", object: machineObject(VM_ID, { ready: true }) });
    await vi.waitFor(() => expect(monitor.stats().tracked).toBe(1));

    publisher.failWith = null;
    stream.emit({ type: "upsert", object: machineObject(VM_ID, {}, { running: false }) });
    await vi.waitFor(() => expect(publisher.events.map((e) => e.phase)).toEqual(["Stopped"]));

    controller.abort();
    await running;
  });

  it("reopens the watch after the stream ends", async () => {
    const { source, monitor, controller, running } = setup();
    await vi.waitFor(() => expect(source.streams).toHaveLength(1));

    source.latest().close(new Error("stream reset"));

    await vi.waitFor(() => expect(source.streams).toHaveLength(2));
    expect(monitor.stats()).toMatchObject({ reconnects: 1, attempt: 1 });

    controller.abort();
    await running;
  });
});
