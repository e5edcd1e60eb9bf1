import type { Phase } from "../types/vm.js";
import { isPhase } from "../types/vm.js";
import { isRecord, readArray, readBoolean, readPath, readString, type KubeObject } from "./resource.js";

export interface StatusCondition {
  type: string;
  status: string;
}

/** Status as reported by either watched kind, resolved once at the watch boundary. */
export type RawStatus =
  | { kind: "instance"; phase?: string }
  | { kind: "resource"; running?: boolean; ready?: boolean; created?: boolean; conditions: StatusCondition[] };

const INSTANCE_PHASES: ReadonlySet<Phase> = new Set<Phase>([
  "Pending",
  "Scheduling",
  "Scheduled",
  "Running",
  "Succeeded",
  "Failed",
  "Unknown"
]);

const TERMINAL_PHASES: ReadonlySet<Phase> = new Set<Phase>(["Succeeded", "Failed", "Stopped"]);

const FAILURE_CONDITIONS = new Set(["Failure", "Failed"]);

function derivePhaseFromConditions(conditions: StatusCondition[]): Phase {
  let failed = false;
  let ready = false;
  for (const c of conditions) {
    if (c.status !== "True") continue;
    if (c.type === "Paused") return "Stopped";
    if (FAILURE_CONDITIONS.has(c.type)) failed = true;
    if (c.type === "Ready") ready = true;
  }
  if (failed) return "Failed";
  if (ready) return "Running";
  return "Unknown";
}

export function derivePhase(raw: RawStatus): Phase {
  if (raw.kind === "instance") {
    if (raw.phase === undefined) return "Pending";
    return isPhase(raw.phase) && INSTANCE_PHASES.has(raw.phase) ? raw.phase : "Unknown";
  }
  if (raw.running === false) return "Stopped";
  if (raw.ready === true) return "Running";
  if (raw.created === false) return "Pending";
  return derivePhaseFromConditions(raw.conditions);
}

/** A resource that no longer exists is reported as stopped. */
export function phaseForDeletion(): Phase {
  return "Stopped";
}

export function isTerminalPhase(phase: Phase): boolean {
  return TERMINAL_PHASES.has(phase);
}

function readConditions(status: unknown): StatusCondition[] {
  const conditions: StatusCondition[] = [];
  for (const item of readArray(status, "conditions")) {
    if (!isRecord(item)) continue;
    if (typeof item.type === "string" && typeof item.status === "string") {
      conditions.push({ type: item.type, status: item.status });
    }
  }
  return conditions;
}

/** Returns null for kinds the normalizer does not understand. */
export function rawStatusOf(obj: KubeObject): RawStatus | null {
  switch (obj.kind) {
    case "VirtualMachineInstance":
      return { kind: "instance", phase: readString(obj.status, "phase") };
    case "VirtualMachine": {
      let running = readBoolean(obj.spec, "running");
      if (running === undefined && readPath(obj.spec, "runStrategy") === "Halted") {
        running = false;
      }
      return {
        kind: "resource",
        running,
        ready: readBoolean(obj.status, "ready"),
        created: readBoolean(obj.status, "created"),
        conditions: readConditions(obj.status)
      };
    }
    default:
      return null;
  }
}
