export const PHASES = [
  "Unknown",
  "Pending",
  "Scheduling",
  "Scheduled",
  "Running",
  "Succeeded",
  "Failed",
  "Stopped",
  "Terminating"
] as const;

export type Phase = (typeof PHASES)[number];

/** Status a record holds between creation and the first observed phase. */
export const STATUS_IN_PROGRESS = "IN_PROGRESS";

export type VmRecordStatus = Phase | typeof STATUS_IN_PROGRESS;

export interface VmDiskSpec {
  name: string;
  /** Requested capacity. Not recoverable from the cluster resource. */
  capacity?: string;
}

export interface VmSpec {
  vcpu: number;
  memory: string;
  guestOS: string;
  disks: VmDiskSpec[];
  sshKeys?: string[];
  hostname?: string;
  architecture?: string;
}

export interface VmRecord {
  id: string;
  namespace: string;
  name: string;
  cpu: number;
  memory: string;
  guestOS: string;
  architecture: string;
  hostname: string;
  status: VmRecordStatus;
  createdAt: string;
}

export interface VmEvent {
  vmId: string;
  vmName: string;
  namespace: string;
  phase: Phase;
  timestamp: string;
}

export interface VmView {
  id: string;
  name: string;
  namespace: string;
  path: string;
  status: VmRecordStatus;
  spec: VmSpec;
}

export function isPhase(value: unknown): value is Phase {
  return PHASES.some((phase) => phase === value);
}

export function toRecordStatus(value: unknown): VmRecordStatus {
  if (value === STATUS_IN_PROGRESS) return STATUS_IN_PROGRESS;
  return isPhase(value) ? value : "Unknown";
}
