import type { PublisherStats, VmOperations } from "./interfaces.js";

export interface HealthReport {
  status: "ok";
  events: PublisherStats;
  sessions: number;
}

export interface AppDeps {
  vmService: VmOperations;
  health(): HealthReport;
}
