import type { VmRecord } from "../types/vm.js";
import type { VmStore } from "../types/interfaces.js";

/** Process-local store. Records are copied in and out so callers never share state with it. */
export class InMemoryVmStore implements VmStore {
  private readonly records = new Map<string, VmRecord>();

  async create(vm: VmRecord): Promise<void> {
    if (this.records.has(vm.id)) {
      throw new Error(`vm record ${vm.id} already exists`);
    }
    this.records.set(vm.id, { ...vm });
  }

  async update(id: string, patch: Partial<VmRecord>): Promise<void> {
    const current = this.records.get(id);
    if (!current) return;
    this.records.set(id, { ...current, ...patch, id });
  }

  async get(id: string): Promise<VmRecord | null> {
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async list(): Promise<VmRecord[]> {
    return Array.from(this.records.values(), (r) => ({ ...r }));
  }

  async delete(id: string): Promise<void> {
    this.records.delete(id);
  }
}
