import type { VmRow, VmRows } from "../db/index.js";
import type { VmStore } from "../types/interfaces.js";
import { toRecordStatus, type VmRecord } from "../types/vm.js";

export class SqlVmStore implements VmStore {
  constructor(private readonly rows: VmRows) {}

  async create(vm: VmRecord): Promise<void> {
    await this.rows.insert(toRow(vm));
  }

  async update(id: string, patch: Partial<VmRecord>): Promise<void> {
    const changes: Partial<Omit<VmRow, "id">> = {};
    if (patch.namespace !== undefined) changes.namespace = patch.namespace;
    if (patch.name !== undefined) changes.name = patch.name;
    if (patch.cpu !== undefined) changes.cpu = patch.cpu;
    if (patch.memory !== undefined) changes.memory = patch.memory;
    if (patch.guestOS !== undefined) changes.guestOs = patch.guestOS;
    if (patch.architecture !== undefined) changes.architecture = patch.architecture;
    if (patch.hostname !== undefined) changes.hostname = patch.hostname;
    if (patch.status !== undefined) changes.status = patch.status;
    if (patch.createdAt !== undefined) changes.createdAt = patch.createdAt;
    if (Object.keys(changes).length === 0) return;
    await this.rows.updateById(id, changes);
  }

  async get(id: string): Promise<VmRecord | null> {
    const row = await this.rows.findById(id);
    return row ? fromRow(row) : null;
  }

  async list(): Promise<VmRecord[]> {
    const rows = await this.rows.findAll();
    return rows.map(fromRow);
  }

  async delete(id: string): Promise<void> {
    await this.rows.deleteById(id);
  }
}

function toRow(vm: VmRecord): VmRow {
  return {
    id: vm.id,
    namespace: vm.namespace,
    name: vm.name,
    cpu: vm.cpu,
    memory: vm.memory,
    guestOs: vm.guestOS,
    architecture: vm.architecture,
    hostname: vm.hostname,
    status: vm.status,
    createdAt: vm.createdAt
  };
}

function fromRow(row: VmRow): VmRecord {
  return {
    id: row.id,
    namespace: row.namespace,
    name: row.name,
    cpu: Number(row.cpu),
    memory: row.memory,
    guestOS: row.guestOs,
    architecture: row.architecture,
    hostname: row.hostname,
    status: toRecordStatus(row.status),
    createdAt: row.createdAt
  };
}
