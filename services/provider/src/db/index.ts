import Database from "better-sqlite3";
import pg from "pg";
import { eq } from "drizzle-orm";
import { drizzle as drizzleSqlite } from "drizzle-orm/better-sqlite3";
import { drizzle as drizzlePg } from "drizzle-orm/node-postgres";
import fs from "node:fs";
import path from "node:path";

import * as sqliteSchema from "./schema.sqlite.js";
import * as pgSchema from "./schema.pg.js";
import { VMS_TABLE_DDL } from "./migrate.js";

export type DbDialect = "sqlite" | "postgres";

export type VmRow = typeof sqliteSchema.vms.$inferSelect;

/** Dialect-independent access to the vms table. */
export interface VmRows {
  insert(row: VmRow): Promise<void>;
  findById(id: string): Promise<VmRow | undefined>;
  findAll(): Promise<VmRow[]>;
  updateById(id: string, patch: Partial<Omit<VmRow, "id">>): Promise<void>;
  deleteById(id: string): Promise<void>;
}

export interface DbHandle {
  dialect: DbDialect;
  vms: VmRows;
  ensureSchema(): Promise<void>;
  close(): Promise<void>;
}

export function createDb(input: { dialect: DbDialect; sqlitePath: string; databaseUrl?: string }): DbHandle {
  if (input.dialect === "sqlite") {
    const dir = path.dirname(input.sqlitePath);
    if (dir && dir !== ".") {
      fs.mkdirSync(dir, { recursive: true });
    }
    const sqlite = new Database(input.sqlitePath);
    const db = drizzleSqlite(sqlite, { schema: sqliteSchema });
    const { vms } = sqliteSchema;
    return {
      dialect: input.dialect,
      vms: {
        insert: async (row) => {
          await db.insert(vms).values(row);
        },
        findById: async (id) => (await db.select().from(vms).where(eq(vms.id, id)).limit(1))[0],
        findAll: async () => db.select().from(vms),
        updateById: async (id, patch) => {
          await db.update(vms).set(patch).where(eq(vms.id, id));
        },
        deleteById: async (id) => {
          await db.delete(vms).where(eq(vms.id, id));
        }
      },
      ensureSchema: async () => {
        sqlite.exec(VMS_TABLE_DDL);
      },
      close: async () => {
        sqlite.close();
      }
    };
  }

  const { Pool } = pg;
  const pool = new Pool({ connectionString: input.databaseUrl });
  const db = drizzlePg(pool, { schema: pgSchema });
  const { vms } = pgSchema;
  return {
    dialect: input.dialect,
    vms: {
      insert: async (row) => {
        await db.insert(vms).values(row);
      },
      findById: async (id) => (await db.select().from(vms).where(eq(vms.id, id)).limit(1))[0],
      findAll: async () => db.select().from(vms),
      updateById: async (id, patch) => {
        await db.update(vms).set(patch).where(eq(vms.id, id));
      },
      deleteById: async (id) => {
        await db.delete(vms).where(eq(vms.id, id));
      }
    },
    ensureSchema: async () => {
      await pool.query(VMS_TABLE_DDL);
    },
    close: async () => {
      await pool.end();
    }
  };
}
