import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core";

export const vms = sqliteTable("vms", {
  id: text("id").primaryKey(),
  namespace: text("namespace").notNull(),
  name: text("name").notNull(),
  cpu: integer("cpu").notNull(),
  // Canonical quantity string, e.g. "2Gi".
  memory: text("memory").notNull(),
  guestOs: text("guest_os").notNull(),
  architecture: text("architecture").notNull(),
  hostname: text("hostname").notNull(),
  status: text("status").notNull(),
  createdAt: text("created_at").notNull()
});
