/** Shared by both dialects; only portable column types are used. */
export const VMS_TABLE_DDL = `
CREATE TABLE IF NOT EXISTS vms (
  id TEXT PRIMARY KEY,
  namespace TEXT NOT NULL,
  name TEXT NOT NULL,
  cpu INTEGER NOT NULL,
  memory TEXT NOT NULL,
  guest_os TEXT NOT NULL,
  architecture TEXT NOT NULL,
  hostname TEXT NOT NULL,
  status TEXT NOT NULL,
  created_at TEXT NOT NULL
)`;
