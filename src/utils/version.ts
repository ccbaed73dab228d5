import type { Database } from '../lib/db';

const REQUIRED_TABLES = ['metrics', 'settings'] as const;

export const SERVICE_VERSION = '0.1.0';

export async function getVersion(DB: Database) {
  const schema = await DB.prepare(
    "SELECT name FROM sqlite_master WHERE type='table' AND name IN ('metrics','settings')",
  ).all<{ name: string }>();
  const present = new Set(schema.results.map((row) => row.name));

  return {
    version: SERVICE_VERSION,
    node: process.version,
    schema_ok: REQUIRED_TABLES.every((name) => present.has(name)),
    tables_present: Array.from(present).sort(),
  };
}
