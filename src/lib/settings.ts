import type { Database } from './db';

/** Runtime overrides stored in the `settings` table, keyed by name. */
export const ELECTRICITY_PRICE_KEY = 'electricity_price';

export async function getSetting(db: Database, key: string): Promise<string | null> {
  const row = await db.prepare('SELECT value FROM settings WHERE key = ?').bind(key).first<{ value: string | null }>();
  return row?.value ?? null;
}

export async function setSetting(db: Database, key: string, value: string): Promise<void> {
  await db
    .prepare(
      'INSERT INTO settings (key, value, updated_at) VALUES (?, ?, ?) ' +
        'ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at',
    )
    .bind(key, value, new Date().toISOString())
    .run();
}

/** Stored number for `key`; unset, unparsable or below `min` values give `fallback`. */
export async function getNum(
  db: Database,
  key: string,
  fallback: number,
  { min = Number.NEGATIVE_INFINITY }: { min?: number } = {},
): Promise<number> {
  const raw = await getSetting(db, key);
  if (raw == null || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}
