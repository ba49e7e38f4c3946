import { eq } from "drizzle-orm";
import type { DbExecutor } from "../db";
import { settings } from "../db/schema";

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);

export function getSetting(db: DbExecutor, key: string): string | null;
export function getSetting(db: DbExecutor, key: string, fallback: string): string;
export function getSetting(
  db: DbExecutor,
  key: string,
  fallback: string | null = null,
): string | null {
  const row = db.select({ value: settings.value }).from(settings).where(eq(settings.key, key)).get();
  return row?.value ?? fallback;
}

export function getBoolSetting(db: DbExecutor, key: string, fallback = false): boolean {
  const value = getSetting(db, key);
  return value === null ? fallback : TRUE_VALUES.has(value.trim().toLowerCase());
}

export function setSetting(db: DbExecutor, key: string, value: string | boolean | number): void {
  const stored = String(value);
  db.insert(settings)
    .values({ key, value: stored })
    .onConflictDoUpdate({ target: settings.key, set: { value: stored } })
    .run();
}

export function listSettings(db: DbExecutor): Record<string, string> {
  const entries = db.select().from(settings).all();
  return Object.fromEntries(entries.map((row) => [row.key, row.value]));
}
