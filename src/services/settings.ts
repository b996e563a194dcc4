import { eq } from 'drizzle-orm';
import { settings } from '../db/schema.js';
import type { CatalogDb } from '../db/client.js';
import type { CatalogKind } from '../rotation/types.js';

export function getSetting(db: CatalogDb, key: string): unknown {
  return db.select().from(settings).where(eq(settings.key, key)).get()?.value;
}

export function setSetting(db: CatalogDb, key: string, value: unknown): void {
  db.insert(settings)
    .values({ key, value, updatedAt: new Date() })
    .onConflictDoUpdate({ target: settings.key, set: { value, updatedAt: new Date() } })
    .run();
}

const CURRENT_MODE_KEY = 'currentMode';

/** Last catalog chosen through `video` / `picture`; `next` rotates it. */
export function getCurrentMode(db: CatalogDb): CatalogKind {
  return getSetting(db, CURRENT_MODE_KEY) === 'image' ? 'image' : 'video';
}

export function setCurrentMode(db: CatalogDb, mode: CatalogKind): void {
  setSetting(db, CURRENT_MODE_KEY, mode);
}
