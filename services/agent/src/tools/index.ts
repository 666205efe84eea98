import type Database from 'better-sqlite3';
import type { ToolDescriptor } from '../tool-registry.js';
import type { ToolContext } from './define.js';
import { medicationTools } from './medications.js';
import { inventoryTools } from './inventory.js';
import { userTools } from './users.js';
import { prescriptionTools } from './prescriptions.js';
import { storeTools } from './stores.js';

export type { ToolContext } from './define.js';

/** Every pharmacy tool, bound to one database */
export function createPharmacyTools(db: Database.Database, opts: { now?: () => Date } = {}): ToolDescriptor[] {
  const ctx: ToolContext = { db, now: opts.now ?? (() => new Date()) };
  return [
    ...medicationTools(ctx),
    ...userTools(ctx),
    ...inventoryTools(ctx),
    ...prescriptionTools(ctx),
    ...storeTools(ctx),
  ];
}
