import { z } from 'zod';
import type { ToolDescriptor } from '../tool-registry.js';
import { defineTool, optFlag, optIds, optText, placeholders, reqText, type ToolContext } from './define.js';
import { displayName, lookupMedication, type MedicationRow } from './medications.js';

function stockStatus(quantity: number): 'in_stock' | 'out_of_stock' {
  return quantity > 0 ? 'in_stock' : 'out_of_stock';
}

export function inventoryTools(ctx: ToolContext): ToolDescriptor[] {
  const checkStockAvailability = defineTool({
    name: 'check_stock_availability',
    description: 'Check the stock quantity of one medication in one store.',
    properties: {
      med_id: { type: 'string', description: "Medication id, e.g. 'MED002'" },
      store_id: { type: 'string', description: "Store id, e.g. 'STORE_TLV_01'" },
    },
    required: ['med_id', 'store_id'],
    args: z.object({ med_id: reqText, store_id: reqText }),
    run: ({ med_id, store_id }) => {
      const row = ctx.db
        .prepare<[string, string], { quantity: number; last_updated: string }>(
          'SELECT quantity, last_updated FROM inventory WHERE med_id = ? AND store_id = ?',
        )
        .get(med_id, store_id);
      if (!row) {
        return { error: 'NOT_FOUND', med_id, store_id };
      }
      return {
        med_id,
        store_id,
        quantity: row.quantity,
        status: stockStatus(row.quantity),
        last_updated: row.last_updated,
      };
    },
  });

  const queryStockMultipleStores = defineTool({
    name: 'query_stock_multiple_stores',
    description:
      'Stock of one medication across several (or all) stores in a single call. Identify the medication by ' +
      'med_id or by name. Prefer this over repeated check_stock_availability calls.',
    properties: {
      med_id: { type: 'string', description: 'Medication id, if known' },
      med_name: { type: 'string', description: 'Medication name; resolved to an id' },
      store_ids: { type: 'array', items: { type: 'string' }, description: 'Stores to check; all when omitted' },
      in_stock_only: { type: 'boolean', description: 'Only stores that have it in stock' },
    },
    args: z.object({ med_id: optText, med_name: optText, store_ids: optIds, in_stock_only: optFlag }),
    run: (args) => {
      let medId = args.med_id ?? undefined;
      if (!medId && args.med_name) {
        const lookup = lookupMedication(ctx, args.med_name);
        if (!lookup.found) {
          return { error: 'MEDICATION_NOT_FOUND', med_name: args.med_name, message: 'Medication not found in catalog' };
        }
        medId = lookup.med.med_id;
      }
      if (!medId) {
        return { error: 'MISSING_PARAMETER', message: 'Either med_id or med_name must be provided' };
      }

      const conditions = ['i.med_id = ?'];
      const params: string[] = [medId];
      if (args.store_ids && args.store_ids.length > 0) {
        conditions.push(`i.store_id IN (${placeholders(args.store_ids.length)})`);
        params.push(...args.store_ids);
      }
      if (args.in_stock_only) {
        conditions.push('i.quantity > 0');
      }

      const rows = ctx.db
        .prepare<string[], { store_id: string; store_name: string | null; city: string | null; quantity: number; last_updated: string }>(
          `SELECT i.store_id, s.name AS store_name, s.city, i.quantity, i.last_updated
           FROM inventory i
           LEFT JOIN stores s ON s.store_id = i.store_id
           WHERE ${conditions.join(' AND ')}
           ORDER BY s.city, s.name`,
        )
        .all(...params);

      const med = ctx.db
        .prepare<[string], Pick<MedicationRow, 'brand_name' | 'generic_name'>>(
          'SELECT brand_name, generic_name FROM medications WHERE med_id = ?',
        )
        .get(medId);

      return {
        med_id: medId,
        med_name: med ? displayName(med) : null,
        count: rows.length,
        stock: rows.map((r) => ({
          store_id: r.store_id,
          store_name: r.store_name,
          city: r.city,
          quantity: r.quantity,
          status: stockStatus(r.quantity),
          last_updated: r.last_updated,
        })),
      };
    },
  });

  return [checkStockAvailability, queryStockMultipleStores];
}
