import { z } from 'zod';
import type { ToolResult } from '@rxdesk/shared';
import type { ToolDescriptor } from '../tool-registry.js';
import { defineTool, like, LIKE, optFlag, optIds, optLimit, optText, placeholders, reqText, type ToolContext } from './define.js';
import { similarity } from './fuzzy.js';

const FUZZY_THRESHOLD = 0.3;
const MAX_CANDIDATES = 5;

export interface MedicationRow {
  med_id: string;
  brand_name: string;
  generic_name: string;
  active_ingredients: string;
  form: string | null;
  strength: string | null;
  rx_required: number;
  standard_directions: string | null;
  warnings: string | null;
  contraindications: string | null;
}

type MedicationSummaryRow = Pick<
  MedicationRow,
  'med_id' | 'brand_name' | 'generic_name' | 'active_ingredients' | 'form' | 'strength' | 'rx_required'
>;

const SUMMARY_COLUMNS = 'm.med_id, m.brand_name, m.generic_name, m.active_ingredients, m.form, m.strength, m.rx_required';

function summary(row: MedicationSummaryRow) {
  return {
    med_id: row.med_id,
    brand_name: row.brand_name,
    generic_name: row.generic_name,
    active_ingredients: row.active_ingredients,
    form: row.form,
    strength: row.strength,
    rx_required: row.rx_required === 1,
  };
}

export function displayName(row: Pick<MedicationRow, 'brand_name' | 'generic_name'>): string {
  return `${row.brand_name} (${row.generic_name})`;
}

// ---------------------------------------------------------------------------
// Lookup by name
// ---------------------------------------------------------------------------

export type MedicationLookup =
  | { found: true; med: MedicationRow }
  | { found: false; result: ToolResult };

function fuzzyCandidates(ctx: ToolContext, name: string) {
  const rows = ctx.db
    .prepare<[], Pick<MedicationRow, 'med_id' | 'brand_name' | 'generic_name'>>(
      'SELECT med_id, brand_name, generic_name FROM medications',
    )
    .all();

  return rows
    .map((r) => ({
      med_id: r.med_id,
      brand: r.brand_name,
      generic: r.generic_name,
      score: Math.max(similarity(r.brand_name, name), similarity(r.generic_name, name)),
    }))
    .filter((c) => c.score > FUZZY_THRESHOLD)
    .sort((a, b) => b.score - a.score)
    .slice(0, MAX_CANDIDATES);
}

/** Substring match on brand, generic or ingredient; falls back to trigram candidates */
export function lookupMedication(ctx: ToolContext, name: string): MedicationLookup {
  const pattern = like(name);
  const rows = ctx.db
    .prepare<[string, string, string], MedicationRow>(
      `SELECT * FROM medications
       WHERE brand_name ${LIKE} OR generic_name ${LIKE} OR active_ingredients ${LIKE}
       ORDER BY med_id`,
    )
    .all(pattern, pattern, pattern);

  if (rows.length === 1) {
    return { found: true, med: rows[0] };
  }

  if (rows.length > 1) {
    return {
      found: false,
      result: {
        found: false,
        ambiguous: true,
        candidates: rows
          .slice(0, MAX_CANDIDATES)
          .map((r) => ({ med_id: r.med_id, brand: r.brand_name, generic: r.generic_name })),
      },
    };
  }

  const fuzzy = fuzzyCandidates(ctx, name);
  if (fuzzy.length > 0) {
    return {
      found: false,
      result: { found: false, ambiguous: true, fuzzy: true, input_name: name, candidates: fuzzy },
    };
  }
  return { found: false, result: { found: false, candidates: [], input_name: name } };
}

function medicationDetails(row: MedicationRow) {
  return {
    med_id: row.med_id,
    brand_name: row.brand_name,
    generic_name: row.generic_name,
    active_ingredients: row.active_ingredients ? row.active_ingredients.split(/,\s*/) : [],
    form: row.form,
    strength: row.strength,
    rx_required: row.rx_required === 1,
    standard_directions: row.standard_directions ?? '',
    warnings: row.warnings ? [row.warnings] : [],
    contraindications: row.contraindications ? [row.contraindications] : [],
    source: 'Synthetic internal pharmacy catalog',
  };
}

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

export function medicationTools(ctx: ToolContext): ToolDescriptor[] {
  const getMedicationByName = defineTool({
    name: 'get_medication_by_name',
    description:
      'Fetch full details of one medication by brand name, generic name or active ingredient. Tolerates typos ' +
      'and suggests close matches. If it returns found: false the medication is not in the catalog; do not ' +
      'describe it from general knowledge, use list_medications to find alternatives instead.',
    properties: {
      name: { type: 'string', description: 'Medication name (brand, generic or active ingredient)' },
    },
    required: ['name'],
    args: z.object({ name: reqText }),
    run: ({ name }) => {
      const lookup = lookupMedication(ctx, name);
      return lookup.found ? { found: true, med: medicationDetails(lookup.med) } : lookup.result;
    },
  });

  const listMedications = defineTool({
    name: 'list_medications',
    description:
      'List or search the catalog. Use it to browse, when unsure of the exact name, or to suggest alternatives ' +
      'when a medication is not found. Brand-name matches come first.',
    properties: {
      search_term: { type: 'string', description: 'Filter on brand name, generic name or active ingredients' },
      limit: { type: 'integer', description: 'Maximum number of results (default 20)' },
    },
    args: z.object({ search_term: optText, limit: optLimit }),
    run: ({ search_term, limit }) => {
      const max = limit ?? 20;
      let rows: MedicationSummaryRow[];
      if (search_term) {
        const p = like(search_term);
        rows = ctx.db
          .prepare<[string, string, string, string, string, number], MedicationSummaryRow>(
            `SELECT ${SUMMARY_COLUMNS} FROM medications m
             WHERE m.brand_name ${LIKE} OR m.generic_name ${LIKE} OR m.active_ingredients ${LIKE}
             ORDER BY
               CASE WHEN m.brand_name ${LIKE} THEN 1 WHEN m.generic_name ${LIKE} THEN 2 ELSE 3 END,
               m.brand_name
             LIMIT ?`,
          )
          .all(p, p, p, p, p, max);
      } else {
        rows = ctx.db
          .prepare<[number], MedicationSummaryRow>(`SELECT ${SUMMARY_COLUMNS} FROM medications m ORDER BY m.brand_name LIMIT ?`)
          .all(max);
      }
      return { count: rows.length, medications: rows.map(summary) };
    },
  });

  const queryMedicationsFlexible = defineTool({
    name: 'query_medications_flexible',
    description:
      'Medication query combining optional filters with AND, e.g. "tablets containing paracetamol that need no ' +
      'prescription".',
    properties: {
      brand_name: { type: 'string', description: 'Brand name (partial match)' },
      generic_name: { type: 'string', description: 'Generic name (partial match)' },
      active_ingredient: { type: 'string', description: 'Active ingredient (partial match)' },
      form: { type: 'string', description: "Form, e.g. 'tablet', 'liquid', 'capsule'" },
      strength: { type: 'string', description: "Strength, e.g. '500 mg'" },
      rx_required: { type: 'boolean', description: 'true = prescription only, false = over the counter' },
      limit: { type: 'integer', description: 'Maximum number of results (default 20)' },
    },
    args: z.object({
      brand_name: optText,
      generic_name: optText,
      active_ingredient: optText,
      form: optText,
      strength: optText,
      rx_required: optFlag,
      limit: optLimit,
    }),
    run: (args) => {
      const conditions: string[] = [];
      const params: Array<string | number> = [];
      const textFilters: Array<[string, string | null | undefined]> = [
        ['m.brand_name', args.brand_name],
        ['m.generic_name', args.generic_name],
        ['m.active_ingredients', args.active_ingredient],
        ['m.form', args.form],
        ['m.strength', args.strength],
      ];
      for (const [column, value] of textFilters) {
        if (!value) continue;
        conditions.push(`${column} ${LIKE}`);
        params.push(like(value));
      }
      if (args.rx_required !== undefined && args.rx_required !== null) {
        conditions.push('m.rx_required = ?');
        params.push(args.rx_required ? 1 : 0);
      }

      const where = conditions.length > 0 ? conditions.join(' AND ') : '1=1';
      const rows = ctx.db
        .prepare<Array<string | number>, MedicationSummaryRow>(
          `SELECT ${SUMMARY_COLUMNS} FROM medications m WHERE ${where} ORDER BY m.brand_name LIMIT ?`,
        )
        .all(...params, args.limit ?? 20);
      return { count: rows.length, medications: rows.map(summary) };
    },
  });

  const queryMedicationsWithStock = defineTool({
    name: 'query_medications_with_stock',
    description:
      'Search medications and report their stock per store in one call. Prefer this over calling ' +
      'get_medication_by_name and check_stock_availability separately.',
    properties: {
      search_term: { type: 'string', description: 'Brand name, generic name or active ingredient' },
      active_ingredient: { type: 'string', description: 'Active ingredient filter' },
      form: { type: 'string', description: "Form filter, e.g. 'tablet'" },
      rx_required: { type: 'boolean', description: 'Prescription requirement filter' },
      store_ids: {
        type: 'array',
        items: { type: 'string' },
        description: "Stores to check, e.g. ['STORE_TLV_01']. All stores when omitted.",
      },
      in_stock_only: { type: 'boolean', description: 'Only report stores (and medications) with stock' },
      limit: { type: 'integer', description: 'Maximum number of medications (default 20)' },
    },
    args: z.object({
      search_term: optText,
      active_ingredient: optText,
      form: optText,
      rx_required: optFlag,
      store_ids: optIds,
      in_stock_only: optFlag,
      limit: optLimit,
    }),
    run: (args) => {
      const joinParams: string[] = [];
      let join = 'LEFT JOIN inventory i ON i.med_id = m.med_id';
      if (args.store_ids && args.store_ids.length > 0) {
        join += ` AND i.store_id IN (${placeholders(args.store_ids.length)})`;
        joinParams.push(...args.store_ids);
      }

      const conditions: string[] = [];
      const params: Array<string | number> = [];
      if (args.search_term) {
        const p = like(args.search_term);
        conditions.push(`(m.brand_name ${LIKE} OR m.generic_name ${LIKE} OR m.active_ingredients ${LIKE})`);
        params.push(p, p, p);
      }
      if (args.active_ingredient) {
        conditions.push(`m.active_ingredients ${LIKE}`);
        params.push(like(args.active_ingredient));
      }
      if (args.form) {
        conditions.push(`m.form ${LIKE}`);
        params.push(like(args.form));
      }
      if (args.rx_required !== undefined && args.rx_required !== null) {
        conditions.push('m.rx_required = ?');
        params.push(args.rx_required ? 1 : 0);
      }
      if (args.in_stock_only) {
        conditions.push('i.quantity > 0');
      }
      const where = conditions.length > 0 ? conditions.join(' AND ') : '1=1';

      type Row = MedicationSummaryRow & { store_id: string | null; quantity: number | null };
      const rows = ctx.db
        .prepare<Array<string | number>, Row>(
          `SELECT ${SUMMARY_COLUMNS}, i.store_id, i.quantity
           FROM medications m ${join}
           WHERE ${where}
           ORDER BY m.brand_name, i.store_id`,
        )
        .all(...joinParams, ...params);

      const meds = new Map<string, ReturnType<typeof summary> & { stock: Array<Record<string, unknown>> }>();
      for (const row of rows) {
        let med = meds.get(row.med_id);
        if (!med) {
          if (meds.size >= (args.limit ?? 20)) continue;
          med = { ...summary(row), stock: [] };
          meds.set(row.med_id, med);
        }
        if (row.store_id !== null) {
          const quantity = row.quantity ?? 0;
          med.stock.push({ store_id: row.store_id, quantity, status: quantity > 0 ? 'in_stock' : 'out_of_stock' });
        }
      }

      return { count: meds.size, medications: [...meds.values()] };
    },
  });

  return [getMedicationByName, listMedications, queryMedicationsFlexible, queryMedicationsWithStock];
}
