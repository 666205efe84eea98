import { z } from 'zod';
import { logger } from '@rxdesk/shared';
import type { ToolDescriptor } from '../tool-registry.js';
import { defineTool, isoDate, optFlag, optLimit, optText, reqText, type ToolContext } from './define.js';
import { displayName, lookupMedication } from './medications.js';

const log = logger.child({ module: 'prescription-tools' });

const REFILL_ETA_HOURS = 4;

interface PrescriptionRow {
  prescription_id: string;
  user_id: string;
  med_id: string;
  directions: string | null;
  refills_remaining: number;
  expires_at: string;
}

type PrescriptionWithMed = PrescriptionRow & { brand_name: string; generic_name: string; rx_required: number };

/** 20260105093000123 style stamp, UTC, millisecond precision */
function refillStamp(d: Date): string {
  return d.toISOString().replace(/[-:TZ.]/g, '');
}

export function prescriptionTools(ctx: ToolContext): ToolDescriptor[] {
  const listUserPrescriptions = defineTool({
    name: 'list_user_prescriptions',
    description: "List a customer's prescriptions (for refill workflows).",
    properties: { user_id: { type: 'string' } },
    required: ['user_id'],
    args: z.object({ user_id: reqText }),
    run: ({ user_id }) => {
      const rows = ctx.db
        .prepare<[string], PrescriptionWithMed>(
          `SELECT p.*, m.brand_name, m.generic_name, m.rx_required
           FROM prescriptions p
           JOIN medications m ON m.med_id = p.med_id
           WHERE p.user_id = ?
           ORDER BY p.prescription_id`,
        )
        .all(user_id);
      return {
        user_id,
        prescriptions: rows.map((r) => ({
          prescription_id: r.prescription_id,
          med_id: r.med_id,
          med_name: displayName(r),
          directions: r.directions,
          refills_remaining: r.refills_remaining,
          expires_at: r.expires_at,
          rx_required: r.rx_required === 1,
        })),
      };
    },
  });

  const submitRefill = ctx.db.transaction((id: string, rx: PrescriptionRow, createdAt: string) => {
    ctx.db
      .prepare<[string, string, string, string]>(
        `INSERT INTO refill_requests (refill_request_id, prescription_id, user_id, status, created_at)
         VALUES (?, ?, ?, 'submitted', ?)`,
      )
      .run(id, rx.prescription_id, rx.user_id, createdAt);
    ctx.db
      .prepare<[string]>('UPDATE prescriptions SET refills_remaining = refills_remaining - 1 WHERE prescription_id = ?')
      .run(rx.prescription_id);
  });

  const requestPrescriptionRefill = defineTool({
    name: 'request_prescription_refill',
    description: "Submit a refill request for one of the customer's prescriptions.",
    properties: {
      user_id: { type: 'string' },
      prescription_id: { type: 'string' },
    },
    required: ['user_id', 'prescription_id'],
    args: z.object({ user_id: reqText, prescription_id: reqText }),
    run: ({ user_id, prescription_id }) => {
      const rx = ctx.db
        .prepare<[string], PrescriptionRow>('SELECT * FROM prescriptions WHERE prescription_id = ?')
        .get(prescription_id);
      if (!rx) return { accepted: false, error: 'NOT_FOUND' };
      if (rx.user_id !== user_id) return { accepted: false, error: 'UNAUTHORIZED' };
      if (rx.refills_remaining <= 0) return { accepted: false, error: 'NO_REFILLS' };

      const now = ctx.now();
      if (rx.expires_at < isoDate(now)) return { accepted: false, error: 'EXPIRED' };

      const refillId = `RR-${refillStamp(now)}-${prescription_id}`;
      submitRefill(refillId, rx, now.toISOString());
      log.info({ refillId, prescriptionId: prescription_id }, 'refill request submitted');
      return { accepted: true, refill_request_id: refillId, status: 'submitted', eta_hours: REFILL_ETA_HOURS };
    },
  });

  const queryPrescriptionsFlexible = defineTool({
    name: 'query_prescriptions_flexible',
    description:
      'Prescription query with optional filters: customer, medication, expiring within N days, refills left. ' +
      'Each result carries a status of active, expired or no_refills.',
    properties: {
      user_id: { type: 'string', description: 'Customer id' },
      med_id: { type: 'string', description: 'Medication id' },
      med_name: { type: 'string', description: 'Medication name; resolved to an id' },
      expiring_soon_days: { type: 'integer', description: 'Not yet expired, and expiring within this many days' },
      has_refills: { type: 'boolean', description: 'true = refills remaining, false = none left' },
      limit: { type: 'integer', description: 'Maximum number of results (default 50)' },
    },
    args: z.object({
      user_id: optText,
      med_id: optText,
      med_name: optText,
      expiring_soon_days: z.coerce.number().int().min(0).nullish(),
      has_refills: optFlag,
      limit: optLimit,
    }),
    run: (args) => {
      const today = isoDate(ctx.now());
      const conditions: string[] = [];
      const params: Array<string | number> = [];

      if (args.user_id) {
        conditions.push('p.user_id = ?');
        params.push(args.user_id);
      }

      if (args.med_id) {
        conditions.push('p.med_id = ?');
        params.push(args.med_id);
      } else if (args.med_name) {
        const lookup = lookupMedication(ctx, args.med_name);
        if (!lookup.found) {
          return { error: 'MEDICATION_NOT_FOUND', med_name: args.med_name, message: 'Medication not found in catalog' };
        }
        conditions.push('p.med_id = ?');
        params.push(lookup.med.med_id);
      }

      if (args.expiring_soon_days !== undefined && args.expiring_soon_days !== null) {
        conditions.push("date(p.expires_at) <= date(?, '+' || ? || ' days')", 'date(p.expires_at) >= date(?)');
        params.push(today, args.expiring_soon_days, today);
      }

      if (args.has_refills === true) conditions.push('p.refills_remaining > 0');
      if (args.has_refills === false) conditions.push('p.refills_remaining <= 0');

      const where = conditions.length > 0 ? conditions.join(' AND ') : '1=1';
      const rows = ctx.db
        .prepare<Array<string | number>, PrescriptionWithMed & { status: string }>(
          `SELECT p.*, m.brand_name, m.generic_name, m.rx_required,
             CASE
               WHEN date(p.expires_at) < date(?) THEN 'expired'
               WHEN p.refills_remaining <= 0 THEN 'no_refills'
               ELSE 'active'
             END AS status
           FROM prescriptions p
           JOIN medications m ON m.med_id = p.med_id
           WHERE ${where}
           ORDER BY date(p.expires_at), p.user_id
           LIMIT ?`,
        )
        .all(today, ...params, args.limit ?? 50);

      return {
        count: rows.length,
        prescriptions: rows.map((r) => ({
          prescription_id: r.prescription_id,
          user_id: r.user_id,
          med_id: r.med_id,
          med_name: displayName(r),
          directions: r.directions,
          refills_remaining: r.refills_remaining,
          expires_at: r.expires_at,
          status: r.status,
          rx_required: r.rx_required === 1,
        })),
      };
    },
  });

  return [listUserPrescriptions, requestPrescriptionRefill, queryPrescriptionsFlexible];
}
