import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { ToolResult } from '@rxdesk/shared';
import type { ToolDescriptor } from '../tool-registry.js';

export interface ToolContext {
  db: Database.Database;
  /** Clock for refill ids and expiry checks */
  now: () => Date;
}

interface ToolDef<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  /** JSON-schema properties shown to the model */
  properties: Record<string, unknown>;
  required?: string[];
  args: S;
  run: (args: z.output<S>) => ToolResult;
}

/**
 * Build a registry descriptor whose handler validates the raw model
 * arguments before running. Bad types come back as INVALID_ARGUMENT.
 */
export function defineTool<S extends z.ZodTypeAny>(def: ToolDef<S>): ToolDescriptor {
  return {
    definition: {
      name: def.name,
      description: def.description,
      input_schema: { type: 'object', properties: def.properties, required: def.required ?? [] },
    },
    handler: (raw) => {
      const parsed = def.args.safeParse(raw);
      if (!parsed.success) {
        return {
          error: 'INVALID_ARGUMENT',
          tool: def.name,
          message: parsed.error.issues.map((i) => `${i.path.join('.') || 'arguments'}: ${i.message}`).join('; '),
        };
      }
      return def.run(parsed.data);
    },
  };
}

// ---------------------------------------------------------------------------
// Argument schemas shared by several tools. Models often send null for
// "not given", so every optional field is nullish.
// ---------------------------------------------------------------------------

export const optText = z.string().trim().min(1).nullish();
export const optFlag = z.boolean().nullish();
export const optLimit = z.coerce.number().int().positive().max(200).nullish();
export const optIds = z.array(z.string().min(1)).nullish();
export const reqText = z.string().trim().min(1);

/** `%term%` with LIKE wildcards escaped; pair with `ESCAPE '\'` */
export function like(term: string): string {
  return `%${term.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

export const LIKE = "LIKE ? ESCAPE '\\'";

/** `?, ?, ?` for an IN list */
export function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}

/** YYYY-MM-DD in UTC */
export function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}
