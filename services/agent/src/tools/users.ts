import { z } from 'zod';
import type { ToolDescriptor } from '../tool-registry.js';
import { defineTool, like, LIKE, optText, type ToolContext } from './define.js';

interface UserRow {
  user_id: string;
  full_name: string;
  phone: string | null;
  email: string | null;
  preferred_language: string;
}

export function userTools(ctx: ToolContext): ToolDescriptor[] {
  const searchUsers = defineTool({
    name: 'search_users',
    description:
      'Find a customer by name, email, phone (partial matches) or exact user_id. Any match on any given ' +
      'field counts. Needed before prescription lookups and refills. Give at least one field.',
    properties: {
      name: { type: 'string', description: 'Full name (partial match)' },
      email: { type: 'string', description: 'Email address (partial match)' },
      phone: { type: 'string', description: 'Phone number (partial match)' },
      user_id: { type: 'string', description: 'Exact user id' },
    },
    args: z.object({ name: optText, email: optText, phone: optText, user_id: optText }),
    run: (args) => {
      const conditions: string[] = [];
      const params: string[] = [];
      if (args.user_id) {
        conditions.push('user_id = ?');
        params.push(args.user_id);
      }
      if (args.name) {
        conditions.push(`full_name ${LIKE}`);
        params.push(like(args.name));
      }
      if (args.email) {
        conditions.push(`email ${LIKE}`);
        params.push(like(args.email));
      }
      if (args.phone) {
        conditions.push(`phone ${LIKE}`);
        params.push(like(args.phone));
      }
      if (conditions.length === 0) {
        return {
          error: 'MISSING_PARAMETER',
          message: 'At least one search parameter (name, email, phone or user_id) must be provided',
        };
      }

      const rows = ctx.db
        .prepare<string[], UserRow>(
          `SELECT user_id, full_name, phone, email, preferred_language
           FROM users WHERE ${conditions.join(' OR ')}
           ORDER BY full_name LIMIT 10`,
        )
        .all(...params);
      return { count: rows.length, users: rows };
    },
  });

  return [searchUsers];
}
