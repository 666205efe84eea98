import { z } from 'zod';
import type { ToolDescriptor } from '../tool-registry.js';
import { defineTool, like, LIKE, optText, type ToolContext } from './define.js';

interface StoreRow {
  store_id: string;
  name: string;
  city: string;
}

export function storeTools(ctx: ToolContext): ToolDescriptor[] {
  const listStores = defineTool({
    name: 'list_stores',
    description: 'List pharmacy branches with their store_id, name and city. Use it to find store ids by city.',
    properties: {
      city: { type: 'string', description: "Optional city filter (partial match), e.g. 'Tel Aviv'" },
    },
    args: z.object({ city: optText }),
    run: ({ city }) => {
      const rows = city
        ? ctx.db
            .prepare<[string], StoreRow>(`SELECT store_id, name, city FROM stores WHERE city ${LIKE} ORDER BY name`)
            .all(like(city))
        : ctx.db.prepare<[], StoreRow>('SELECT store_id, name, city FROM stores ORDER BY city, name').all();
      return { count: rows.length, stores: rows };
    },
  });

  return [listStores];
}
