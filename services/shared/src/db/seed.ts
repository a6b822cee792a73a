import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { StockEntry } from '../types/inventory.types';
import { InvalidStockEntryError } from '../utils/errors';
import { logger } from '../utils/logger';

const stockSeedSchema = z.array(
     z.object({
          sku: z.string().min(1),
          quantity: z.number().int().nonnegative(),
          locations: z.record(z.number().int().nonnegative()),
     })
);

/**
 * Validate decoded stock seed data. Entries must also agree with their
 * location breakdown; the store rejects them otherwise.
 */
export function parseStockEntries(data: unknown): StockEntry[] {
     const parsed = stockSeedSchema.safeParse(data);
     if (!parsed.success) {
          const issue = parsed.error.issues[0];
          throw new InvalidStockEntryError(
               String(issue.path[0] ?? ''),
               `Invalid stock seed at ${issue.path.join('.') || 'root'}: ${issue.message}`
          );
     }
     return parsed.data;
}

export function loadStockSeed(path: string): StockEntry[] {
     const entries = parseStockEntries(JSON.parse(readFileSync(path, 'utf8')));
     logger.info({ path, count: entries.length }, 'Loaded stock seed');
     return entries;
}
