import { resolve } from 'path';
import { z } from 'zod';
import { readJsonFile } from '../config/config';
import { InventoryLot } from '../types/inventory.types';
import { ValidationError } from '../utils/errors';
import { isIsoDate } from '../utils/dates';

const lotSchema = z.object({
     productCode: z.string().min(1),
     productName: z.string().min(1),
     category: z.string().min(1),
     lotId: z.string().min(1),
     store: z.string().min(1),
     expiryDate: z.string().refine(isIsoDate, { message: 'expected YYYY-MM-DD' }).nullable().default(null),
     quantities: z.record(z.string(), z.number().int().nonnegative()),
});

export const seedInventorySchema = z.object({
     lots: z.array(lotSchema),
});

export function parseSeedInventory(raw: unknown, source: string = 'seed inventory'): InventoryLot[] {
     const result = seedInventorySchema.safeParse(raw);
     if (!result.success) {
          throw new ValidationError(
               `Invalid inventory seed in ${source}`,
               result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
          );
     }
     return result.data.lots;
}

export function loadSeedInventory(
     path: string = process.env.INVENTORY_SEED_PATH || 'data/seed-inventory.json'
): InventoryLot[] {
     const file = resolve(path);
     return parseSeedInventory(readJsonFile(file), file);
}
