import { Pool } from 'pg';
import { pool, withTransaction } from './client';
import { lotKey } from '../domain/inventory-snapshot';
import { insertLot } from '../repositories/pg-inventory-repository';
import { loadSeedInventory } from '../repositories/seed-inventory';
import { InventoryLot } from '../types/inventory.types';
import { logger } from '../utils/logger';

/**
 * Inserts the seed lots that are not in the database yet. Existing lots keep
 * their current quantities.
 */
async function seedDatabase(lots: InventoryLot[], db: Pool = pool): Promise<number> {
     logger.info({ lots: lots.length }, 'Seeding inventory');

     const inserted = await withTransaction(async (client) => {
          const { rows } = await client.query<{ product_code: string; lot_id: string }>(
               'SELECT product_code, lot_id FROM inventory_lot'
          );
          const existing = new Set(rows.map((row) => lotKey(row.product_code, row.lot_id)));

          let count = 0;
          for (const lot of lots) {
               if (existing.has(lotKey(lot.productCode, lot.lotId))) {
                    continue;
               }
               await insertLot(client, lot);
               count++;
          }
          return count;
     }, db);

     logger.info({ inserted, skipped: lots.length - inserted }, 'Inventory seeding completed');
     return inserted;
}

// Run if executed directly
if (require.main === module) {
     Promise.resolve()
          .then(() => seedDatabase(loadSeedInventory()))
          .catch((err) => {
               logger.error({ err }, 'Seeding failed');
               process.exitCode = 1;
          })
          .finally(() => pool.end());
}

export { seedDatabase };
