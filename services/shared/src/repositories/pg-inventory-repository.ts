import { Pool, PoolClient } from 'pg';
import { pool as defaultPool, withConnection, withTransaction } from '../db/client';
import { InventorySnapshot, lotKey } from '../domain/inventory-snapshot';
import { InventoryLot, QuantityDelta, SnapshotChanges } from '../types/inventory.types';
import { LotNotFoundError, NegativeQuantityError, guardRepository } from '../utils/errors';
import { logger } from '../utils/logger';
import { InventoryRepository } from './inventory-repository';

interface SnapshotRow {
     product_code: string;
     product_name: string;
     category: string;
     lot_id: string;
     store: string;
     expiry_date: string | null;
     location: string | null;
     quantity: number | null;
}

interface QuantityRow {
     product_code: string;
     lot_id: string;
     location: string;
     quantity: number;
}

export class PgInventoryRepository implements InventoryRepository {
     constructor(private readonly db: Pool = defaultPool) {}

     async getSnapshot(): Promise<InventorySnapshot> {
          return guardRepository('read inventory snapshot', () =>
               withConnection(async (client) => {
                    const { rows } = await client.query<SnapshotRow>(`
        SELECT l.product_code, p.name AS product_name, p.category, l.lot_id, l.store,
               to_char(l.expiry_date, 'YYYY-MM-DD') AS expiry_date,
               q.location, q.quantity
        FROM inventory_lot l
        JOIN product p ON p.code = l.product_code
        LEFT JOIN lot_quantity q ON q.product_code = l.product_code AND q.lot_id = l.lot_id
        ORDER BY l.product_code, l.lot_id, q.location
      `);
                    return new InventorySnapshot(groupLots(rows));
               }, this.db)
          );
     }

     async applyDelta(productCode: string, lotId: string, location: string, delta: number): Promise<number> {
          return guardRepository('apply inventory delta', () =>
               withTransaction(async (client) => {
                    const quantities = await lockLots(client, [{ productCode, lotId }]);
                    const available = quantities.get(quantityKey(productCode, lotId, location)) ?? 0;
                    const quantity = available + delta;
                    if (quantity < 0) {
                         throw new NegativeQuantityError(productCode, lotId, location, delta, available);
                    }
                    await upsertQuantity(client, productCode, lotId, location, quantity);
                    return quantity;
               }, this.db)
          );
     }

     async commit(changes: SnapshotChanges): Promise<void> {
          if (changes.createdLots.length === 0 && changes.deltas.length === 0) {
               return;
          }

          await guardRepository('commit inventory changes', () =>
               withTransaction(async (client) => {
                    for (const lot of changes.createdLots) {
                         await insertLot(client, lot);
                    }

                    const targets = uniqueLots(changes.deltas);
                    const quantities = targets.length > 0 ? await lockLots(client, targets) : new Map<string, number>();

                    // Validate every delta before writing any of them
                    const updates = new Map<string, QuantityRow>();
                    for (const { productCode, lotId, location, delta } of changes.deltas) {
                         const key = quantityKey(productCode, lotId, location);
                         const available = updates.get(key)?.quantity ?? quantities.get(key) ?? 0;
                         const quantity = available + delta;
                         if (quantity < 0) {
                              throw new NegativeQuantityError(productCode, lotId, location, delta, available);
                         }
                         updates.set(key, { product_code: productCode, lot_id: lotId, location, quantity });
                    }

                    for (const row of updates.values()) {
                         await upsertQuantity(client, row.product_code, row.lot_id, row.location, row.quantity);
                    }

                    logger.debug(
                         { createdLots: changes.createdLots.length, deltas: changes.deltas.length },
                         'Inventory changes committed'
                    );
               }, this.db)
          );
     }
}

/**
 * Locks the lot rows in key order and returns their current per-location
 * quantities. Throws LotNotFoundError for any lot that does not exist.
 */
async function lockLots(
     client: PoolClient,
     lots: Array<{ productCode: string; lotId: string }>
): Promise<Map<string, number>> {
     const sorted = [...lots].sort((a, b) =>
          lotKey(a.productCode, a.lotId) < lotKey(b.productCode, b.lotId) ? -1 : 1
     );
     const productCodes = sorted.map((lot) => lot.productCode);
     const lotIds = sorted.map((lot) => lot.lotId);

     const { rows: locked } = await client.query<{ product_code: string; lot_id: string }>(
          `
      SELECT product_code, lot_id
      FROM inventory_lot
      WHERE (product_code, lot_id) IN (SELECT * FROM unnest($1::text[], $2::text[]))
      ORDER BY product_code, lot_id
      FOR UPDATE
    `,
          [productCodes, lotIds]
     );

     const found = new Set(locked.map((row) => lotKey(row.product_code, row.lot_id)));
     for (const lot of sorted) {
          if (!found.has(lotKey(lot.productCode, lot.lotId))) {
               throw new LotNotFoundError(lot.productCode, lot.lotId);
          }
     }

     const { rows } = await client.query<QuantityRow>(
          `
      SELECT product_code, lot_id, location, quantity
      FROM lot_quantity
      WHERE (product_code, lot_id) IN (SELECT * FROM unnest($1::text[], $2::text[]))
    `,
          [productCodes, lotIds]
     );

     return new Map(
          rows.map((row) => [quantityKey(row.product_code, row.lot_id, row.location), Number(row.quantity)])
     );
}

async function upsertQuantity(
     client: PoolClient,
     productCode: string,
     lotId: string,
     location: string,
     quantity: number
): Promise<void> {
     await client.query(
          `
      INSERT INTO lot_quantity (product_code, lot_id, location, quantity)
      VALUES ($1, $2, $3, $4)
      ON CONFLICT (product_code, lot_id, location)
      DO UPDATE SET quantity = EXCLUDED.quantity, updated_at = NOW()
    `,
          [productCode, lotId, location, quantity]
     );
}

export async function insertLot(client: PoolClient, lot: InventoryLot): Promise<void> {
     await client.query(
          `
      INSERT INTO product (code, name, category)
      VALUES ($1, $2, $3)
      ON CONFLICT (code) DO NOTHING
    `,
          [lot.productCode, lot.productName, lot.category]
     );
     await client.query(
          `
      INSERT INTO inventory_lot (product_code, lot_id, store, expiry_date)
      VALUES ($1, $2, $3, $4)
    `,
          [lot.productCode, lot.lotId, lot.store, lot.expiryDate]
     );
     for (const [location, quantity] of Object.entries(lot.quantities)) {
          await upsertQuantity(client, lot.productCode, lot.lotId, location, quantity);
     }
}

function groupLots(rows: SnapshotRow[]): InventoryLot[] {
     const lots = new Map<string, { lot: InventoryLot; quantities: Record<string, number> }>();
     for (const row of rows) {
          const key = lotKey(row.product_code, row.lot_id);
          let entry = lots.get(key);
          if (!entry) {
               const quantities: Record<string, number> = {};
               entry = {
                    quantities,
                    lot: {
                         productCode: row.product_code,
                         productName: row.product_name,
                         category: row.category,
                         lotId: row.lot_id,
                         store: row.store,
                         expiryDate: row.expiry_date,
                         quantities,
                    },
               };
               lots.set(key, entry);
          }
          if (row.location !== null && row.quantity !== null) {
               entry.quantities[row.location] = Number(row.quantity);
          }
     }
     return [...lots.values()].map((entry) => entry.lot);
}

function uniqueLots(deltas: QuantityDelta[]): Array<{ productCode: string; lotId: string }> {
     const seen = new Map<string, { productCode: string; lotId: string }>();
     for (const { productCode, lotId } of deltas) {
          seen.set(lotKey(productCode, lotId), { productCode, lotId });
     }
     return [...seen.values()];
}

function quantityKey(productCode: string, lotId: string, location: string): string {
     return `${lotKey(productCode, lotId)}::${location}`;
}
