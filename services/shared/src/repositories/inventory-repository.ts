import { InventorySnapshot, locationQuantity } from '../domain/inventory-snapshot';
import { InventoryLot, QuantityDelta, SnapshotChanges } from '../types/inventory.types';
import { LotNotFoundError, NegativeQuantityError, ValidationError } from '../utils/errors';
import { SerialQueue } from '../utils/serial-queue';

export interface InventoryRepository {
     getSnapshot(): Promise<InventorySnapshot>;
     /** Applies a signed delta to one location and returns the new quantity. */
     applyDelta(productCode: string, lotId: string, location: string, delta: number): Promise<number>;
     /** Creates lots and applies deltas in one atomic step; nothing is written if any check fails. */
     commit(changes: SnapshotChanges): Promise<void>;
}

/**
 * Applies `changes` to `snapshot`, throwing before anything is returned if a
 * lot is missing, already exists, or a quantity would go negative.
 */
export function applyChanges(snapshot: InventorySnapshot, changes: SnapshotChanges): InventorySnapshot {
     let next = snapshot;
     for (const lot of changes.createdLots) {
          if (next.has(lot.productCode, lot.lotId)) {
               throw new ValidationError(`Lot ${lot.lotId} of product ${lot.productCode} already exists`);
          }
          next = next.withLot(lot);
     }
     for (const { productCode, lotId, location, delta } of changes.deltas) {
          const lot = next.get(productCode, lotId);
          if (!lot) {
               throw new LotNotFoundError(productCode, lotId);
          }
          next = next.withQuantity(productCode, lotId, location, locationQuantity(lot, location) + delta);
     }
     return next;
}

/** Applies one signed delta, rejecting an unknown lot or a negative result. */
export function applyDeltaTo(snapshot: InventorySnapshot, change: QuantityDelta): InventorySnapshot {
     const { productCode, lotId, location, delta } = change;
     const lot = snapshot.get(productCode, lotId);
     if (!lot) {
          throw new LotNotFoundError(productCode, lotId);
     }
     const available = locationQuantity(lot, location);
     if (available + delta < 0) {
          throw new NegativeQuantityError(productCode, lotId, location, delta, available);
     }
     return snapshot.withQuantity(productCode, lotId, location, available + delta);
}

export function locationQuantityOf(
     snapshot: InventorySnapshot,
     productCode: string,
     lotId: string,
     location: string
): number {
     const lot = snapshot.get(productCode, lotId);
     return lot ? locationQuantity(lot, location) : 0;
}

/** Inventory private to this process, seeded once. */
export class InMemoryInventoryRepository implements InventoryRepository {
     private snapshot: InventorySnapshot;
     private readonly queue = new SerialQueue();

     constructor(lots: Iterable<InventoryLot> = []) {
          this.snapshot = new InventorySnapshot(lots);
     }

     async getSnapshot(): Promise<InventorySnapshot> {
          return this.snapshot;
     }

     applyDelta(productCode: string, lotId: string, location: string, delta: number): Promise<number> {
          return this.queue.run(async () => {
               this.snapshot = applyDeltaTo(this.snapshot, { productCode, lotId, location, delta });
               return locationQuantityOf(this.snapshot, productCode, lotId, location);
          });
     }

     commit(changes: SnapshotChanges): Promise<void> {
          return this.queue.run(async () => {
               this.snapshot = applyChanges(this.snapshot, changes);
          });
     }
}
