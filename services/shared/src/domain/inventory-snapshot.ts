import {
     InventoryLot,
     QuantityDelta,
     SnapshotChanges,
     QUARANTINE,
} from '../types/inventory.types';
import { daysUntil } from '../utils/dates';
import { LotNotFoundError, NegativeQuantityError } from '../utils/errors';

export function lotKey(productCode: string, lotId: string): string {
     return `${productCode}::${lotId}`;
}

/**
 * Total quantity of a lot across its locations, optionally leaving some out
 * (quarantine, for sellable totals).
 */
export function quantityOnHand(lot: InventoryLot, excludeLocations: readonly string[] = []): number {
     let total = 0;
     for (const [location, quantity] of Object.entries(lot.quantities)) {
          if (!excludeLocations.includes(location)) {
               total += quantity;
          }
     }
     return total;
}

export function sellableQuantity(lot: InventoryLot, quarantineLocations: readonly string[] = [QUARANTINE]): number {
     return quantityOnHand(lot, quarantineLocations);
}

export function locationQuantity(lot: InventoryLot, location: string): number {
     return lot.quantities[location] ?? 0;
}

/** A lot expires at the end of its expiry day. */
export function isExpired(lot: InventoryLot, now: Date): boolean {
     return lot.expiryDate !== null && daysUntil(lot.expiryDate, now) < 0;
}

/** Earliest expiry first, lots without expiry last, lot id as tie-break. */
export function firstExpiryFirst(lots: readonly InventoryLot[]): InventoryLot[] {
     return [...lots].sort((a, b) => {
          if (a.expiryDate !== b.expiryDate) {
               if (a.expiryDate === null) return 1;
               if (b.expiryDate === null) return -1;
               return a.expiryDate < b.expiryDate ? -1 : 1;
          }
          return a.lotId < b.lotId ? -1 : a.lotId > b.lotId ? 1 : 0;
     });
}

/**
 * Immutable view of every lot; jobs derive new snapshots instead of mutating.
 */
export class InventorySnapshot {
     private readonly byKey: ReadonlyMap<string, InventoryLot>;

     constructor(lots: Iterable<InventoryLot>) {
          const byKey = new Map<string, InventoryLot>();
          for (const lot of lots) {
               byKey.set(lotKey(lot.productCode, lot.lotId), freezeLot(lot));
          }
          this.byKey = byKey;
     }

     get size(): number {
          return this.byKey.size;
     }

     /** Lots ordered by product code, then lot id. */
     lots(): InventoryLot[] {
          return [...this.byKey.values()].sort(compareLots);
     }

     get(productCode: string, lotId: string): InventoryLot | undefined {
          return this.byKey.get(lotKey(productCode, lotId));
     }

     has(productCode: string, lotId: string): boolean {
          return this.byKey.has(lotKey(productCode, lotId));
     }

     /** Lots grouped per product code, in product order. */
     byProduct(): Map<string, InventoryLot[]> {
          const grouped = new Map<string, InventoryLot[]>();
          for (const lot of this.lots()) {
               const existing = grouped.get(lot.productCode);
               if (existing) {
                    existing.push(lot);
               } else {
                    grouped.set(lot.productCode, [lot]);
               }
          }
          return grouped;
     }

     withQuantity(productCode: string, lotId: string, location: string, quantity: number): InventorySnapshot {
          const lot = this.get(productCode, lotId);
          if (!lot) {
               throw new LotNotFoundError(productCode, lotId);
          }
          if (quantity < 0) {
               throw new NegativeQuantityError(
                    productCode,
                    lotId,
                    location,
                    quantity - locationQuantity(lot, location),
                    locationQuantity(lot, location)
               );
          }
          return this.replace({ ...lot, quantities: { ...lot.quantities, [location]: quantity } });
     }

     withLot(lot: InventoryLot): InventorySnapshot {
          return this.replace(lot);
     }

     private replace(lot: InventoryLot): InventorySnapshot {
          const lots = new Map(this.byKey);
          lots.set(lotKey(lot.productCode, lot.lotId), lot);
          return new InventorySnapshot(lots.values());
     }
}

/**
 * Lots present only in `after`, plus per-location quantity differences for
 * lots present in both.
 */
export function diffSnapshots(before: InventorySnapshot, after: InventorySnapshot): SnapshotChanges {
     const createdLots: InventoryLot[] = [];
     const deltas: QuantityDelta[] = [];

     for (const lot of after.lots()) {
          const previous = before.get(lot.productCode, lot.lotId);
          if (!previous) {
               createdLots.push(lot);
               continue;
          }
          const locations = new Set([...Object.keys(previous.quantities), ...Object.keys(lot.quantities)]);
          for (const location of [...locations].sort()) {
               const delta = locationQuantity(lot, location) - locationQuantity(previous, location);
               if (delta !== 0) {
                    deltas.push({ productCode: lot.productCode, lotId: lot.lotId, location, delta });
               }
          }
     }

     return { createdLots, deltas };
}

export function isEmptyChange(changes: SnapshotChanges): boolean {
     return changes.createdLots.length === 0 && changes.deltas.length === 0;
}

function compareLots(a: InventoryLot, b: InventoryLot): number {
     if (a.productCode !== b.productCode) {
          return a.productCode < b.productCode ? -1 : 1;
     }
     if (a.lotId === b.lotId) {
          return 0;
     }
     return a.lotId < b.lotId ? -1 : 1;
}

function freezeLot(lot: InventoryLot): InventoryLot {
     if (Object.isFrozen(lot)) {
          return lot;
     }
     return Object.freeze({ ...lot, quantities: Object.freeze({ ...lot.quantities }) });
}
