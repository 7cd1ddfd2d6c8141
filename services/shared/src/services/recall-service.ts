import { locationQuantity, sellableQuantity } from '../domain/inventory-snapshot';
import { EventSink } from '../events/event-sink';
import { InventoryRepository } from '../repositories/inventory-repository';
import { InventoryEvent, InventoryLot, QUARANTINE, QuantityDelta } from '../types/inventory.types';
import { Clock, systemClock } from '../utils/clock';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

export const RECALL_SOURCE = 'recall';

export interface RecallRequest {
     productCodes?: string[];
     categories?: string[];
}

export interface RecallResult {
     recalledAt: Date;
     lots: number;
     unitsQuarantined: number;
     events: InventoryEvent[];
}

export interface QuarantinedLot {
     productCode: string;
     lotId: string;
     store: string;
     quantity: number;
}

export class RecallService {
     constructor(
          private readonly repository: InventoryRepository,
          private readonly sink: EventSink,
          private readonly clock: Clock = systemClock,
          private readonly quarantineLocations: readonly string[] = [QUARANTINE]
     ) {}

     /**
      * Moves all sellable stock of the matching lots into quarantine in one
      * commit, then records one recall event per lot that held stock. The
      * result carries the events as logged.
      */
     async recall(request: RecallRequest): Promise<RecallResult> {
          const productCodes = request.productCodes ?? [];
          const categories = request.categories ?? [];
          if (productCodes.length === 0 && categories.length === 0) {
               throw new ValidationError('Recall needs at least one product code or category');
          }

          const now = this.clock.now();
          const snapshot = await this.repository.getSnapshot();
          const matching = snapshot
               .lots()
               .filter((lot) => productCodes.includes(lot.productCode) || categories.includes(lot.category));

          const deltas: QuantityDelta[] = [];
          let events: InventoryEvent[] = [];
          for (const lot of matching) {
               const sellable = sellableQuantity(lot, this.quarantineLocations);
               if (sellable <= 0) {
                    continue;
               }
               deltas.push(...quarantineDeltas(lot, this.quarantineLocations));
               events.push({
                    timestamp: now,
                    type: 'recall_quarantine',
                    product: lot.productCode,
                    lot: lot.lotId,
                    quantity: sellable,
                    beforeQuantity: sellable,
                    afterQuantity: 0,
                    source: RECALL_SOURCE,
               });
          }

          if (deltas.length > 0) {
               await this.repository.commit({ createdLots: [], deltas });
               events = await this.sink.record(events);
          }

          const unitsQuarantined = events.reduce((sum, event) => sum + event.quantity, 0);
          logger.info(
               { productCodes, categories, lots: events.length, unitsQuarantined },
               'Recall quarantined stock'
          );
          return { recalledAt: now, lots: events.length, unitsQuarantined, events };
     }

     async listQuarantined(): Promise<QuarantinedLot[]> {
          const snapshot = await this.repository.getSnapshot();
          const quarantined = (lot: InventoryLot) =>
               this.quarantineLocations.reduce((sum, location) => sum + locationQuantity(lot, location), 0);
          return snapshot
               .lots()
               .map((lot) => ({
                    productCode: lot.productCode,
                    lotId: lot.lotId,
                    store: lot.store,
                    quantity: quarantined(lot),
               }))
               .filter((lot) => lot.quantity > 0);
     }
}

function quarantineDeltas(lot: InventoryLot, quarantineLocations: readonly string[]): QuantityDelta[] {
     const deltas: QuantityDelta[] = [];
     for (const [location, quantity] of Object.entries(lot.quantities).sort(([a], [b]) => (a < b ? -1 : 1))) {
          if (!quarantineLocations.includes(location) && quantity > 0) {
               deltas.push({ productCode: lot.productCode, lotId: lot.lotId, location, delta: -quantity });
          }
     }
     deltas.push({
          productCode: lot.productCode,
          lotId: lot.lotId,
          location: QUARANTINE,
          delta: sellableQuantity(lot, quarantineLocations),
     });
     return deltas;
}
