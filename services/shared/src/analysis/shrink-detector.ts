import { DetectionConfig, DetectionThresholds, resolveForCategory } from '../config/config';
import { InventorySnapshot, firstExpiryFirst, sellableQuantity } from '../domain/inventory-snapshot';
import { EventSink, sumSales } from '../events/event-sink';
import { SalesHistorySource } from '../clients/sales-history-client';
import {
     FLAG_REASONS,
     InventoryEvent,
     InventoryLot,
     QUARANTINE,
     ShrinkFlag,
} from '../types/inventory.types';
import { daysUntil, subtractDays } from '../utils/dates';
import { Logger, createChildLogger } from '../utils/logger';

export const DETECTOR_SOURCE = 'detector';

const MIN_DAILY_SALES = 1e-6;

export type SalesWindowSource = 'events' | 'sales_history' | 'none';

export interface SalesWindow {
     since: Date;
     until: Date;
     unitsSold: Map<string, number>;
     source: SalesWindowSource;
}

export interface ShrinkDetectorOptions {
     sink: EventSink;
     config: DetectionConfig;
     salesHistory?: SalesHistorySource;
     /** Locations whose stock is neither counted nor flagged; defaults to quarantine. */
     quarantineLocations?: readonly string[];
     logger?: Logger;
}

export class ShrinkDetector {
     private readonly log: Logger;

     constructor(private readonly options: ShrinkDetectorOptions) {
          this.log = options.logger ?? createChildLogger({ component: 'shrink-detector' });
     }

     async detect(snapshot: InventorySnapshot, now: Date): Promise<ShrinkFlag[]> {
          const window = await this.salesWindow(snapshot, now);
          const flags = evaluateFlags(snapshot, window.unitsSold, now, this.options.config, this.quarantineLocations());
          this.log.info(
               { flags: flags.length, salesSource: window.source, windowDays: this.options.config.windowDays },
               'Shrink detection completed'
          );
          return flags;
     }

     /**
      * Units sold per product over the trailing window. The event log is the
      * primary source; the external sales history is asked only when the log
      * holds no sales for the window.
      */
     async salesWindow(snapshot: InventorySnapshot, now: Date): Promise<SalesWindow> {
          const since = subtractDays(now, this.options.config.windowDays);
          const events = await this.options.sink.query({ types: ['sell_down'], since, until: now });
          if (events.length > 0) {
               return { since, until: now, unitsSold: sumSales(events), source: 'events' };
          }

          const { salesHistory } = this.options;
          if (!salesHistory) {
               return { since, until: now, unitsSold: new Map(), source: 'none' };
          }

          const unitsSold = new Map<string, number>();
          for (const [productCode, lots] of snapshot.byProduct()) {
               if (totalSellable(lots, this.quarantineLocations()) > 0) {
                    unitsSold.set(productCode, await salesHistory.unitsSold(productCode, since));
               }
          }
          this.log.debug({ products: unitsSold.size }, 'No logged sales in window; used sales history');
          return { since, until: now, unitsSold, source: 'sales_history' };
     }

     private quarantineLocations(): readonly string[] {
          return this.options.quarantineLocations ?? [QUARANTINE];
     }
}

/**
 * Threshold checks per product with sellable stock. A product can raise
 * several reasons at once; each is its own flag.
 */
export function evaluateFlags(
     snapshot: InventorySnapshot,
     unitsSold: ReadonlyMap<string, number>,
     now: Date,
     config: DetectionConfig,
     quarantineLocations: readonly string[] = [QUARANTINE]
): ShrinkFlag[] {
     const flags: ShrinkFlag[] = [];

     for (const [productCode, lots] of snapshot.byProduct()) {
          const sellable = lots.filter((lot) => sellableQuantity(lot, quarantineLocations) > 0);
          const quantityOnHand = totalSellable(lots, quarantineLocations);
          if (quantityOnHand <= 0) {
               continue;
          }

          const first = lots[0];
          const thresholds: DetectionThresholds = resolveForCategory(config.thresholds, first.category);
          const unitsSoldInWindow = unitsSold.get(productCode) ?? 0;
          const avgDailySales = unitsSoldInWindow / config.windowDays;
          const daysOfSupply = quantityOnHand / Math.max(avgDailySales, MIN_DAILY_SALES);
          const base = {
               product: productCode,
               productName: first.productName,
               category: first.category,
               lots: firstExpiryFirst(sellable).map((lot) => lot.lotId),
               perishable: lots.some((lot) => lot.expiryDate !== null),
          };
          const metrics = {
               windowDays: config.windowDays,
               unitsSoldInWindow,
               avgDailySales,
               daysOfSupply,
               quantityOnHand,
          };

          const expiryDate = earliestExpiry(sellable);
          if (expiryDate !== null) {
               const daysUntilExpiry = daysUntil(expiryDate, now);
               if (daysUntilExpiry <= thresholds.expiryThresholdDays) {
                    flags.push({
                         ...base,
                         reason: 'near_expiry',
                         metrics: {
                              ...metrics,
                              expiryDate,
                              daysUntilExpiry,
                              expiryThresholdDays: thresholds.expiryThresholdDays,
                         },
                    });
               }
          }

          if (unitsSoldInWindow < thresholds.minUnitsThreshold) {
               flags.push({
                    ...base,
                    reason: 'low_movement',
                    metrics: { ...metrics, minUnitsThreshold: thresholds.minUnitsThreshold },
               });
          }

          if (daysOfSupply > thresholds.maxDaysOfSupply) {
               flags.push({
                    ...base,
                    reason: 'overstock',
                    metrics: { ...metrics, maxDaysOfSupply: thresholds.maxDaysOfSupply },
               });
          }
     }

     return flags.sort((a, b) => {
          const byReason = FLAG_REASONS.indexOf(a.reason) - FLAG_REASONS.indexOf(b.reason);
          if (byReason !== 0) {
               return byReason;
          }
          return a.product < b.product ? -1 : a.product > b.product ? 1 : 0;
     });
}

/** Audit events for flags that have an event type; near-expiry flags have none. */
export function flagEvents(flags: readonly ShrinkFlag[], now: Date): InventoryEvent[] {
     const events: InventoryEvent[] = [];
     for (const flag of flags) {
          if (flag.reason === 'near_expiry') {
               continue;
          }
          events.push({
               timestamp: now,
               type: flag.reason === 'low_movement' ? 'flag_low_movement' : 'flag_overstock',
               product: flag.product,
               lot: null,
               quantity: 0,
               beforeQuantity: flag.metrics.quantityOnHand,
               afterQuantity: flag.metrics.quantityOnHand,
               source: DETECTOR_SOURCE,
          });
     }
     return events;
}

function totalSellable(lots: readonly InventoryLot[], quarantineLocations: readonly string[]): number {
     return lots.reduce((sum, lot) => sum + sellableQuantity(lot, quarantineLocations), 0);
}

/** Earliest expiry among lots that still hold sellable stock. */
function earliestExpiry(sellable: readonly InventoryLot[]): string | null {
     let earliest: string | null = null;
     for (const lot of sellable) {
          if (lot.expiryDate === null) {
               continue;
          }
          if (earliest === null || lot.expiryDate < earliest) {
               earliest = lot.expiryDate;
          }
     }
     return earliest;
}
