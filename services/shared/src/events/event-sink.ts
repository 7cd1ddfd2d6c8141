import { z } from 'zod';
import {
     EVENT_TYPES,
     EventAck,
     EventFilters,
     EventRecord,
     InventoryEvent,
} from '../types/inventory.types';
import { ValidationError } from '../utils/errors';

/**
 * Append-only, queryable log of inventory events. `append` rejects an event
 * older than the latest one held.
 */
export interface EventSink {
     append(event: InventoryEvent): Promise<EventAck>;
     /**
      * Appends `events` in order as one unit, moving a timestamp older than the
      * latest logged event forward to it. Returns the events as stored.
      */
     record(events: readonly InventoryEvent[]): Promise<InventoryEvent[]>;
     query(filters?: EventFilters): Promise<InventoryEvent[]>;
}

/** Timestamps clamped so none falls before `latest` or before its predecessor. */
export function stampNotBefore(events: readonly InventoryEvent[], latest: Date | null): InventoryEvent[] {
     let floor = latest ? latest.getTime() : Number.NEGATIVE_INFINITY;
     return events.map((event) => {
          const ts = Math.max(event.timestamp.getTime(), floor);
          floor = ts;
          return ts === event.timestamp.getTime() ? event : { ...event, timestamp: new Date(ts) };
     });
}

export const eventRecordSchema = z.object({
     ts: z.string().datetime({ offset: true }),
     type: z.enum(EVENT_TYPES),
     product: z.string(),
     lot: z.string().nullable(),
     quantity: z.number(),
     before_quantity: z.number(),
     after_quantity: z.number(),
     source: z.string(),
});

export function toEventRecord(event: InventoryEvent): EventRecord {
     return {
          ts: event.timestamp.toISOString(),
          type: event.type,
          product: event.product,
          lot: event.lot,
          quantity: event.quantity,
          before_quantity: event.beforeQuantity,
          after_quantity: event.afterQuantity,
          source: event.source,
     };
}

export function fromEventRecord(record: EventRecord): InventoryEvent {
     return {
          timestamp: new Date(record.ts),
          type: record.type,
          product: record.product,
          lot: record.lot,
          quantity: record.quantity,
          beforeQuantity: record.before_quantity,
          afterQuantity: record.after_quantity,
          source: record.source,
     };
}

export function assertChronological(event: InventoryEvent, latest: Date | null): void {
     if (latest !== null && event.timestamp.getTime() < latest.getTime()) {
          throw new ValidationError(
               `Event at ${event.timestamp.toISOString()} is older than the latest logged event at ${latest.toISOString()}`
          );
     }
}

export function matchesFilters(event: InventoryEvent, filters: EventFilters): boolean {
     if (filters.types && filters.types.length > 0 && !filters.types.includes(event.type)) {
          return false;
     }
     if (filters.product !== undefined && event.product !== filters.product) {
          return false;
     }
     const ts = event.timestamp.getTime();
     if (filters.since && ts < filters.since.getTime()) {
          return false;
     }
     if (filters.until && ts > filters.until.getTime()) {
          return false;
     }
     return true;
}

/** Filter, order and limit an in-memory list of events kept in append order. */
export function applyFilters(events: readonly InventoryEvent[], filters: EventFilters = {}): InventoryEvent[] {
     const matched = events.filter((event) => matchesFilters(event, filters));
     if (filters.order === 'desc') {
          matched.reverse();
     }
     return filters.limit !== undefined ? matched.slice(0, filters.limit) : matched;
}

/** Units sold per product across `sell_down` events. */
export function sumSales(events: readonly InventoryEvent[]): Map<string, number> {
     const totals = new Map<string, number>();
     for (const event of events) {
          if (event.type === 'sell_down') {
               totals.set(event.product, (totals.get(event.product) ?? 0) + event.quantity);
          }
     }
     return totals;
}
