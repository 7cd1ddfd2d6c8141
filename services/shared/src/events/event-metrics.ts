import { EventType, InventoryEvent } from '../types/inventory.types';

export interface EventTypeTotals {
     events: number;
     units: number;
}

export type EventMetrics = Record<EventType, EventTypeTotals>;

/** Event count and units moved per event type; types with no events report zeros. */
export function summarizeEvents(events: readonly InventoryEvent[]): EventMetrics {
     const metrics: EventMetrics = {
          sell_down: zero(),
          returns: zero(),
          shrink: zero(),
          daily_expiry: zero(),
          receiving: zero(),
          flag_low_movement: zero(),
          flag_overstock: zero(),
          recall_quarantine: zero(),
     };
     for (const event of events) {
          metrics[event.type].events += 1;
          metrics[event.type].units += event.quantity;
     }
     return metrics;
}

function zero(): EventTypeTotals {
     return { events: 0, units: 0 };
}
