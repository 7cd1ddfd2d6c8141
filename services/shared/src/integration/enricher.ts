import { InventorySnapshot, quantityOnHand } from '../domain/inventory-snapshot';
import { Decision, FlaggedDecisionRecord } from '../types/inventory.types';

/**
 * Joins a decision with descriptive and stock data from the snapshot.
 * Quarantined stock counts towards neither `qty` nor `stores`.
 */
export function enrichDecision(
     decision: Decision,
     snapshot: InventorySnapshot,
     quarantineLocations: readonly string[]
): FlaggedDecisionRecord {
     const lots = snapshot.byProduct().get(decision.productCode) ?? [];
     const stores = new Set<string>();
     let qty = 0;
     for (const lot of lots) {
          const available = quantityOnHand(lot, quarantineLocations);
          qty += available;
          if (available > 0) {
               stores.add(lot.store);
          }
     }

     return {
          default_code: decision.productCode,
          outcome: decision.outcome,
          reason: decision.reason,
          reasons: decision.reasons,
          lot: decision.lot,
          suggested_qty: decision.suggestedQty,
          price_markdown_pct: decision.markdownPct,
          notes: decision.notes,
          product_name: lots[0]?.productName ?? '',
          category: lots[0]?.category ?? '',
          stores: [...stores].sort(),
          qty,
     };
}

export function enrichDecisions(
     decisions: readonly Decision[],
     snapshot: InventorySnapshot,
     quarantineLocations: readonly string[]
): FlaggedDecisionRecord[] {
     return decisions.map((decision) => enrichDecision(decision, snapshot, quarantineLocations));
}
