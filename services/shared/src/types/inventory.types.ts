// Type definitions for domain models

export const BACKROOM = 'backroom';
export const SALES_FLOOR = 'sales_floor';
export const QUARANTINE = 'quarantine';

export type LocationQuantities = Readonly<Record<string, number>>;

export interface InventoryLot {
     productCode: string;
     productName: string;
     category: string;
     lotId: string;
     store: string;
     /** ISO calendar date (YYYY-MM-DD); null for non-perishables. */
     expiryDate: string | null;
     quantities: LocationQuantities;
}

export interface QuantityDelta {
     productCode: string;
     lotId: string;
     location: string;
     delta: number;
}

export interface SnapshotChanges {
     createdLots: InventoryLot[];
     deltas: QuantityDelta[];
}

// Events

export const EVENT_TYPES = [
     'sell_down',
     'returns',
     'shrink',
     'daily_expiry',
     'receiving',
     'flag_low_movement',
     'flag_overstock',
     'recall_quarantine',
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export interface InventoryEvent {
     timestamp: Date;
     type: EventType;
     product: string;
     lot: string | null;
     /** Units moved; the direction follows from the event type. */
     quantity: number;
     beforeQuantity: number;
     afterQuantity: number;
     source: string;
}

/** Wire form of an event, as written to the event log. */
export interface EventRecord {
     ts: string;
     type: EventType;
     product: string;
     lot: string | null;
     quantity: number;
     before_quantity: number;
     after_quantity: number;
     source: string;
}

export interface EventAck {
     sequence: number;
}

export interface EventFilters {
     types?: EventType[];
     product?: string;
     since?: Date;
     until?: Date;
     order?: 'asc' | 'desc';
     limit?: number;
}

// Simulation jobs

export const JOB_NAMES = ['receiving', 'returns', 'sell_down', 'shrink', 'daily_expiry'] as const;

export type JobName = (typeof JOB_NAMES)[number];

export interface JobState {
     jobName: JobName;
     lastRunAt: Date | null;
     intervalMs: number;
}

// Shrink detection

export const FLAG_REASONS = ['near_expiry', 'low_movement', 'overstock'] as const;

export type FlagReason = (typeof FLAG_REASONS)[number];

interface BaseFlagMetrics {
     windowDays: number;
     unitsSoldInWindow: number;
     avgDailySales: number;
     daysOfSupply: number;
     quantityOnHand: number;
}

export interface NearExpiryMetrics extends BaseFlagMetrics {
     expiryDate: string;
     daysUntilExpiry: number;
     expiryThresholdDays: number;
}

export interface LowMovementMetrics extends BaseFlagMetrics {
     minUnitsThreshold: number;
}

export interface OverstockMetrics extends BaseFlagMetrics {
     maxDaysOfSupply: number;
}

interface BaseFlag {
     product: string;
     productName: string;
     category: string;
     lots: string[];
     /** True when any of the product's lots carries an expiry date. */
     perishable: boolean;
}

export interface NearExpiryFlag extends BaseFlag {
     reason: 'near_expiry';
     metrics: NearExpiryMetrics;
}

export interface LowMovementFlag extends BaseFlag {
     reason: 'low_movement';
     metrics: LowMovementMetrics;
}

export interface OverstockFlag extends BaseFlag {
     reason: 'overstock';
     metrics: OverstockMetrics;
}

export type ShrinkFlag = NearExpiryFlag | LowMovementFlag | OverstockFlag;

// Decisions

export const DECISION_OUTCOMES = ['RECALL_QUARANTINE', 'MARKDOWN', 'DONATE', 'NONE'] as const;

export type DecisionOutcome = (typeof DECISION_OUTCOMES)[number];

export interface Decision {
     productCode: string;
     outcome: DecisionOutcome;
     /** Reason of the flag that won; null only when the product had no flags. */
     reason: FlagReason | null;
     reasons: FlagReason[];
     lot: string | null;
     suggestedQty: number;
     markdownPct: number | null;
     notes: string;
}

/** Enriched decision as published in the flagged-decisions artifact. */
export interface FlaggedDecisionRecord {
     default_code: string;
     outcome: DecisionOutcome;
     reason: FlagReason | null;
     reasons: FlagReason[];
     lot: string | null;
     suggested_qty: number;
     price_markdown_pct: number | null;
     notes: string;
     product_name: string;
     category: string;
     stores: string[];
     qty: number;
}
