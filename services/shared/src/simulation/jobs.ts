import {
     CategoryScoped,
     ReceivingSettings,
     ReturnsSettings,
     ShrinkSettings,
     SimulationConfig,
     VelocityProfile,
     resolveForCategory,
} from '../config/config';
import {
     InventorySnapshot,
     firstExpiryFirst,
     isExpired,
     locationQuantity,
     quantityOnHand,
     sellableQuantity,
} from '../domain/inventory-snapshot';
import {
     BACKROOM,
     EventType,
     InventoryEvent,
     InventoryLot,
     JOB_NAMES,
     JobName,
     QUARANTINE,
     SALES_FLOOR,
} from '../types/inventory.types';
import { addDays, toIsoDate } from '../utils/dates';
import { Rng } from '../utils/rng';

export const SIMULATOR_SOURCE = 'simulator';

export interface SellDownJob {
     kind: 'sell_down';
     profiles: CategoryScoped<VelocityProfile>;
}

export interface ReturnsJob {
     kind: 'returns';
     settings: CategoryScoped<ReturnsSettings>;
}

export interface ShrinkJob {
     kind: 'shrink';
     settings: CategoryScoped<ShrinkSettings>;
}

export interface DailyExpiryJob {
     kind: 'daily_expiry';
}

export interface ReceivingJob {
     kind: 'receiving';
     settings: CategoryScoped<ReceivingSettings>;
}

export type Job = SellDownJob | ReturnsJob | ShrinkJob | DailyExpiryJob | ReceivingJob;

export interface JobInput {
     snapshot: InventorySnapshot;
     rng: Rng;
     now: Date;
     /** Units sold per product since the returns job last ran. */
     recentSales: ReadonlyMap<string, number>;
     /** Locations holding unsellable stock; quarantine when absent. */
     quarantineLocations?: readonly string[];
}

export interface JobResult {
     snapshot: InventorySnapshot;
     events: InventoryEvent[];
}

export function runJob(job: Job, input: JobInput): JobResult {
     switch (job.kind) {
          case 'sell_down':
               return runSellDown(job, input);
          case 'returns':
               return runReturns(job, input);
          case 'shrink':
               return runShrink(job, input);
          case 'daily_expiry':
               return runDailyExpiry(input);
          case 'receiving':
               return runReceiving(job, input);
          default:
               return assertNever(job);
     }
}

/**
 * Jobs that have an interval configured, in execution priority order.
 */
export function buildJobs(config: SimulationConfig): Job[] {
     const jobs: Job[] = [];
     for (const name of JOB_NAMES) {
          if (config.intervals[name] === undefined) {
               continue;
          }
          jobs.push(jobFor(name, config));
     }
     return jobs;
}

function jobFor(name: JobName, config: SimulationConfig): Job {
     switch (name) {
          case 'sell_down':
               return { kind: 'sell_down', profiles: config.sellDown };
          case 'returns':
               return { kind: 'returns', settings: config.returns };
          case 'shrink':
               return { kind: 'shrink', settings: config.shrink };
          case 'daily_expiry':
               return { kind: 'daily_expiry' };
          case 'receiving':
               return { kind: 'receiving', settings: config.receiving };
     }
}

function runSellDown(job: SellDownJob, { snapshot, rng, now }: JobInput): JobResult {
     let next = snapshot;
     const events: InventoryEvent[] = [];

     for (const [productCode, lots] of snapshot.byProduct()) {
          const profile = resolveForCategory(job.profiles, lots[0].category);
          let remaining = drawDemand(profile, rng);

          for (const lot of firstExpiryFirst(lots)) {
               if (remaining <= 0) {
                    break;
               }
               if (isExpired(lot, now)) {
                    continue;
               }
               const before = locationQuantity(lot, SALES_FLOOR);
               if (before <= 0) {
                    continue;
               }
               const sold = Math.min(before, remaining);
               const after = before - sold;
               next = next.withQuantity(productCode, lot.lotId, SALES_FLOOR, after);
               remaining -= sold;
               events.push(buildEvent('sell_down', now, lot, sold, before, after));
          }
     }

     return { snapshot: next, events };
}

function drawDemand(profile: VelocityProfile, rng: Rng): number {
     if (profile.unitsPerRun <= 0) {
          return 0;
     }
     const swing = profile.jitterPct * (2 * rng() - 1);
     return Math.max(0, Math.round(profile.unitsPerRun * (1 + swing)));
}

function runReturns(job: ReturnsJob, { snapshot, now, recentSales }: JobInput): JobResult {
     let next = snapshot;
     const events: InventoryEvent[] = [];

     for (const [productCode, lots] of snapshot.byProduct()) {
          const sold = recentSales.get(productCode) ?? 0;
          if (sold <= 0) {
               continue;
          }
          const settings = resolveForCategory(job.settings, lots[0].category);
          const returned = Math.floor(sold * settings.fraction);
          const target = firstExpiryFirst(lots).find((lot) => !isExpired(lot, now));
          if (returned <= 0 || !target) {
               continue;
          }

          const before = locationQuantity(target, SALES_FLOOR);
          const room = Math.max(0, settings.capacityCeiling - before);
          // Anything above the ceiling is dropped.
          const added = Math.min(returned, room);
          if (added <= 0) {
               continue;
          }
          const after = before + added;
          next = next.withQuantity(productCode, target.lotId, SALES_FLOOR, after);
          events.push(buildEvent('returns', now, target, added, before, after));
     }

     return { snapshot: next, events };
}

function runShrink(job: ShrinkJob, { snapshot, rng, now, quarantineLocations = [QUARANTINE] }: JobInput): JobResult {
     let next = snapshot;
     const events: InventoryEvent[] = [];

     for (const lot of snapshot.lots()) {
          const onHand = sellableQuantity(lot, quarantineLocations);
          const { shrinkRate } = resolveForCategory(job.settings, lot.category);
          if (onHand <= 0 || shrinkRate <= 0) {
               continue;
          }
          const loss = Math.min(onHand, Math.floor(onHand * shrinkRate * rng()));
          if (loss <= 0) {
               continue;
          }

          let outstanding = loss;
          for (const location of shrinkOrder(lot, quarantineLocations)) {
               const available = locationQuantity(lot, location);
               const taken = Math.min(available, outstanding);
               if (taken > 0) {
                    next = next.withQuantity(lot.productCode, lot.lotId, location, available - taken);
                    outstanding -= taken;
               }
          }
          events.push(buildEvent('shrink', now, lot, loss, onHand, onHand - loss));
     }

     return { snapshot: next, events };
}

/** Sales floor first, then backroom, then any other sellable location. */
function shrinkOrder(lot: InventoryLot, quarantineLocations: readonly string[]): string[] {
     const others = Object.keys(lot.quantities)
          .filter((location) => location !== SALES_FLOOR && location !== BACKROOM)
          .sort();
     return [SALES_FLOOR, BACKROOM, ...others].filter((location) => !quarantineLocations.includes(location));
}

function runDailyExpiry({ snapshot, now }: JobInput): JobResult {
     let next = snapshot;
     const events: InventoryEvent[] = [];

     for (const lot of snapshot.lots()) {
          const onHand = quantityOnHand(lot);
          if (!isExpired(lot, now) || onHand <= 0) {
               continue;
          }
          for (const [location, quantity] of Object.entries(lot.quantities)) {
               if (quantity > 0) {
                    next = next.withQuantity(lot.productCode, lot.lotId, location, 0);
               }
          }
          events.push(buildEvent('daily_expiry', now, lot, onHand, onHand, 0));
     }

     return { snapshot: next, events };
}

function runReceiving(job: ReceivingJob, { snapshot, now }: JobInput): JobResult {
     let next = snapshot;
     const events: InventoryEvent[] = [];

     for (const [productCode, lots] of snapshot.byProduct()) {
          const settings = resolveForCategory(job.settings, lots[0].category);
          const usable = firstExpiryFirst(lots.filter((lot) => !isExpired(lot, now)));
          const backroomTotal = usable.reduce((sum, lot) => sum + locationQuantity(lot, BACKROOM), 0);
          if (backroomTotal >= settings.parLevel) {
               continue;
          }

          let target: InventoryLot;
          if (usable.length > 0) {
               target = usable[usable.length - 1];
          } else {
               target = openLot(lots[0], now, settings.shelfLifeDays);
               next = next.withLot(target);
          }

          const needed = settings.parLevel - backroomTotal;
          const before = locationQuantity(target, BACKROOM);
          const after = before + needed;
          next = next.withQuantity(productCode, target.lotId, BACKROOM, after);
          events.push(buildEvent('receiving', now, target, needed, before, after));
     }

     return { snapshot: next, events };
}

function openLot(template: InventoryLot, now: Date, shelfLifeDays: number): InventoryLot {
     const today = toIsoDate(now);
     const slug = template.productCode.toUpperCase().replace(/[^A-Z0-9]/g, '').slice(0, 12) || 'LOT';
     return {
          productCode: template.productCode,
          productName: template.productName,
          category: template.category,
          store: template.store,
          lotId: `SIM-${slug}-${today.replace(/-/g, '')}`,
          expiryDate: addDays(today, shelfLifeDays),
          quantities: { [BACKROOM]: 0, [SALES_FLOOR]: 0 },
     };
}

function buildEvent(
     type: EventType,
     now: Date,
     lot: InventoryLot,
     quantity: number,
     beforeQuantity: number,
     afterQuantity: number
): InventoryEvent {
     return {
          timestamp: now,
          type,
          product: lot.productCode,
          lot: lot.lotId,
          quantity,
          beforeQuantity,
          afterQuantity,
          source: SIMULATOR_SOURCE,
     };
}

function assertNever(value: never): never {
     throw new Error(`Unhandled job variant: ${JSON.stringify(value)}`);
}
