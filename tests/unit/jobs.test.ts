import { InventorySnapshot, quantityOnHand } from '@stockwatch/shared/src/domain/inventory-snapshot';
import { Job, JobInput, buildJobs, runJob } from '@stockwatch/shared/src/simulation/jobs';
import { InventoryLot } from '@stockwatch/shared/src/types/inventory.types';
import { createRng } from '@stockwatch/shared/src/utils/rng';
import { buildLot, testAppConfig } from '../helpers/testUtils';

const NOW = new Date('2026-10-19T12:00:00.000Z');

function input(lots: InventoryLot[], overrides: Partial<JobInput> = {}): JobInput {
     return {
          snapshot: new InventorySnapshot(lots),
          rng: () => 0.5,
          now: NOW,
          recentSales: new Map(),
          ...overrides,
     };
}

const sellDown = (unitsPerRun: number, jitterPct: number = 0): Job => ({
     kind: 'sell_down',
     profiles: { default: { unitsPerRun, jitterPct }, categories: {} },
});

describe('Simulation jobs', () => {
     describe('sell_down', () => {
          it('should sell ten units of FF101 from the sales floor only', () => {
               const result = runJob(sellDown(10), input([buildLot()]));

               expect(result.snapshot.get('FF101', 'FF101-L1')?.quantities).toEqual({
                    backroom: 80,
                    sales_floor: 10,
               });
               expect(result.events).toEqual([
                    {
                         timestamp: NOW,
                         type: 'sell_down',
                         product: 'FF101',
                         lot: 'FF101-L1',
                         quantity: 10,
                         beforeQuantity: 20,
                         afterQuantity: 10,
                         source: 'simulator',
                    },
               ]);
          });

          it('should drain lots first-expiry-first and skip expired lots', () => {
               const lots = [
                    buildLot({ lotId: 'L0', expiryDate: '2026-10-18', quantities: { backroom: 0, sales_floor: 5 } }),
                    buildLot({ lotId: 'L2', expiryDate: '2026-11-10', quantities: { backroom: 0, sales_floor: 20 } }),
                    buildLot({ lotId: 'L1', expiryDate: '2026-10-25', quantities: { backroom: 0, sales_floor: 4 } }),
               ];
               const result = runJob(sellDown(10), input(lots));

               expect(result.events.map((e) => [e.lot, e.quantity, e.beforeQuantity, e.afterQuantity])).toEqual([
                    ['L1', 4, 4, 0],
                    ['L2', 6, 20, 14],
               ]);
               expect(result.snapshot.get('FF101', 'L0')?.quantities.sales_floor).toBe(5);
          });

          it('should clamp demand to the available floor quantity', () => {
               const result = runJob(
                    sellDown(10),
                    input([buildLot({ quantities: { backroom: 50, sales_floor: 3 } })])
               );
               expect(result.snapshot.get('FF101', 'FF101-L1')?.quantities).toEqual({
                    backroom: 50,
                    sales_floor: 0,
               });
               expect(result.events[0].quantity).toBe(3);
          });

          it('should apply jitter around the configured units per run', () => {
               const result = runJob(sellDown(10, 0.5), input([buildLot()], { rng: () => 0 }));
               expect(result.events[0].quantity).toBe(5);
          });

          it('should emit nothing when the floor is empty', () => {
               const result = runJob(
                    sellDown(10),
                    input([buildLot({ quantities: { backroom: 80, sales_floor: 0 } })])
               );
               expect(result.events).toEqual([]);
          });
     });

     describe('returns', () => {
          const returns = (capacityCeiling: number): Job => ({
               kind: 'returns',
               settings: { default: { fraction: 0.5, capacityCeiling }, categories: {} },
          });

          it('should add back a fraction of recent sales to the floor', () => {
               const result = runJob(returns(50), input([buildLot()], { recentSales: new Map([['FF101', 30]]) }));
               expect(result.snapshot.get('FF101', 'FF101-L1')?.quantities.sales_floor).toBe(35);
               expect(result.events).toEqual([
                    expect.objectContaining({ type: 'returns', quantity: 15, beforeQuantity: 20, afterQuantity: 35 }),
               ]);
          });

          it('should drop returns above the capacity ceiling', () => {
               const result = runJob(returns(25), input([buildLot()], { recentSales: new Map([['FF101', 30]]) }));
               expect(result.snapshot.get('FF101', 'FF101-L1')?.quantities.sales_floor).toBe(25);
               expect(result.events[0].quantity).toBe(5);
          });

          it('should emit nothing when the floor is already at the ceiling', () => {
               const result = runJob(returns(20), input([buildLot()], { recentSales: new Map([['FF101', 30]]) }));
               expect(result.events).toEqual([]);
               expect(result.snapshot.get('FF101', 'FF101-L1')?.quantities.sales_floor).toBe(20);
          });

          it('should emit nothing without recent sales', () => {
               expect(runJob(returns(50), input([buildLot()])).events).toEqual([]);
          });
     });

     describe('shrink', () => {
          const shrink = (shrinkRate: number): Job => ({
               kind: 'shrink',
               settings: { default: { shrinkRate }, categories: {} },
          });

          it('should take losses from the sales floor first', () => {
               const result = runJob(shrink(0.1), input([buildLot()]));
               expect(result.snapshot.get('FF101', 'FF101-L1')?.quantities).toEqual({
                    backroom: 80,
                    sales_floor: 15,
               });
               expect(result.events).toEqual([
                    expect.objectContaining({ type: 'shrink', quantity: 5, beforeQuantity: 100, afterQuantity: 95 }),
               ]);
          });

          it('should continue into the backroom once the floor is empty', () => {
               const result = runJob(shrink(0.5), input([buildLot()], { rng: () => 0.9 }));
               expect(result.snapshot.get('FF101', 'FF101-L1')?.quantities).toEqual({
                    backroom: 55,
                    sales_floor: 0,
               });
               expect(result.events[0]).toEqual(
                    expect.objectContaining({ quantity: 45, beforeQuantity: 100, afterQuantity: 55 })
               );
          });

          it('should treat a zero loss as a silent outcome', () => {
               const result = runJob(shrink(0.1), input([buildLot()], { rng: () => 0.01 }));
               expect(result.events).toEqual([]);
               expect(result.snapshot.get('FF101', 'FF101-L1')?.quantities).toEqual({
                    backroom: 80,
                    sales_floor: 20,
               });
          });

          it('should leave quarantined stock alone', () => {
               const lot = buildLot({ quantities: { backroom: 0, sales_floor: 0, quarantine: 30 } });
               expect(runJob(shrink(1), input([lot], { rng: () => 0.99 })).events).toEqual([]);
          });

          it('should leave every configured quarantine location alone', () => {
               const lot = buildLot({ quantities: { backroom: 0, sales_floor: 10, damaged_hold: 50 } });

               const result = runJob(
                    shrink(1),
                    input([lot], { rng: () => 0.99, quarantineLocations: ['quarantine', 'damaged_hold'] })
               );

               expect(result.snapshot.get('FF101', 'FF101-L1')?.quantities).toEqual({
                    backroom: 0,
                    sales_floor: 1,
                    damaged_hold: 50,
               });
               expect(result.events[0]).toEqual(
                    expect.objectContaining({ quantity: 9, beforeQuantity: 10, afterQuantity: 1 })
               );
          });
     });

     describe('daily_expiry', () => {
          const expiry: Job = { kind: 'daily_expiry' };

          it('should zero every location of lots past their expiry date', () => {
               const lots = [
                    buildLot({ lotId: 'OLD', expiryDate: '2026-10-18' }),
                    buildLot({ lotId: 'TODAY', expiryDate: '2026-10-19' }),
               ];
               const result = runJob(expiry, input(lots));

               expect(result.snapshot.get('FF101', 'OLD')?.quantities).toEqual({ backroom: 0, sales_floor: 0 });
               expect(result.snapshot.get('FF101', 'TODAY')?.quantities).toEqual({ backroom: 80, sales_floor: 20 });
               expect(result.events).toEqual([
                    expect.objectContaining({
                         type: 'daily_expiry',
                         lot: 'OLD',
                         quantity: 100,
                         beforeQuantity: 100,
                         afterQuantity: 0,
                    }),
               ]);
          });

          it('should be idempotent', () => {
               const first = runJob(expiry, input([buildLot({ expiryDate: '2026-10-01' })]));
               const second = runJob(expiry, { ...input([]), snapshot: first.snapshot });
               expect(second.events).toEqual([]);
          });
     });

     describe('receiving', () => {
          const receiving: Job = {
               kind: 'receiving',
               settings: { default: { parLevel: 40, shelfLifeDays: 14 }, categories: {} },
          };

          it('should do nothing when the backroom is at par', () => {
               const result = runJob(receiving, input([buildLot()]));
               expect(result.events).toEqual([]);
          });

          it('should top up the unexpired lot with the latest expiry', () => {
               const lots = [
                    buildLot({ lotId: 'L1', expiryDate: '2026-10-25', quantities: { backroom: 10, sales_floor: 0 } }),
                    buildLot({ lotId: 'L2', expiryDate: '2026-11-10', quantities: { backroom: 5, sales_floor: 0 } }),
               ];
               const result = runJob(receiving, input(lots));

               expect(result.snapshot.get('FF101', 'L2')?.quantities.backroom).toBe(30);
               expect(result.events).toEqual([
                    expect.objectContaining({ type: 'receiving', lot: 'L2', quantity: 25, beforeQuantity: 5, afterQuantity: 30 }),
               ]);
          });

          it('should open a new lot when every lot has expired', () => {
               const lots = [buildLot({ lotId: 'L1', expiryDate: '2026-10-10', quantities: { backroom: 0, sales_floor: 0 } })];
               const result = runJob(receiving, input(lots));

               const opened = result.snapshot.get('FF101', 'SIM-FF101-20261019');
               expect(opened).toEqual(
                    expect.objectContaining({
                         expiryDate: '2026-11-02',
                         store: 'store-01',
                         quantities: { backroom: 40, sales_floor: 0 },
                    })
               );
               expect(result.events[0]).toEqual(
                    expect.objectContaining({ lot: 'SIM-FF101-20261019', quantity: 40, beforeQuantity: 0, afterQuantity: 40 })
               );
          });
     });

     describe('buildJobs', () => {
          it('should build scheduled jobs in priority order', () => {
               const jobs = buildJobs(testAppConfig().simulation);
               expect(jobs.map((job) => job.kind)).toEqual([
                    'receiving',
                    'returns',
                    'sell_down',
                    'shrink',
                    'daily_expiry',
               ]);
          });
     });

     describe('invariants', () => {
          it('should keep quantities non-negative and locations balanced across many runs', () => {
               const config = testAppConfig({
                    simulation: {
                         intervals: { receiving: 1, returns: 1, sell_down: 1, shrink: 1, daily_expiry: 1 },
                         sellDown: { default: { unitsPerRun: 25, jitterPct: 0.8 } },
                         returns: { default: { fraction: 0.3, capacityCeiling: 40 } },
                         shrink: { default: { shrinkRate: 0.2 } },
                         receiving: { default: { parLevel: 30, shelfLifeDays: 3 } },
                    },
               }).simulation;
               const jobs = buildJobs(config);
               const rng = createRng(1234);
               let snapshot = new InventorySnapshot([
                    buildLot(),
                    buildLot({ productCode: 'PR201', lotId: 'PR201-L1', expiryDate: '2026-10-21' }),
               ]);

               for (let day = 0; day < 20; day++) {
                    const now = new Date(NOW.getTime() + day * 24 * 60 * 60 * 1000);
                    for (const job of jobs) {
                         const result = runJob(job, { snapshot, rng, now, recentSales: new Map([['FF101', 20]]) });
                         snapshot = result.snapshot;
                         for (const lot of snapshot.lots()) {
                              const values = Object.values(lot.quantities);
                              expect(values.every((quantity) => Number.isInteger(quantity) && quantity >= 0)).toBe(true);
                              expect(quantityOnHand(lot)).toBe(
                                   (lot.quantities.backroom ?? 0) + (lot.quantities.sales_floor ?? 0)
                              );
                         }
                         for (const event of result.events) {
                              expect(event.quantity).toBeGreaterThanOrEqual(0);
                              expect(event.afterQuantity).toBeGreaterThanOrEqual(0);
                         }
                    }
               }
          });
     });
});
