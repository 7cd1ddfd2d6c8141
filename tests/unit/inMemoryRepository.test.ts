import {
     InMemoryInventoryRepository,
     applyChanges,
} from '@stockwatch/shared/src/repositories/inventory-repository';
import { InventorySnapshot } from '@stockwatch/shared/src/domain/inventory-snapshot';
import {
     LotNotFoundError,
     NegativeQuantityError,
     ValidationError,
} from '@stockwatch/shared/src/utils/errors';
import { buildLot } from '../helpers/testUtils';

describe('InMemoryInventoryRepository', () => {
     it('should apply deltas and return the new quantity', async () => {
          const repository = new InMemoryInventoryRepository([buildLot()]);

          expect(await repository.applyDelta('FF101', 'FF101-L1', 'sales_floor', -5)).toBe(15);
          expect(await repository.applyDelta('FF101', 'FF101-L1', 'quarantine', 5)).toBe(5);

          const lot = (await repository.getSnapshot()).get('FF101', 'FF101-L1');
          expect(lot?.quantities).toEqual({ backroom: 80, sales_floor: 15, quarantine: 5 });
     });

     it('should refuse a delta that would go negative', async () => {
          const repository = new InMemoryInventoryRepository([buildLot()]);

          const error = await repository.applyDelta('FF101', 'FF101-L1', 'sales_floor', -21).catch((err: unknown) => err);

          expect(error).toBeInstanceOf(NegativeQuantityError);
          expect(error).toMatchObject({ requested: -21, available: 20, location: 'sales_floor' });
     });

     it('should refuse deltas for unknown lots', async () => {
          const repository = new InMemoryInventoryRepository([buildLot()]);

          await expect(repository.applyDelta('FF101', 'FF101-L9', 'backroom', 1)).rejects.toBeInstanceOf(
               LotNotFoundError
          );
     });

     it('should serialize concurrent deltas', async () => {
          const repository = new InMemoryInventoryRepository([buildLot()]);

          const results = await Promise.allSettled(
               Array.from({ length: 25 }, () => repository.applyDelta('FF101', 'FF101-L1', 'sales_floor', -1))
          );

          expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(20);
          expect((await repository.getSnapshot()).get('FF101', 'FF101-L1')?.quantities.sales_floor).toBe(0);
     });

     it('should commit all changes or none', async () => {
          const repository = new InMemoryInventoryRepository([buildLot()]);
          const before = await repository.getSnapshot();

          await expect(
               repository.commit({
                    createdLots: [buildLot({ lotId: 'FF101-L2', quantities: { backroom: 10 } })],
                    deltas: [
                         { productCode: 'FF101', lotId: 'FF101-L1', location: 'backroom', delta: -10 },
                         { productCode: 'FF101', lotId: 'FF101-L2', location: 'backroom', delta: -11 },
                    ],
               })
          ).rejects.toBeInstanceOf(NegativeQuantityError);

          expect(await repository.getSnapshot()).toBe(before);
     });
});

describe('applyChanges', () => {
     it('should add created lots before applying deltas', () => {
          const next = applyChanges(new InventorySnapshot([buildLot()]), {
               createdLots: [buildLot({ lotId: 'FF101-L2', quantities: {} })],
               deltas: [{ productCode: 'FF101', lotId: 'FF101-L2', location: 'backroom', delta: 12 }],
          });

          expect(next.get('FF101', 'FF101-L2')?.quantities).toEqual({ backroom: 12 });
     });

     it('should reject a created lot that already exists', () => {
          expect(() =>
               applyChanges(new InventorySnapshot([buildLot()]), { createdLots: [buildLot()], deltas: [] })
          ).toThrow(ValidationError);
     });
});
