import { PgInventoryRepository } from '@stockwatch/shared/src/repositories/pg-inventory-repository';
import { LotNotFoundError, NegativeQuantityError, RepositoryError } from '@stockwatch/shared/src/utils/errors';
import { buildLot, createMockPool } from '../helpers/testUtils';

const lockedRow = { product_code: 'FF101', lot_id: 'FF101-L1' };
const quantityRows = [
     { product_code: 'FF101', lot_id: 'FF101-L1', location: 'backroom', quantity: 80 },
     { product_code: 'FF101', lot_id: 'FF101-L1', location: 'sales_floor', quantity: 20 },
];

describe('PgInventoryRepository (Unit)', () => {
     describe('getSnapshot', () => {
          it('should group quantity rows into lots', async () => {
               const { pool, client } = createMockPool();
               client.query.mockResolvedValueOnce({
                    rows: [
                         {
                              product_code: 'FF101',
                              product_name: 'Greek Yogurt 500g',
                              category: 'dairy',
                              lot_id: 'FF101-L1',
                              store: 'store-01',
                              expiry_date: '2026-11-05',
                              location: 'backroom',
                              quantity: 80,
                         },
                         {
                              product_code: 'FF101',
                              product_name: 'Greek Yogurt 500g',
                              category: 'dairy',
                              lot_id: 'FF101-L1',
                              store: 'store-01',
                              expiry_date: '2026-11-05',
                              location: 'sales_floor',
                              quantity: 20,
                         },
                         {
                              product_code: 'PR201',
                              product_name: 'Canned Beans',
                              category: 'pantry',
                              lot_id: 'PR201-L1',
                              store: 'store-02',
                              expiry_date: null,
                              location: null,
                              quantity: null,
                         },
                    ],
               } as never);

               const snapshot = await new PgInventoryRepository(pool).getSnapshot();

               expect(snapshot.lots()).toEqual([
                    buildLot(),
                    {
                         productCode: 'PR201',
                         productName: 'Canned Beans',
                         category: 'pantry',
                         lotId: 'PR201-L1',
                         store: 'store-02',
                         expiryDate: null,
                         quantities: {},
                    },
               ]);
               expect(client.release).toHaveBeenCalled();
          });

          it('should wrap connection failures in a RepositoryError', async () => {
               const { pool } = createMockPool();
               jest.spyOn(pool, 'connect').mockRejectedValueOnce(new Error('ECONNREFUSED') as never);

               await expect(new PgInventoryRepository(pool).getSnapshot()).rejects.toBeInstanceOf(RepositoryError);
          });
     });

     describe('commit', () => {
          it('should lock the lots and upsert the new quantities', async () => {
               const { pool, client } = createMockPool();
               client.query
                    .mockResolvedValueOnce({ rows: [] } as never) // BEGIN
                    .mockResolvedValueOnce({ rows: [lockedRow] } as never)
                    .mockResolvedValueOnce({ rows: quantityRows } as never)
                    .mockResolvedValue({ rows: [] } as never);

               await new PgInventoryRepository(pool).commit({
                    createdLots: [],
                    deltas: [
                         { productCode: 'FF101', lotId: 'FF101-L1', location: 'sales_floor', delta: -5 },
                         { productCode: 'FF101', lotId: 'FF101-L1', location: 'sales_floor', delta: -5 },
                         { productCode: 'FF101', lotId: 'FF101-L1', location: 'quarantine', delta: 3 },
                    ],
               });

               expect(client.query).toHaveBeenNthCalledWith(2, expect.stringContaining('FOR UPDATE'), [
                    ['FF101'],
                    ['FF101-L1'],
               ]);
               expect(client.query).toHaveBeenNthCalledWith(4, expect.stringContaining('INSERT INTO lot_quantity'), [
                    'FF101',
                    'FF101-L1',
                    'sales_floor',
                    10,
               ]);
               expect(client.query).toHaveBeenNthCalledWith(5, expect.stringContaining('INSERT INTO lot_quantity'), [
                    'FF101',
                    'FF101-L1',
                    'quarantine',
                    3,
               ]);
               expect(client.query).toHaveBeenLastCalledWith('COMMIT');
          });

          it('should write nothing when a delta would go negative', async () => {
               const { pool, client } = createMockPool();
               client.query
                    .mockResolvedValueOnce({ rows: [] } as never)
                    .mockResolvedValueOnce({ rows: [lockedRow] } as never)
                    .mockResolvedValueOnce({ rows: quantityRows } as never)
                    .mockResolvedValue({ rows: [] } as never);

               const commit = new PgInventoryRepository(pool).commit({
                    createdLots: [],
                    deltas: [
                         { productCode: 'FF101', lotId: 'FF101-L1', location: 'backroom', delta: -10 },
                         { productCode: 'FF101', lotId: 'FF101-L1', location: 'sales_floor', delta: -25 },
                    ],
               });

               await expect(commit).rejects.toBeInstanceOf(NegativeQuantityError);
               expect(client.query).toHaveBeenCalledTimes(4);
               expect(client.query).toHaveBeenLastCalledWith('ROLLBACK');
          });

          it('should reject deltas for an unknown lot', async () => {
               const { pool, client } = createMockPool();
               client.query.mockResolvedValue({ rows: [] } as never);

               const commit = new PgInventoryRepository(pool).commit({
                    createdLots: [],
                    deltas: [{ productCode: 'FF101', lotId: 'FF101-L9', location: 'backroom', delta: 1 }],
               });

               await expect(commit).rejects.toBeInstanceOf(LotNotFoundError);
               expect(client.query).toHaveBeenLastCalledWith('ROLLBACK');
          });

          it('should insert created lots with their quantities', async () => {
               const { pool, client } = createMockPool();
               client.query.mockResolvedValue({ rows: [] } as never);

               await new PgInventoryRepository(pool).commit({ createdLots: [buildLot()], deltas: [] });

               expect(client.query).toHaveBeenCalledTimes(6);
               expect(client.query).toHaveBeenNthCalledWith(2, expect.stringContaining('INSERT INTO product'), [
                    'FF101',
                    'Greek Yogurt 500g',
                    'dairy',
               ]);
               expect(client.query).toHaveBeenNthCalledWith(3, expect.stringContaining('INSERT INTO inventory_lot'), [
                    'FF101',
                    'FF101-L1',
                    'store-01',
                    '2026-11-05',
               ]);
          });

          it('should skip the database for an empty change', async () => {
               const { pool } = createMockPool();

               await new PgInventoryRepository(pool).commit({ createdLots: [], deltas: [] });

               expect(pool.connect).not.toHaveBeenCalled();
          });
     });

     describe('applyDelta', () => {
          it('should return the new quantity', async () => {
               const { pool, client } = createMockPool();
               client.query
                    .mockResolvedValueOnce({ rows: [] } as never)
                    .mockResolvedValueOnce({ rows: [lockedRow] } as never)
                    .mockResolvedValueOnce({ rows: quantityRows } as never)
                    .mockResolvedValue({ rows: [] } as never);

               expect(await new PgInventoryRepository(pool).applyDelta('FF101', 'FF101-L1', 'backroom', -30)).toBe(50);
          });
     });
});
