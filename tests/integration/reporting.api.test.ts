import { join } from 'path';
import { FastifyInstance } from 'fastify';
import { buildReportingApp } from '../../services/reporting-api/src/app';
import { FileFlaggedDecisionStore } from '@stockwatch/shared/src/integration/flagged-store';
import { InMemoryInventoryRepository } from '@stockwatch/shared/src/repositories/inventory-repository';
import { RecallService } from '@stockwatch/shared/src/services/recall-service';
import { FlaggedDecisionRecord } from '@stockwatch/shared/src/types/inventory.types';
import { RepositoryError } from '@stockwatch/shared/src/utils/errors';
import {
     ManualClock,
     MemoryEventSink,
     buildEvent,
     buildLot,
     makeTempDir,
     removeTempDir,
} from '../helpers/testUtils';

const NOW = new Date('2026-10-19T12:00:00.000Z');

const record: FlaggedDecisionRecord = {
     default_code: 'FF101',
     outcome: 'MARKDOWN',
     reason: 'near_expiry',
     reasons: ['near_expiry', 'overstock'],
     lot: 'FF101-L1',
     suggested_qty: 100,
     price_markdown_pct: 40,
     notes: '',
     product_name: 'Greek Yogurt 500g',
     category: 'dairy',
     stores: ['store-01'],
     qty: 100,
};

describe('Reporting API - Integration Tests', () => {
     let app: FastifyInstance;
     let dir: string;
     let store: FileFlaggedDecisionStore;
     let sink: MemoryEventSink;
     let repository: InMemoryInventoryRepository;

     beforeEach(async () => {
          dir = await makeTempDir();
          store = new FileFlaggedDecisionStore(join(dir, 'flagged.json'), join(dir, 'last-sync.json'));
          sink = new MemoryEventSink();
          repository = new InMemoryInventoryRepository([
               buildLot(),
               buildLot({ productCode: 'PR201', lotId: 'PR201-L1', category: 'produce', quantities: { quarantine: 7 } }),
          ]);
          app = await buildReportingApp({
               store,
               sink,
               recallService: new RecallService(repository, sink, new ManualClock(NOW)),
               logger: false,
               docs: false,
          });
          await app.ready();
     });

     afterEach(async () => {
          await app.close();
          await removeTempDir(dir);
     });

     describe('GET /health', () => {
          it('should report ok', async () => {
               const response = await app.inject({ method: 'GET', url: '/health' });

               expect(response.statusCode).toBe(200);
               expect(JSON.parse(response.body).status).toBe('ok');
          });
     });

     describe('GET /flagged', () => {
          it('should return an empty artifact before the first sync', async () => {
               const response = await app.inject({ method: 'GET', url: '/flagged' });

               expect(response.statusCode).toBe(200);
               expect(JSON.parse(response.body)).toEqual({ lastSync: null, decisions: [] });
          });

          it('should return the published decisions with the sync time', async () => {
               await store.replace([record]);
               await store.recordSync(NOW);

               const response = await app.inject({ method: 'GET', url: '/flagged' });

               expect(JSON.parse(response.body)).toEqual({ lastSync: '2026-10-19T12:00:00.000Z', decisions: [record] });
          });

          it('should return 503 when the artifact cannot be read', async () => {
               jest.spyOn(store, 'current').mockRejectedValueOnce(new RepositoryError('Cannot read flagged.json'));

               const response = await app.inject({ method: 'GET', url: '/flagged' });

               expect(response.statusCode).toBe(503);
               expect(JSON.parse(response.body)).toEqual({
                    error: 'REPOSITORY_ERROR',
                    message: 'Cannot read flagged.json',
               });
          });

          it('should return 500 on unexpected errors', async () => {
               jest.spyOn(store, 'lastSync').mockRejectedValueOnce(new Error('disk on fire'));

               const response = await app.inject({ method: 'GET', url: '/flagged' });

               expect(response.statusCode).toBe(500);
               expect(JSON.parse(response.body).error).toBe('INTERNAL_ERROR');
          });
     });

     describe('GET /events', () => {
          beforeEach(async () => {
               await sink.append(buildEvent({ timestamp: new Date('2026-10-19T10:00:00.000Z') }));
               await sink.append(
                    buildEvent({ timestamp: new Date('2026-10-19T11:00:00.000Z'), type: 'shrink', quantity: 2 })
               );
               await sink.append(
                    buildEvent({ timestamp: new Date('2026-10-19T12:00:00.000Z'), type: 'receiving', quantity: 30 })
               );
          });

          it('should return newest events first by default', async () => {
               const response = await app.inject({ method: 'GET', url: '/events' });

               expect(response.statusCode).toBe(200);
               const body = JSON.parse(response.body);
               expect(body.count).toBe(3);
               expect(body.events[0]).toEqual({
                    ts: '2026-10-19T12:00:00.000Z',
                    type: 'receiving',
                    product: 'FF101',
                    lot: 'FF101-L1',
                    quantity: 30,
                    before_quantity: 20,
                    after_quantity: 10,
                    source: 'simulator',
               });
          });

          it('should filter by type list, order and limit', async () => {
               const response = await app.inject({
                    method: 'GET',
                    url: '/events?type=sell_down,shrink&order=asc&limit=1',
               });

               const body = JSON.parse(response.body);
               expect(body.count).toBe(1);
               expect(body.events[0].type).toBe('sell_down');
          });

          it('should filter by time range', async () => {
               const response = await app.inject({
                    method: 'GET',
                    url: '/events?since=2026-10-19T10:30:00.000Z&until=2026-10-19T11:30:00.000Z',
               });

               expect(JSON.parse(response.body).events.map((event: { type: string }) => event.type)).toEqual(['shrink']);
          });

          it('should reject unknown event types', async () => {
               const response = await app.inject({ method: 'GET', url: '/events?type=restock' });

               expect(response.statusCode).toBe(400);
               expect(JSON.parse(response.body)).toEqual({
                    error: 'VALIDATION_ERROR',
                    message: 'Unknown event type: restock',
               });
          });

          it('should reject an out-of-range limit', async () => {
               const response = await app.inject({ method: 'GET', url: '/events?limit=0' });

               expect(response.statusCode).toBe(400);
          });

          it('should total events per type', async () => {
               const response = await app.inject({ method: 'GET', url: '/events/metrics' });

               const body = JSON.parse(response.body);
               expect(body.since).toBeNull();
               expect(body.totals.sell_down).toEqual({ events: 1, units: 10 });
               expect(body.totals.receiving).toEqual({ events: 1, units: 30 });
               expect(body.totals.returns).toEqual({ events: 0, units: 0 });
          });
     });

     describe('POST /recalls', () => {
          it('should quarantine the recalled stock', async () => {
               const response = await app.inject({
                    method: 'POST',
                    url: '/recalls',
                    payload: { productCodes: ['FF101'] },
               });

               expect(response.statusCode).toBe(201);
               expect(JSON.parse(response.body)).toEqual({
                    recalledAt: '2026-10-19T12:00:00.000Z',
                    lots: 1,
                    unitsQuarantined: 100,
               });
               expect(sink.events.map((event) => event.type)).toEqual(['recall_quarantine']);
          });

          it('should require a product code or category', async () => {
               const response = await app.inject({ method: 'POST', url: '/recalls', payload: {} });

               expect(response.statusCode).toBe(400);
               expect(JSON.parse(response.body).error).toBe('VALIDATION_ERROR');
          });

          it('should list quarantined lots', async () => {
               await app.inject({ method: 'POST', url: '/recalls', payload: { categories: ['dairy'] } });

               const response = await app.inject({ method: 'GET', url: '/recalls/quarantined' });

               expect(JSON.parse(response.body)).toEqual({
                    lots: [
                         { productCode: 'FF101', lotId: 'FF101-L1', store: 'store-01', quantity: 100 },
                         { productCode: 'PR201', lotId: 'PR201-L1', store: 'store-01', quantity: 7 },
                    ],
               });
          });
     });
});
