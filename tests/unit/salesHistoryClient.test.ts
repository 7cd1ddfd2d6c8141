import {
     HttpSalesHistoryClient,
     MockSalesHistoryClient,
     createSalesHistorySource,
} from '@stockwatch/shared/src/clients/sales-history-client';
import { SalesApiError } from '@stockwatch/shared/src/utils/errors';

const SINCE = new Date('2026-10-12T12:00:00.000Z');

describe('Sales history clients', () => {
     describe('HttpSalesHistoryClient', () => {
          const client = new HttpSalesHistoryClient('http://sales.test', 'test-secret');
          let fetchSpy: jest.SpyInstance;

          beforeEach(() => {
               fetchSpy = jest.spyOn(global, 'fetch');
          });

          afterEach(() => {
               fetchSpy.mockRestore();
          });

          it('should request units sold with the API key', async () => {
               fetchSpy.mockResolvedValueOnce(
                    new Response(JSON.stringify({ product: 'FF101', unitsSold: 42 }), { status: 200 })
               );

               expect(await client.unitsSold('FF101', SINCE)).toBe(42);
               expect(fetchSpy).toHaveBeenCalledWith(
                    'http://sales.test/sales?product=FF101&since=2026-10-12T12%3A00%3A00.000Z',
                    { headers: { Authorization: 'Bearer test-secret' } }
               );
          });

          it('should mark throttling as retriable', async () => {
               fetchSpy.mockResolvedValueOnce(new Response('slow down', { status: 429 }));

               const error = await client.unitsSold('FF101', SINCE).catch((err: unknown) => err);

               expect(error).toBeInstanceOf(SalesApiError);
               expect(error).toMatchObject({ upstreamStatus: 429, retriable: true, message: 'slow down' });
          });

          it('should mark other failures as not retriable', async () => {
               fetchSpy.mockResolvedValueOnce(new Response('bad request', { status: 400 }));

               await expect(client.unitsSold('FF101', SINCE)).rejects.toMatchObject({ retriable: false });
          });

          it('should reject a response of the wrong shape', async () => {
               fetchSpy.mockResolvedValueOnce(new Response(JSON.stringify({ total: 3 }), { status: 200 }));

               await expect(client.unitsSold('FF101', SINCE)).rejects.toThrow('Unexpected sales response for FF101');
          });
     });

     describe('MockSalesHistoryClient', () => {
          it('should answer zero for unknown products', async () => {
               const client = new MockSalesHistoryClient({ FF101: 12 });

               expect(await client.unitsSold('FF101', SINCE)).toBe(12);
               expect(await client.unitsSold('PR201', SINCE)).toBe(0);
          });
     });

     describe('createSalesHistorySource', () => {
          const saved = { ...process.env };

          afterEach(() => {
               process.env = { ...saved };
          });

          it('should have no source by default', () => {
               delete process.env.SALES_SOURCE;

               expect(createSalesHistorySource()).toBeUndefined();
          });

          it('should create the mock client', () => {
               process.env.SALES_SOURCE = 'mock';

               expect(createSalesHistorySource()).toBeInstanceOf(MockSalesHistoryClient);
          });

          it('should require a URL and key for the HTTP client', () => {
               process.env.SALES_SOURCE = 'http';
               delete process.env.SALES_API_URL;
               delete process.env.SALES_API_KEY;

               expect(() => createSalesHistorySource()).toThrow('SALES_API_URL and SALES_API_KEY must be set');

               process.env.SALES_API_URL = 'http://sales.test';
               process.env.SALES_API_KEY = 'test-secret';
               expect(createSalesHistorySource()).toBeInstanceOf(HttpSalesHistoryClient);
          });
     });
});
