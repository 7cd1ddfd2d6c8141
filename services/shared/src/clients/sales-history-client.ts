import { z } from 'zod';
import { SalesApiError } from '../utils/errors';
import { logger } from '../utils/logger';

/** External record of units sold, used when the event log has no recent activity. */
export interface SalesHistorySource {
     unitsSold(productCode: string, since: Date): Promise<number>;
}

const unitsSoldResponseSchema = z.object({
     product: z.string(),
     unitsSold: z.number().nonnegative(),
});

export class HttpSalesHistoryClient implements SalesHistorySource {
     constructor(
          private baseUrl: string,
          private apiKey: string
     ) {}

     async unitsSold(productCode: string, since: Date): Promise<number> {
          logger.debug({ productCode, since: since.toISOString() }, 'Sales history unitsSold call');

          const params = new URLSearchParams({ product: productCode, since: since.toISOString() });
          const response = await fetch(`${this.baseUrl}/sales?${params.toString()}`, {
               headers: {
                    Authorization: `Bearer ${this.apiKey}`,
               },
          });

          if (!response.ok) {
               throw new SalesApiError(response.status, await response.text());
          }

          const parsed = unitsSoldResponseSchema.safeParse(await response.json());
          if (!parsed.success) {
               throw new SalesApiError(response.status, `Unexpected sales response for ${productCode}`);
          }
          return parsed.data.unitsSold;
     }
}

/**
 * Fixed per-product totals; products it does not know sold nothing.
 */
export class MockSalesHistoryClient implements SalesHistorySource {
     private readonly totals: Map<string, number>;

     constructor(totals: Record<string, number> = {}) {
          this.totals = new Map(Object.entries(totals));
     }

     async unitsSold(productCode: string, since: Date): Promise<number> {
          logger.debug({ productCode, since: since.toISOString() }, 'Mock sales history unitsSold');
          return this.totals.get(productCode) ?? 0;
     }
}

export function createSalesHistorySource(): SalesHistorySource | undefined {
     const sourceType = process.env.SALES_SOURCE || 'none';

     if (sourceType === 'none') {
          return undefined;
     }

     if (sourceType === 'mock') {
          logger.info('Using mock sales history client');
          return new MockSalesHistoryClient();
     }

     const baseUrl = process.env.SALES_API_URL;
     const apiKey = process.env.SALES_API_KEY;

     if (!baseUrl || !apiKey) {
          throw new Error('SALES_API_URL and SALES_API_KEY must be set for HTTP client');
     }

     logger.info({ baseUrl }, 'Using HTTP sales history client');
     return new HttpSalesHistoryClient(baseUrl, apiKey);
}
