import Fastify, { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import { registerReportingRoutes, ReportingRoutesOptions } from './routes/reporting';

export interface BuildAppOptions extends ReportingRoutesOptions {
     logger?: boolean;
     docs?: boolean;
}

function correlationId(header: string | string[] | undefined): string {
     if (typeof header === 'string' && header.length > 0) {
          return header;
     }
     return `req-${Date.now()}`;
}

export async function buildReportingApp(options: BuildAppOptions): Promise<FastifyInstance> {
     const app = Fastify({
          logger: options.logger ?? true,
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => correlationId(req.headers['x-correlation-id']),
          ajv: {
               customOptions: {
                    removeAdditional: 'all',
                    coerceTypes: true,
                    useDefaults: true,
                    strict: false,
               },
          },
     });

     await app.register(cors, {
          origin: true,
     });

     if (options.docs !== false) {
          await app.register(swagger, {
               openapi: {
                    info: {
                         title: 'Stockwatch Reporting API',
                         description: 'Flagged shrink decisions, the inventory event log and recalls',
                         version: '1.0.0',
                    },
                    servers: [{ url: 'http://localhost:3100', description: 'Development' }],
                    tags: [
                         { name: 'reporting', description: 'Published flagged decisions' },
                         { name: 'events', description: 'Inventory event log' },
                         { name: 'recalls', description: 'Recall quarantine' },
                         { name: 'health', description: 'Health checks' },
                    ],
               },
          });

          await app.register(swaggerUi, {
               routePrefix: '/docs',
               uiConfig: {
                    docExpansion: 'list',
                    deepLinking: true,
               },
          });
     }

     app.get(
          '/health',
          {
               schema: {
                    tags: ['health'],
                    description: 'Basic health check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ok' },
                                   timestamp: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          async () => {
               return {
                    status: 'ok',
                    timestamp: new Date().toISOString(),
               };
          }
     );

     await app.register(registerReportingRoutes, {
          store: options.store,
          sink: options.sink,
          recallService: options.recallService,
     });

     return app;
}
