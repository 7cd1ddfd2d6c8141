import { FastifyInstance, FastifyReply } from 'fastify';
import { summarizeEvents } from '@stockwatch/shared/src/events/event-metrics';
import { EventSink, toEventRecord } from '@stockwatch/shared/src/events/event-sink';
import { FlaggedDecisionStore } from '@stockwatch/shared/src/integration/flagged-store';
import { RecallService } from '@stockwatch/shared/src/services/recall-service';
import { EVENT_TYPES, EventType } from '@stockwatch/shared/src/types/inventory.types';
import { DomainError, ValidationError } from '@stockwatch/shared/src/utils/errors';
import { logger } from '@stockwatch/shared/src/utils/logger';
import {
     createRecallSchema,
     getEventMetricsSchema,
     getEventsSchema,
     getFlaggedSchema,
     getQuarantinedSchema,
} from '../schemas/reporting.schemas';

export interface ReportingRoutesOptions {
     store: FlaggedDecisionStore;
     sink: EventSink;
     recallService: RecallService;
}

interface EventsQuery {
     type?: string;
     product?: string;
     since?: string;
     until?: string;
     order?: 'asc' | 'desc';
     limit?: number;
}

function sendError(reply: FastifyReply, error: unknown, context: string): void {
     if (error instanceof DomainError) {
          reply.code(error.statusCode).send({
               error: error.code,
               message: error.message,
          });
          return;
     }
     logger.error({ error }, context);
     reply.code(500).send({
          error: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
     });
}

function isEventType(value: string): value is EventType {
     return EVENT_TYPES.some((type) => type === value);
}

export function parseEventTypes(raw: string | undefined): EventType[] | undefined {
     if (raw === undefined || raw.trim() === '') {
          return undefined;
     }
     const types: EventType[] = [];
     for (const part of raw.split(',')) {
          const value = part.trim();
          if (!isEventType(value)) {
               throw new ValidationError(`Unknown event type: ${value}`);
          }
          types.push(value);
     }
     return types;
}

function parseInstant(raw: string | undefined, field: string): Date | undefined {
     if (raw === undefined) {
          return undefined;
     }
     const date = new Date(raw);
     if (Number.isNaN(date.getTime())) {
          throw new ValidationError(`${field} must be an ISO timestamp`);
     }
     return date;
}

export async function registerReportingRoutes(app: FastifyInstance, options: ReportingRoutesOptions) {
     const { store, sink, recallService } = options;

     // Latest published decisions
     app.get('/flagged', { schema: getFlaggedSchema }, async (_request, reply) => {
          try {
               const [decisions, lastSync] = await Promise.all([store.current(), store.lastSync()]);
               reply.send({
                    lastSync: lastSync ? lastSync.toISOString() : null,
                    decisions,
               });
          } catch (error) {
               sendError(reply, error, 'Failed to read flagged decisions');
          }
     });

     app.get<{ Querystring: EventsQuery }>('/events', { schema: getEventsSchema }, async (request, reply) => {
          const query = request.query;

          try {
               const events = await sink.query({
                    types: parseEventTypes(query.type),
                    product: query.product,
                    since: parseInstant(query.since, 'since'),
                    until: parseInstant(query.until, 'until'),
                    order: query.order ?? 'desc',
                    limit: query.limit ?? 100,
               });
               reply.send({
                    count: events.length,
                    events: events.map(toEventRecord),
               });
          } catch (error) {
               sendError(reply, error, 'Failed to query events');
          }
     });

     app.get<{ Querystring: { since?: string } }>(
          '/events/metrics',
          { schema: getEventMetricsSchema },
          async (request, reply) => {
               try {
                    const since = parseInstant(request.query.since, 'since');
                    const events = await sink.query({ since });
                    reply.send({
                         since: since ? since.toISOString() : null,
                         totals: summarizeEvents(events),
                    });
               } catch (error) {
                    sendError(reply, error, 'Failed to compute event metrics');
               }
          }
     );

     app.post<{ Body: { productCodes?: string[]; categories?: string[] } }>(
          '/recalls',
          { schema: createRecallSchema },
          async (request, reply) => {
               try {
                    const result = await recallService.recall({
                         productCodes: request.body.productCodes,
                         categories: request.body.categories,
                    });

                    request.log.info(
                         { lots: result.lots, unitsQuarantined: result.unitsQuarantined },
                         'Recall applied'
                    );

                    reply.code(201).send({
                         recalledAt: result.recalledAt.toISOString(),
                         lots: result.lots,
                         unitsQuarantined: result.unitsQuarantined,
                    });
               } catch (error) {
                    sendError(reply, error, 'Failed to apply recall');
               }
          }
     );

     app.get('/recalls/quarantined', { schema: getQuarantinedSchema }, async (_request, reply) => {
          try {
               reply.send({ lots: await recallService.listQuarantined() });
          } catch (error) {
               sendError(reply, error, 'Failed to list quarantined lots');
          }
     });
}
