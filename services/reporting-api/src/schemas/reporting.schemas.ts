import { DECISION_OUTCOMES, EVENT_TYPES, FLAG_REASONS } from '@stockwatch/shared/src/types/inventory.types';

const errorResponse = (description: string, code: string, message: string) => ({
     description,
     type: 'object',
     properties: {
          error: { type: 'string', example: code },
          message: { type: 'string', example: message },
     },
});

const internalError = errorResponse('Internal server error', 'INTERNAL_ERROR', 'An unexpected error occurred');

const eventRecord = {
     type: 'object',
     properties: {
          ts: { type: 'string', format: 'date-time' },
          type: { type: 'string', enum: [...EVENT_TYPES] },
          product: { type: 'string', example: 'FF101' },
          lot: { type: ['string', 'null'], example: 'FF101-L1' },
          quantity: { type: 'integer', example: 10 },
          before_quantity: { type: 'integer', example: 20 },
          after_quantity: { type: 'integer', example: 10 },
          source: { type: 'string', example: 'simulator' },
     },
};

const flaggedRecord = {
     type: 'object',
     properties: {
          default_code: { type: 'string', example: 'FF101' },
          outcome: { type: 'string', enum: [...DECISION_OUTCOMES] },
          reason: { type: ['string', 'null'], enum: [...FLAG_REASONS, null] },
          reasons: { type: 'array', items: { type: 'string', enum: [...FLAG_REASONS] } },
          lot: { type: ['string', 'null'] },
          suggested_qty: { type: 'integer', example: 40 },
          price_markdown_pct: { type: ['number', 'null'], example: 30 },
          notes: { type: 'string' },
          product_name: { type: 'string', example: 'Greek Yogurt 500g' },
          category: { type: 'string', example: 'dairy' },
          stores: { type: 'array', items: { type: 'string' } },
          qty: { type: 'integer', example: 100 },
     },
};

export const getFlaggedSchema = {
     tags: ['reporting'],
     summary: 'Current flagged decisions',
     description: 'The artifact published by the last successful sync cycle, with its timestamp.',
     response: {
          200: {
               description: 'Published decisions',
               type: 'object',
               properties: {
                    lastSync: { type: ['string', 'null'], format: 'date-time' },
                    decisions: { type: 'array', items: flaggedRecord },
               },
          },
          503: errorResponse('Artifact unreadable', 'REPOSITORY_ERROR', 'Cannot read var/flagged-decisions.json'),
          500: internalError,
     },
};

export const getEventsSchema = {
     tags: ['events'],
     summary: 'Query the event log',
     description: 'Newest first unless order=asc. `type` takes a comma-separated list of event types.',
     querystring: {
          type: 'object',
          properties: {
               type: { type: 'string', example: 'sell_down,returns' },
               product: { type: 'string', example: 'FF101' },
               since: { type: 'string', format: 'date-time' },
               until: { type: 'string', format: 'date-time' },
               order: { type: 'string', enum: ['asc', 'desc'], default: 'desc' },
               limit: { type: 'integer', minimum: 1, maximum: 1000, default: 100 },
          },
     },
     response: {
          200: {
               description: 'Matching events',
               type: 'object',
               properties: {
                    count: { type: 'integer' },
                    events: { type: 'array', items: eventRecord },
               },
          },
          400: errorResponse('Invalid filter', 'VALIDATION_ERROR', 'Unknown event type: restock'),
          500: internalError,
     },
};

const typeTotals = {
     type: 'object',
     properties: {
          events: { type: 'integer' },
          units: { type: 'integer' },
     },
};

export const getEventMetricsSchema = {
     tags: ['events'],
     summary: 'Event totals by type',
     querystring: {
          type: 'object',
          properties: {
               since: { type: 'string', format: 'date-time' },
          },
     },
     response: {
          200: {
               description: 'Totals per event type',
               type: 'object',
               properties: {
                    since: { type: ['string', 'null'], format: 'date-time' },
                    totals: {
                         type: 'object',
                         properties: Object.fromEntries(EVENT_TYPES.map((type) => [type, typeTotals])),
                    },
               },
          },
          500: internalError,
     },
};

export const createRecallSchema = {
     tags: ['recalls'],
     summary: 'Quarantine recalled stock',
     description: 'Moves all sellable stock of the given products or categories into quarantine.',
     body: {
          type: 'object',
          properties: {
               productCodes: { type: 'array', items: { type: 'string', minLength: 1 }, example: ['FF101'] },
               categories: { type: 'array', items: { type: 'string', minLength: 1 }, example: ['dairy'] },
          },
     },
     response: {
          201: {
               description: 'Recall applied',
               type: 'object',
               properties: {
                    recalledAt: { type: 'string', format: 'date-time' },
                    lots: { type: 'integer', example: 2 },
                    unitsQuarantined: { type: 'integer', example: 120 },
               },
          },
          400: errorResponse(
               'Invalid recall',
               'VALIDATION_ERROR',
               'Recall needs at least one product code or category'
          ),
          503: errorResponse('Inventory unavailable', 'REPOSITORY_ERROR', 'Failed to commit inventory changes'),
          500: internalError,
     },
};

export const getQuarantinedSchema = {
     tags: ['recalls'],
     summary: 'Lots holding quarantined stock',
     response: {
          200: {
               description: 'Quarantined lots',
               type: 'object',
               properties: {
                    lots: {
                         type: 'array',
                         items: {
                              type: 'object',
                              properties: {
                                   productCode: { type: 'string' },
                                   lotId: { type: 'string' },
                                   store: { type: 'string' },
                                   quantity: { type: 'integer' },
                              },
                         },
                    },
               },
          },
          500: internalError,
     },
};
