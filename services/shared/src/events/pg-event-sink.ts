import { Pool, PoolClient } from 'pg';
import { pool as defaultPool, withConnection, withTransaction } from '../db/client';
import { EventAck, EventFilters, EventType, InventoryEvent } from '../types/inventory.types';
import { guardRepository } from '../utils/errors';
import { EventSink, assertChronological, stampNotBefore } from './event-sink';

// Serializes appenders across processes for the duration of one transaction.
const EVENT_LOG_LOCK_KEY = 724_311;

interface EventRow {
     id: string | number;
     ts: Date;
     type: EventType;
     product: string;
     lot: string | null;
     quantity: number;
     before_quantity: number;
     after_quantity: number;
     source: string;
}

export class PgEventSink implements EventSink {
     constructor(private readonly db: Pool = defaultPool) {}

     async append(event: InventoryEvent): Promise<EventAck> {
          return guardRepository('append event', () =>
               withTransaction(async (client) => {
                    assertChronological(event, await lockLatest(client));
                    return { sequence: await insertEvent(client, event) };
               }, this.db)
          );
     }

     async record(events: readonly InventoryEvent[]): Promise<InventoryEvent[]> {
          if (events.length === 0) {
               return [];
          }
          return guardRepository('record events', () =>
               withTransaction(async (client) => {
                    const stamped = stampNotBefore(events, await lockLatest(client));
                    for (const event of stamped) {
                         await insertEvent(client, event);
                    }
                    return stamped;
               }, this.db)
          );
     }

     async query(filters: EventFilters = {}): Promise<InventoryEvent[]> {
          const conditions: string[] = [];
          const params: unknown[] = [];

          if (filters.types && filters.types.length > 0) {
               params.push(filters.types);
               conditions.push(`type = ANY($${params.length}::text[])`);
          }
          if (filters.product !== undefined) {
               params.push(filters.product);
               conditions.push(`product = $${params.length}`);
          }
          if (filters.since) {
               params.push(filters.since);
               conditions.push(`ts >= $${params.length}`);
          }
          if (filters.until) {
               params.push(filters.until);
               conditions.push(`ts <= $${params.length}`);
          }

          const direction = filters.order === 'desc' ? 'DESC' : 'ASC';
          let sql = `SELECT id, ts, type, product, lot, quantity, before_quantity, after_quantity, source
      FROM inventory_event`;
          if (conditions.length > 0) {
               sql += ` WHERE ${conditions.join(' AND ')}`;
          }
          sql += ` ORDER BY ts ${direction}, id ${direction}`;
          if (filters.limit !== undefined) {
               params.push(filters.limit);
               sql += ` LIMIT $${params.length}`;
          }

          return guardRepository('query events', () =>
               withConnection(async (client) => {
                    const { rows } = await client.query<EventRow>(sql, params);
                    return rows.map(toEvent);
               }, this.db)
          );
     }
}

/** Takes the appender lock for the transaction and returns the latest logged timestamp. */
async function lockLatest(client: PoolClient): Promise<Date | null> {
     await client.query('SELECT pg_advisory_xact_lock($1)', [EVENT_LOG_LOCK_KEY]);
     const { rows } = await client.query<{ latest: Date | null }>('SELECT max(ts) AS latest FROM inventory_event');
     return rows[0]?.latest ?? null;
}

async function insertEvent(client: PoolClient, event: InventoryEvent): Promise<number> {
     const { rows } = await client.query<{ id: string | number }>(
          `
    INSERT INTO inventory_event (
      ts, type, product, lot, quantity, before_quantity, after_quantity, source
    ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
    RETURNING id
  `,
          [
               event.timestamp,
               event.type,
               event.product,
               event.lot,
               event.quantity,
               event.beforeQuantity,
               event.afterQuantity,
               event.source,
          ]
     );
     return parseInt(String(rows[0].id), 10);
}

function toEvent(row: EventRow): InventoryEvent {
     return {
          timestamp: row.ts,
          type: row.type,
          product: row.product,
          lot: row.lot,
          quantity: Number(row.quantity),
          beforeQuantity: Number(row.before_quantity),
          afterQuantity: Number(row.after_quantity),
          source: row.source,
     };
}
