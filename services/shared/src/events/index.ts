import { resolve } from 'path';
import { logger } from '../utils/logger';
import { ValidationError } from '../utils/errors';
import { EventSink } from './event-sink';
import { FileEventSink } from './file-event-sink';
import { PgEventSink } from './pg-event-sink';

export * from './event-sink';
export * from './file-event-sink';
export * from './pg-event-sink';

export function createEventSink(): EventSink {
     const kind = process.env.EVENT_SINK || 'file';

     if (kind === 'file') {
          const path = resolve(process.env.EVENT_LOG_PATH || 'var/events.jsonl');
          logger.info({ path }, 'Using file event sink');
          return new FileEventSink(path);
     }

     if (kind === 'postgres') {
          logger.info('Using PostgreSQL event sink');
          return new PgEventSink();
     }

     throw new ValidationError(`Unknown EVENT_SINK "${kind}"`, ['EVENT_SINK: expected file or postgres']);
}
