import { promises as fs } from 'fs';
import { dirname } from 'path';
import { EventAck, EventFilters, InventoryEvent } from '../types/inventory.types';
import { RepositoryError, describeError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { isMissingFile } from '../utils/files';
import { SerialQueue } from '../utils/serial-queue';
import {
     EventSink,
     applyFilters,
     assertChronological,
     eventRecordSchema,
     fromEventRecord,
     stampNotBefore,
     toEventRecord,
} from './event-sink';

const log = createChildLogger({ component: 'file-event-sink' });

const NEWLINE = 0x0a;

interface LogState {
     count: number;
     latest: Date | null;
     /** Bytes of complete lines already counted. */
     offset: number;
}

/**
 * Events as JSON lines in a single append-only file. Other processes may
 * append to the same file, so every write first reads whatever they added
 * since the last one.
 */
export class FileEventSink implements EventSink {
     private readonly queue = new SerialQueue();
     private state: LogState = emptyState();

     constructor(private readonly path: string) {}

     append(event: InventoryEvent): Promise<EventAck> {
          return this.queue.run(async () => {
               const state = await this.refresh();
               assertChronological(event, state.latest);
               await this.write([event]);
               return { sequence: state.count + 1 };
          });
     }

     record(events: readonly InventoryEvent[]): Promise<InventoryEvent[]> {
          return this.queue.run(async () => {
               if (events.length === 0) {
                    return [];
               }
               const state = await this.refresh();
               const stamped = stampNotBefore(events, state.latest);
               await this.write(stamped);
               return stamped;
          });
     }

     async query(filters: EventFilters = {}): Promise<InventoryEvent[]> {
          return applyFilters(await this.readAll(), filters);
     }

     private async write(events: readonly InventoryEvent[]): Promise<void> {
          const lines = events.map((event) => `${JSON.stringify(toEventRecord(event))}\n`).join('');
          try {
               await fs.mkdir(dirname(this.path), { recursive: true });
               await fs.appendFile(this.path, lines, 'utf-8');
          } catch (error) {
               throw new RepositoryError(`Failed to append to event log ${this.path}: ${describeError(error)}`, {
                    cause: error,
               });
          }
     }

     /**
      * Counts the complete lines appended since the last refresh, by this
      * process or another one. A truncated file is read again from the start.
      */
     private async refresh(): Promise<LogState> {
          let size: number;
          try {
               size = (await fs.stat(this.path)).size;
          } catch (error) {
               if (isMissingFile(error)) {
                    this.state = emptyState();
                    return this.state;
               }
               throw new RepositoryError(`Failed to read event log ${this.path}: ${describeError(error)}`, {
                    cause: error,
               });
          }

          let state = size < this.state.offset ? emptyState() : this.state;
          if (size > state.offset) {
               const chunk = await this.readRange(state.offset, size - state.offset);
               const end = chunk.lastIndexOf(NEWLINE);
               if (end >= 0) {
                    let { count, latest } = state;
                    for (const event of parseLines(chunk.subarray(0, end + 1).toString('utf-8'))) {
                         count += 1;
                         if (latest === null || event.timestamp.getTime() > latest.getTime()) {
                              latest = event.timestamp;
                         }
                    }
                    state = { count, latest, offset: state.offset + end + 1 };
               }
          }
          this.state = state;
          return state;
     }

     private async readRange(position: number, length: number): Promise<Buffer> {
          try {
               const handle = await fs.open(this.path, 'r');
               try {
                    const buffer = Buffer.alloc(length);
                    const { bytesRead } = await handle.read(buffer, 0, length, position);
                    return buffer.subarray(0, bytesRead);
               } finally {
                    await handle.close();
               }
          } catch (error) {
               throw new RepositoryError(`Failed to read event log ${this.path}: ${describeError(error)}`, {
                    cause: error,
               });
          }
     }

     private async readAll(): Promise<InventoryEvent[]> {
          let text: string;
          try {
               text = await fs.readFile(this.path, 'utf-8');
          } catch (error) {
               if (isMissingFile(error)) {
                    return [];
               }
               throw new RepositoryError(`Failed to read event log ${this.path}: ${describeError(error)}`, {
                    cause: error,
               });
          }

          return parseLines(text, (line) => {
               log.warn({ path: this.path, line }, 'Skipping malformed event log line');
          });
     }
}

function emptyState(): LogState {
     return { count: 0, latest: null, offset: 0 };
}

function parseLines(text: string, onMalformed?: (line: number) => void): InventoryEvent[] {
     const events: InventoryEvent[] = [];
     text.split('\n').forEach((line, index) => {
          if (!line.trim()) {
               return;
          }
          const parsed = eventRecordSchema.safeParse(safeJson(line));
          if (!parsed.success) {
               onMalformed?.(index + 1);
               return;
          }
          events.push(fromEventRecord(parsed.data));
     });
     return events;
}

function safeJson(line: string): unknown {
     try {
          return JSON.parse(line);
     } catch {
          return undefined;
     }
}
