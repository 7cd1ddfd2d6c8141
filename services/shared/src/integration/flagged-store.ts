import { z } from 'zod';
import { DECISION_OUTCOMES, FLAG_REASONS, FlaggedDecisionRecord } from '../types/inventory.types';
import { RepositoryError, describeError } from '../utils/errors';
import { readJsonIfExists, writeJsonAtomic } from '../utils/files';

export interface FlaggedDecisionStore {
     /** Replaces the whole artifact; readers never observe a partial write. */
     replace(records: readonly FlaggedDecisionRecord[]): Promise<void>;
     recordSync(at: Date): Promise<void>;
     current(): Promise<FlaggedDecisionRecord[]>;
     lastSync(): Promise<Date | null>;
}

const recordSchema = z.object({
     default_code: z.string(),
     outcome: z.enum(DECISION_OUTCOMES),
     reason: z.enum(FLAG_REASONS).nullable(),
     reasons: z.array(z.enum(FLAG_REASONS)),
     lot: z.string().nullable(),
     suggested_qty: z.number(),
     price_markdown_pct: z.number().nullable(),
     notes: z.string(),
     product_name: z.string(),
     category: z.string(),
     stores: z.array(z.string()),
     qty: z.number(),
});

const artifactSchema = z.array(recordSchema);

const lastSyncSchema = z.object({
     last_sync: z.string().datetime({ offset: true }),
});

export class FileFlaggedDecisionStore implements FlaggedDecisionStore {
     constructor(
          private readonly flaggedPath: string,
          private readonly lastSyncPath: string
     ) {}

     async replace(records: readonly FlaggedDecisionRecord[]): Promise<void> {
          await this.write(this.flaggedPath, records);
     }

     async recordSync(at: Date): Promise<void> {
          await this.write(this.lastSyncPath, { last_sync: at.toISOString() });
     }

     async current(): Promise<FlaggedDecisionRecord[]> {
          const raw = await this.read(this.flaggedPath);
          if (raw === undefined) {
               return [];
          }
          const parsed = artifactSchema.safeParse(raw);
          if (!parsed.success) {
               throw new RepositoryError(`Flagged decisions artifact ${this.flaggedPath} is malformed`, {
                    retriable: false,
               });
          }
          return parsed.data;
     }

     async lastSync(): Promise<Date | null> {
          const raw = await this.read(this.lastSyncPath);
          if (raw === undefined) {
               return null;
          }
          const parsed = lastSyncSchema.safeParse(raw);
          if (!parsed.success) {
               throw new RepositoryError(`Last-sync file ${this.lastSyncPath} is malformed`, { retriable: false });
          }
          return new Date(parsed.data.last_sync);
     }

     private async read(path: string): Promise<unknown> {
          try {
               return await readJsonIfExists(path);
          } catch (error) {
               throw new RepositoryError(`Cannot read ${path}: ${describeError(error)}`, { cause: error });
          }
     }

     private async write(path: string, data: unknown): Promise<void> {
          try {
               await writeJsonAtomic(path, data);
          } catch (error) {
               throw new RepositoryError(`Cannot write ${path}: ${describeError(error)}`, { cause: error });
          }
     }
}
