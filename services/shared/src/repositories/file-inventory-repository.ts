import { InventorySnapshot } from '../domain/inventory-snapshot';
import { InventoryLot, SnapshotChanges } from '../types/inventory.types';
import { DomainError, RepositoryError, describeError } from '../utils/errors';
import { readJsonIfExists, writeJsonAtomic } from '../utils/files';
import { SerialQueue } from '../utils/serial-queue';
import {
     InventoryRepository,
     applyChanges,
     applyDeltaTo,
     locationQuantityOf,
} from './inventory-repository';
import { parseSeedInventory } from './seed-inventory';

/**
 * Snapshot kept in a JSON file, read before and rewritten atomically after
 * every change, so worker processes and later runs share one inventory.
 * The file is created from the seed lots on first use.
 *
 * Writes are serialized within a process only; concurrent writers in several
 * processes need the PostgreSQL backend.
 */
export class FileInventoryRepository implements InventoryRepository {
     private readonly queue = new SerialQueue();

     constructor(
          private readonly path: string,
          private readonly seed: () => InventoryLot[]
     ) {}

     getSnapshot(): Promise<InventorySnapshot> {
          return this.queue.run(() => this.load());
     }

     applyDelta(productCode: string, lotId: string, location: string, delta: number): Promise<number> {
          return this.queue.run(async () => {
               const next = applyDeltaTo(await this.load(), { productCode, lotId, location, delta });
               await this.save(next);
               return locationQuantityOf(next, productCode, lotId, location);
          });
     }

     commit(changes: SnapshotChanges): Promise<void> {
          return this.queue.run(async () => {
               await this.save(applyChanges(await this.load(), changes));
          });
     }

     private async load(): Promise<InventorySnapshot> {
          let raw: unknown;
          try {
               raw = await readJsonIfExists(this.path);
          } catch (error) {
               throw new RepositoryError(`Cannot read inventory state ${this.path}: ${describeError(error)}`, {
                    cause: error,
               });
          }

          if (raw === undefined) {
               const seeded = new InventorySnapshot(this.seed());
               await this.save(seeded);
               return seeded;
          }

          try {
               return new InventorySnapshot(parseSeedInventory(raw, this.path));
          } catch (error) {
               if (error instanceof DomainError) {
                    throw new RepositoryError(`Inventory state ${this.path} is corrupt: ${error.message}`, {
                         cause: error,
                    });
               }
               throw error;
          }
     }

     private async save(snapshot: InventorySnapshot): Promise<void> {
          try {
               await writeJsonAtomic(this.path, { lots: snapshot.lots() });
          } catch (error) {
               throw new RepositoryError(`Cannot write inventory state ${this.path}: ${describeError(error)}`, {
                    cause: error,
               });
          }
     }
}
