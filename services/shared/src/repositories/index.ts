import { resolve } from 'path';
import { logger } from '../utils/logger';
import { ValidationError } from '../utils/errors';
import { FileInventoryRepository } from './file-inventory-repository';
import { InMemoryInventoryRepository, InventoryRepository } from './inventory-repository';
import { PgInventoryRepository } from './pg-inventory-repository';
import { loadSeedInventory } from './seed-inventory';

export * from './file-inventory-repository';
export * from './inventory-repository';
export * from './pg-inventory-repository';
export * from './seed-inventory';

export function createInventoryRepository(): InventoryRepository {
     const backend = process.env.INVENTORY_BACKEND || 'file';

     if (backend === 'file') {
          const path = resolve(process.env.INVENTORY_STATE_PATH || 'var/inventory.json');
          logger.info({ path }, 'Using file inventory repository');
          return new FileInventoryRepository(path, () => loadSeedInventory());
     }

     if (backend === 'memory') {
          const lots = loadSeedInventory();
          logger.warn({ lots: lots.length }, 'Using in-memory inventory repository; changes stay in this process');
          return new InMemoryInventoryRepository(lots);
     }

     if (backend === 'postgres') {
          logger.info('Using PostgreSQL inventory repository');
          return new PgInventoryRepository();
     }

     throw new ValidationError(`Unknown INVENTORY_BACKEND "${backend}"`, [
          'INVENTORY_BACKEND: expected file, memory or postgres',
     ]);
}
