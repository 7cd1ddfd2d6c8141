import 'dotenv/config';
import { loadConfigProvider } from '@stockwatch/shared/src/config/config';
import { closePool } from '@stockwatch/shared/src/db/client';
import { IntegrationScheduler } from '@stockwatch/shared/src/integration/integration-scheduler';
import { closeConnection } from '@stockwatch/shared/src/messaging/client';
import {
     assertPersistentInventory,
     createBackends,
     createIntegrationScheduler,
     cycleExitCode,
} from '@stockwatch/shared/src/runtime';
import { logger } from '@stockwatch/shared/src/utils/logger';

class IntegrationWorker {
     private readonly controller = new AbortController();

     constructor(private readonly scheduler: IntegrationScheduler) {}

     async runOnce(): Promise<number> {
          const cycle = await this.scheduler.runOnce();
          logger.info(
               { syncedAt: cycle.syncedAt.toISOString(), flags: cycle.flags.length, decisions: cycle.records.length },
               'Sync cycle finished'
          );
          return cycleExitCode(cycle);
     }

     async start(): Promise<void> {
          logger.info('Starting integration worker');
          await this.scheduler.start(this.controller.signal);
     }

     stop(): void {
          logger.info('Shutting down gracefully...');
          this.controller.abort();
     }
}

async function main() {
     const once = process.argv.includes('--once');
     if (once) {
          assertPersistentInventory();
     }
     const config = loadConfigProvider();
     const worker = new IntegrationWorker(createIntegrationScheduler(config, createBackends()));

     try {
          if (once) {
               process.exitCode = await worker.runOnce();
               return;
          }

          process.on('SIGINT', () => worker.stop());
          process.on('SIGTERM', () => worker.stop());
          await worker.start();
     } finally {
          if (process.env.NOTIFY_DECISIONS === 'true') {
               await closeConnection();
          }
          if (process.env.INVENTORY_BACKEND === 'postgres' || process.env.EVENT_SINK === 'postgres') {
               await closePool();
          }
     }
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in integration worker');
     process.exit(1);
});
