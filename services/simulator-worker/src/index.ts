import 'dotenv/config';
import { loadConfigProvider } from '@stockwatch/shared/src/config/config';
import { closePool } from '@stockwatch/shared/src/db/client';
import {
     assertPersistentInventory,
     createBackends,
     createSimulationScheduler,
     tickExitCode,
} from '@stockwatch/shared/src/runtime';
import { SimulationScheduler } from '@stockwatch/shared/src/simulation/simulation-scheduler';
import { logger } from '@stockwatch/shared/src/utils/logger';

class SimulatorWorker {
     private readonly controller = new AbortController();

     constructor(private readonly scheduler: SimulationScheduler) {}

     async runOnce(): Promise<number> {
          const result = await this.scheduler.tick();
          logger.info(
               {
                    now: result.now.toISOString(),
                    executed: result.executed,
                    failed: result.failed.map((failure) => failure.jobName),
                    publishFailures: result.publishFailures.length,
                    events: result.events.length,
               },
               'Simulation tick finished'
          );
          return tickExitCode(result);
     }

     async start(): Promise<void> {
          logger.info('Starting simulator worker');
          await this.scheduler.runContinuous(this.controller.signal);
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
     const worker = new SimulatorWorker(createSimulationScheduler(config, createBackends()));

     try {
          if (once) {
               process.exitCode = await worker.runOnce();
               return;
          }

          process.on('SIGINT', () => worker.stop());
          process.on('SIGTERM', () => worker.stop());
          await worker.start();
     } finally {
          if (process.env.INVENTORY_BACKEND === 'postgres' || process.env.EVENT_SINK === 'postgres') {
               await closePool();
          }
     }
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in simulator worker');
     process.exit(1);
});
