import 'dotenv/config';
import { closePool } from '@stockwatch/shared/src/db/client';
import { loadConfigProvider } from '@stockwatch/shared/src/config/config';
import { createBackends, createFlaggedStore, createRecallService } from '@stockwatch/shared/src/runtime';
import { logger } from '@stockwatch/shared/src/utils/logger';
import { buildReportingApp } from './app';

const PORT = parseInt(process.env.REPORTING_API_PORT || '3100', 10);
const HOST = process.env.REPORTING_API_HOST || '0.0.0.0';

async function main() {
     const config = loadConfigProvider();
     const backends = createBackends();
     const app = await buildReportingApp({
          store: createFlaggedStore(),
          sink: backends.sink,
          recallService: createRecallService(config, backends),
     });

     try {
          await app.listen({ port: PORT, host: HOST });
          logger.info(`Reporting API listening on ${HOST}:${PORT}`);
          logger.info(`OpenAPI docs available at http://${HOST}:${PORT}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

     // Graceful shutdown
     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await app.close();
          if (process.env.INVENTORY_BACKEND === 'postgres' || process.env.EVENT_SINK === 'postgres') {
               await closePool();
          }
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in reporting API');
     process.exit(1);
});
