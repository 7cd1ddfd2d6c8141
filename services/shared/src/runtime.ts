import { resolve } from 'path';
import { ShrinkDetector } from './analysis/shrink-detector';
import { createSalesHistorySource } from './clients/sales-history-client';
import { ConfigProvider } from './config/config';
import { DecisionPolicyEngine } from './decision/policy-engine';
import { createEventSink } from './events';
import { EventSink } from './events/event-sink';
import { FileFlaggedDecisionStore, FlaggedDecisionStore } from './integration/flagged-store';
import { CycleResult, IntegrationScheduler } from './integration/integration-scheduler';
import { createDecisionNotifier } from './messaging/decision-notifier';
import { createInventoryRepository } from './repositories';
import { InventoryRepository } from './repositories/inventory-repository';
import { RecallService } from './services/recall-service';
import { FileJobStateStore } from './simulation/job-state-store';
import { SimulationScheduler, TickResult } from './simulation/simulation-scheduler';
import { systemClock } from './utils/clock';
import { MS_PER_MINUTE } from './utils/dates';
import { RepositoryError, ValidationError } from './utils/errors';

export interface Backends {
     repository: InventoryRepository;
     sink: EventSink;
}

export function createBackends(): Backends {
     return { repository: createInventoryRepository(), sink: createEventSink() };
}

/** Single runs start from persisted inventory; the memory backend would start from the seed each time. */
export function assertPersistentInventory(): void {
     if (process.env.INVENTORY_BACKEND === 'memory') {
          throw new ValidationError('Single runs need a persistent inventory backend', [
               'INVENTORY_BACKEND: expected file or postgres with --once',
          ]);
     }
}

export function createFlaggedStore(): FlaggedDecisionStore {
     return new FileFlaggedDecisionStore(
          resolve(process.env.FLAGGED_PATH || 'var/flagged-decisions.json'),
          resolve(process.env.LAST_SYNC_PATH || 'var/last-sync.json')
     );
}

export function createSimulationScheduler(config: ConfigProvider, backends: Backends): SimulationScheduler {
     return SimulationScheduler.fromConfig(config.simulation(), {
          ...backends,
          quarantineLocations: config.integration().quarantineLocations,
          stateStore: new FileJobStateStore(resolve(process.env.JOB_STATE_PATH || 'var/job-state.json')),
     });
}

export function createIntegrationScheduler(config: ConfigProvider, backends: Backends): IntegrationScheduler {
     const integration = config.integration();
     const detector = new ShrinkDetector({
          sink: backends.sink,
          config: config.detection(),
          salesHistory: createSalesHistorySource(),
          quarantineLocations: integration.quarantineLocations,
     });

     return new IntegrationScheduler({
          repository: backends.repository,
          detector,
          engine: new DecisionPolicyEngine(config.policy()),
          store: createFlaggedStore(),
          intervalMs: integration.intervalMinutes * MS_PER_MINUTE,
          quarantineLocations: integration.quarantineLocations,
          sink: backends.sink,
          recordFlagEvents: integration.recordFlagEvents,
          notifier: createDecisionNotifier(),
     });
}

export function createRecallService(config: ConfigProvider, backends: Backends): RecallService {
     return new RecallService(
          backends.repository,
          backends.sink,
          systemClock,
          config.integration().quarantineLocations
     );
}

/**
 * Single ticks exit non-zero when a job failed on the repository, or when
 * committed work was not fully logged or its job state was not saved.
 */
export function tickExitCode(result: TickResult): number {
     if (result.publishFailures.length > 0) {
          return 1;
     }
     return result.failed.some((failure) => failure.error instanceof RepositoryError) ? 1 : 0;
}

/** Single cycles exit non-zero when the published flags were not logged. */
export function cycleExitCode(result: CycleResult): number {
     return result.eventFailure === null ? 0 : 1;
}
