import { ShrinkDetector, flagEvents } from '../analysis/shrink-detector';
import { DecisionPolicyEngine } from '../decision/policy-engine';
import { EventSink } from '../events/event-sink';
import { DecisionNotifier } from '../messaging/decision-notifier';
import { InventoryRepository } from '../repositories/inventory-repository';
import { FlaggedDecisionRecord, ShrinkFlag } from '../types/inventory.types';
import { Clock, systemClock } from '../utils/clock';
import { describeError } from '../utils/errors';
import { Logger, createChildLogger } from '../utils/logger';
import { enrichDecisions } from './enricher';
import { FlaggedDecisionStore } from './flagged-store';

export interface IntegrationSchedulerOptions {
     repository: InventoryRepository;
     detector: ShrinkDetector;
     engine: DecisionPolicyEngine;
     store: FlaggedDecisionStore;
     intervalMs: number;
     quarantineLocations: readonly string[];
     clock?: Clock;
     /** Where flag events go once a cycle has published; skipped when absent. */
     sink?: EventSink;
     recordFlagEvents?: boolean;
     notifier?: DecisionNotifier;
     logger?: Logger;
}

export interface CycleResult {
     syncedAt: Date;
     flags: ShrinkFlag[];
     records: FlaggedDecisionRecord[];
     /** Set when the artifact was published but its flag events were not logged. */
     eventFailure: Error | null;
}

/**
 * Periodic detect → decide → enrich → publish loop. A failed cycle leaves
 * the published artifact and the last-sync time as they were.
 */
export class IntegrationScheduler {
     private readonly clock: Clock;
     private readonly log: Logger;

     constructor(private readonly options: IntegrationSchedulerOptions) {
          this.clock = options.clock ?? systemClock;
          this.log = options.logger ?? createChildLogger({ component: 'integration-scheduler' });
     }

     /** One sync cycle; any upstream failure propagates to the caller. */
     async runOnce(): Promise<CycleResult> {
          const { repository, detector, engine, store, quarantineLocations } = this.options;
          const now = this.clock.now();

          const snapshot = await repository.getSnapshot();
          const flags = await detector.detect(snapshot, now);
          const decisions = engine.decide(flags);
          const records = enrichDecisions(decisions, snapshot, quarantineLocations);

          await store.replace(records);
          await store.recordSync(now);

          this.log.info(
               { syncedAt: now.toISOString(), flags: flags.length, decisions: records.length },
               'Flagged decisions published'
          );

          const eventFailure = await this.afterPublish(flags, records, now);
          return { syncedAt: now, flags, records, eventFailure };
     }

     /**
      * Runs a cycle every interval until `signal` aborts. Cycle failures are
      * logged and retried on the next interval.
      */
     async start(signal: AbortSignal): Promise<void> {
          this.log.info({ intervalMs: this.options.intervalMs }, 'Integration scheduler started');

          while (!signal.aborted) {
               try {
                    await this.runOnce();
               } catch (error) {
                    this.log.error({ err: error }, 'Sync cycle failed; keeping previous artifact');
               }

               try {
                    await this.clock.sleep(this.options.intervalMs, signal);
               } catch (error) {
                    if (signal.aborted) {
                         break;
                    }
                    throw error;
               }
          }

          this.log.info('Integration scheduler stopped');
     }

     private async afterPublish(
          flags: ShrinkFlag[],
          records: FlaggedDecisionRecord[],
          now: Date
     ): Promise<Error | null> {
          const { sink, notifier } = this.options;
          let eventFailure: Error | null = null;

          if (sink && this.options.recordFlagEvents !== false) {
               try {
                    await sink.record(flagEvents(flags, now));
               } catch (error) {
                    eventFailure = error instanceof Error ? error : new Error(describeError(error));
                    this.log.warn({ err: error }, 'Failed to record flag events');
               }
          }

          if (notifier) {
               try {
                    await notifier.decisionsPublished(records, now);
               } catch (error) {
                    this.log.warn({ err: error }, 'Failed to notify decision subscribers');
               }
          }
          return eventFailure;
     }
}
