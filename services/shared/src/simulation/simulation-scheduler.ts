import { SimulationConfig } from '../config/config';
import { InventorySnapshot, diffSnapshots, isEmptyChange } from '../domain/inventory-snapshot';
import { EventSink, sumSales } from '../events/event-sink';
import { InventoryRepository } from '../repositories/inventory-repository';
import { InventoryEvent, JOB_NAMES, JobName, JobState, QUARANTINE } from '../types/inventory.types';
import { Clock, systemClock } from '../utils/clock';
import { MS_PER_MINUTE } from '../utils/dates';
import {
     DataIntegrityError,
     NegativeQuantityError,
     LotNotFoundError,
     ValidationError,
     describeError,
} from '../utils/errors';
import { Logger, createChildLogger } from '../utils/logger';
import { createRng, deriveSeed } from '../utils/rng';
import { Job, JobResult, buildJobs, runJob } from './jobs';
import { JobStateStore } from './job-state-store';

export interface ScheduledJob {
     job: Job;
     intervalMs: number;
}

export interface SimulationSchedulerOptions {
     jobs: ScheduledJob[];
     repository: InventoryRepository;
     sink: EventSink;
     seed: number;
     retryDelayMs: number;
     clock?: Clock;
     stateStore?: JobStateStore;
     /** Locations whose stock is not sellable; defaults to quarantine. */
     quarantineLocations?: readonly string[];
     logger?: Logger;
}

export interface JobFailure {
     jobName: JobName;
     error: Error;
}

/**
 * A write after the commit that did not land: the job's events (jobName set)
 * or the job-state file (jobName null).
 */
export interface PublishFailure {
     jobName: JobName | null;
     error: Error;
}

export interface TickResult {
     now: Date;
     executed: JobName[];
     failed: JobFailure[];
     publishFailures: PublishFailure[];
     /** Events as logged; a timestamp can move past `now` when another writer logged later. */
     events: InventoryEvent[];
}

/**
 * Runs due simulation jobs against the repository in priority order and
 * forwards their events to the sink. Owns the per-job last-run state.
 */
export class SimulationScheduler {
     private readonly jobs: ScheduledJob[];
     private readonly states = new Map<JobName, JobState>();
     private readonly clock: Clock;
     private readonly log: Logger;
     private stateLoaded: boolean;

     constructor(private readonly options: SimulationSchedulerOptions) {
          const rank = (job: Job) => JOB_NAMES.indexOf(job.kind);
          if (options.jobs.length === 0) {
               throw new ValidationError('At least one simulation job must be scheduled');
          }
          this.jobs = [...options.jobs].sort((a, b) => rank(a.job) - rank(b.job));
          for (const { job, intervalMs } of this.jobs) {
               if (this.states.has(job.kind)) {
                    throw new ValidationError(`Job ${job.kind} is scheduled more than once`);
               }
               this.states.set(job.kind, { jobName: job.kind, lastRunAt: null, intervalMs });
          }
          this.clock = options.clock ?? systemClock;
          this.log = options.logger ?? createChildLogger({ component: 'simulation-scheduler' });
          this.stateLoaded = options.stateStore === undefined;
     }

     static fromConfig(
          config: SimulationConfig,
          deps: Omit<SimulationSchedulerOptions, 'jobs' | 'seed' | 'retryDelayMs'>
     ): SimulationScheduler {
          const jobs = buildJobs(config).map((job) => ({
               job,
               intervalMs: (config.intervals[job.kind] ?? 0) * MS_PER_MINUTE,
          }));
          return new SimulationScheduler({
               ...deps,
               jobs,
               seed: config.seed,
               retryDelayMs: config.retryDelayMinutes * MS_PER_MINUTE,
          });
     }

     jobStates(): JobState[] {
          return this.jobs.map(({ job }) => ({ ...this.state(job.kind) }));
     }

     /** Earliest instant at which some job becomes due; `now` when one already is. */
     nextDueAt(now: Date): Date {
          let earliest: number | null = null;
          for (const state of this.states.values()) {
               const dueAt = state.lastRunAt === null ? now.getTime() : state.lastRunAt.getTime() + state.intervalMs;
               earliest = earliest === null ? dueAt : Math.min(earliest, dueAt);
          }
          return new Date(Math.max(now.getTime(), earliest ?? now.getTime()));
     }

     async tick(now: Date = this.clock.now()): Promise<TickResult> {
          await this.loadState();

          const result: TickResult = { now, executed: [], failed: [], publishFailures: [], events: [] };
          const due = this.jobs.filter(({ job }) => this.isDue(job.kind, now));
          if (due.length === 0) {
               this.log.debug({ now: now.toISOString() }, 'No simulation jobs due');
               return result;
          }

          // Repository read failures abort the whole tick
          let snapshot = await this.options.repository.getSnapshot();

          for (const { job } of due) {
               const jobName = job.kind;
               try {
                    const output = await this.execute(job, snapshot, now);
                    const changes = diffSnapshots(snapshot, output.snapshot);
                    if (!isEmptyChange(changes)) {
                         await this.options.repository.commit(changes);
                    }
                    snapshot = output.snapshot;
                    this.state(jobName).lastRunAt = now;
                    result.executed.push(jobName);

                    this.log.info(
                         { jobName, events: output.events.length, deltas: changes.deltas.length },
                         'Simulation job completed'
                    );
                    await this.publish(jobName, output.events, result);
               } catch (error) {
                    const failure = toJobFailure(jobName, error);
                    result.failed.push(failure);
                    this.log.error(
                         {
                              err: failure.error,
                              jobName,
                              productCode: failure.error instanceof DataIntegrityError ? failure.error.productCode : undefined,
                              lotId: failure.error instanceof DataIntegrityError ? failure.error.lotId : undefined,
                         },
                         'Simulation job failed; mutation discarded'
                    );
               }
          }

          if (result.executed.length > 0) {
               await this.saveState(result);
          }
          return result;
     }

     /**
      * Ticks whenever a job is due until `signal` aborts. A failing tick is
      * retried no sooner than the configured retry delay.
      */
     async runContinuous(signal: AbortSignal): Promise<void> {
          this.log.info({ jobs: this.jobs.map(({ job }) => job.kind) }, 'Simulation scheduler started');

          while (!signal.aborted) {
               let failed = false;
               try {
                    const result = await this.tick(this.clock.now());
                    failed = result.failed.length > 0 || result.publishFailures.length > 0;
               } catch (error) {
                    failed = true;
                    this.log.error({ err: error }, 'Simulation tick failed');
               }

               const now = this.clock.now();
               let waitMs = this.nextDueAt(now).getTime() - now.getTime();
               if (failed) {
                    waitMs = Math.max(waitMs, this.options.retryDelayMs);
               }

               try {
                    await this.clock.sleep(waitMs, signal);
               } catch (error) {
                    if (signal.aborted) {
                         break;
                    }
                    throw error;
               }
          }

          this.log.info('Simulation scheduler stopped');
     }

     private async execute(job: Job, snapshot: InventorySnapshot, now: Date): Promise<JobResult> {
          const recentSales = job.kind === 'returns' ? await this.recentSales(now) : new Map<string, number>();
          const rng = createRng(deriveSeed(this.options.seed, job.kind, now.getTime()));
          const quarantineLocations = this.options.quarantineLocations ?? [QUARANTINE];
          return runJob(job, { snapshot, rng, now, recentSales, quarantineLocations });
     }

     /** Units sold since the returns job last ran, or over one returns interval. */
     private async recentSales(now: Date): Promise<Map<string, number>> {
          const state = this.state('returns');
          const since = state.lastRunAt ?? new Date(now.getTime() - state.intervalMs);
          // Returns runs ahead of sell_down within a tick, so sales stamped `since` are still open
          return sumSales(await this.options.sink.query({ types: ['sell_down'], since, until: now }));
     }

     private async publish(jobName: JobName, events: InventoryEvent[], result: TickResult): Promise<void> {
          try {
               result.events.push(...(await this.options.sink.record(events)));
          } catch (error) {
               // Already committed: the job stays counted as run
               result.events.push(...events);
               result.publishFailures.push({ jobName, error: asError(error) });
               this.log.error({ err: error, jobName, events: events.length }, 'Failed to append job events');
          }
     }

     private isDue(jobName: JobName, now: Date): boolean {
          const state = this.state(jobName);
          return state.lastRunAt === null || now.getTime() - state.lastRunAt.getTime() >= state.intervalMs;
     }

     private state(jobName: JobName): JobState {
          const state = this.states.get(jobName);
          if (!state) {
               throw new ValidationError(`Job ${jobName} is not scheduled`);
          }
          return state;
     }

     private async loadState(): Promise<void> {
          if (this.stateLoaded || !this.options.stateStore) {
               return;
          }
          const lastRuns = await this.options.stateStore.load();
          for (const [jobName, lastRunAt] of lastRuns) {
               const state = this.states.get(jobName);
               if (state) {
                    state.lastRunAt = lastRunAt;
               }
          }
          this.stateLoaded = true;
          this.log.info({ restored: lastRuns.size }, 'Job state restored');
     }

     private async saveState(result: TickResult): Promise<void> {
          if (!this.options.stateStore) {
               return;
          }
          try {
               await this.options.stateStore.save(this.jobStates());
          } catch (error) {
               result.publishFailures.push({ jobName: null, error: asError(error) });
               this.log.error({ err: error }, 'Failed to persist job state');
          }
     }
}

function toJobFailure(jobName: JobName, error: unknown): JobFailure {
     if (error instanceof NegativeQuantityError) {
          return {
               jobName,
               error: new DataIntegrityError(error.message, jobName, error.productCode, error.lotId),
          };
     }
     if (error instanceof LotNotFoundError) {
          return {
               jobName,
               error: new DataIntegrityError(error.message, jobName, error.productCode, error.lotId),
          };
     }
     if (error instanceof ValidationError) {
          return { jobName, error: new DataIntegrityError(error.message, jobName) };
     }
     return { jobName, error: asError(error) };
}

function asError(error: unknown): Error {
     return error instanceof Error ? error : new Error(describeError(error));
}
