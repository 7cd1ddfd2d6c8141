import { z } from 'zod';
import { JOB_NAMES, JobName, JobState } from '../types/inventory.types';
import { RepositoryError, ValidationError, describeError } from '../utils/errors';
import { readJsonIfExists, writeJsonAtomic } from '../utils/files';

export interface JobStateStore {
     load(): Promise<Map<JobName, Date>>;
     save(states: readonly JobState[]): Promise<void>;
}

const stateFileSchema = z.object({
     jobs: z.record(z.enum(JOB_NAMES), z.string().datetime({ offset: true })),
});

/**
 * Last-run times in a small JSON file, so a restarted simulator does not
 * re-apply a period it already covered.
 */
export class FileJobStateStore implements JobStateStore {
     constructor(private readonly path: string) {}

     async load(): Promise<Map<JobName, Date>> {
          let raw: unknown;
          try {
               raw = await readJsonIfExists(this.path);
          } catch (error) {
               throw new RepositoryError(`Cannot read job state ${this.path}: ${describeError(error)}`, {
                    cause: error,
               });
          }

          const lastRuns = new Map<JobName, Date>();
          if (raw === undefined) {
               return lastRuns;
          }

          const parsed = stateFileSchema.safeParse(raw);
          if (!parsed.success) {
               throw new ValidationError(
                    `Invalid job state file ${this.path}`,
                    parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
               );
          }
          for (const name of JOB_NAMES) {
               const value = parsed.data.jobs[name];
               if (value !== undefined) {
                    lastRuns.set(name, new Date(value));
               }
          }
          return lastRuns;
     }

     async save(states: readonly JobState[]): Promise<void> {
          const jobs: Partial<Record<JobName, string>> = {};
          for (const state of states) {
               if (state.lastRunAt) {
                    jobs[state.jobName] = state.lastRunAt.toISOString();
               }
          }
          try {
               await writeJsonAtomic(this.path, { jobs });
          } catch (error) {
               throw new RepositoryError(`Cannot write job state ${this.path}: ${describeError(error)}`, {
                    cause: error,
               });
          }
     }
}
