import { setTimeout as delay } from 'timers/promises';

export interface Clock {
     now(): Date;
     /** Resolves after `ms`, rejects with an AbortError once `signal` fires. */
     sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
     now: () => new Date(),
     sleep: async (ms, signal) => {
          await delay(ms, undefined, { signal });
     },
};
