export type Rng = () => number;

/**
 * Seeded mulberry32 generator returning floats in [0, 1).
 */
export function createRng(seed: number): Rng {
     let state = seed >>> 0;
     return () => {
          state = (state + 0x6d2b79f5) >>> 0;
          let t = state;
          t = Math.imul(t ^ (t >>> 15), t | 1);
          t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
          return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
     };
}

/**
 * FNV-1a over the seed and the given parts, so each (job, instant) pair
 * gets its own reproducible stream.
 */
export function deriveSeed(seed: number, ...parts: Array<string | number>): number {
     let hash = 0x811c9dc5;
     const input = [seed, ...parts].join('|');
     for (let i = 0; i < input.length; i++) {
          hash ^= input.charCodeAt(i);
          hash = Math.imul(hash, 0x01000193) >>> 0;
     }
     return hash >>> 0;
}
