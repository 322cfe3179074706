import type { RandomSource } from "@/lib/random";

/**
 * Replays `values` in order, starting over when they run out.
 */
export function sequenceRandom(values: number[]): RandomSource & { calls: () => number } {
  let calls = 0;
  return {
    next() {
      const value = values[calls % values.length];
      calls += 1;
      return value;
    },
    calls: () => calls,
  };
}
