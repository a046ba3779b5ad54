import { randomBytes, randomInt } from 'node:crypto';

/**
 * Source of randomness handed to everything that draws codes, seat layouts or
 * simulated outcomes. Production code uses the OS CSPRNG; tests pass a seeded
 * source instead of patching globals.
 */
export interface RandomSource {
  /** Uniform integer in `[0, maxExclusive)`. */
  int(maxExclusive: number): number;
  bytes(size: number): Buffer;
}

export const cryptoRandom: RandomSource = {
  int: (maxExclusive) => randomInt(maxExclusive),
  bytes: (size) => randomBytes(size)
};

const CHANCE_RESOLUTION = 10_000;

/** True with probability `p` (clamped to [0, 1]). */
export function chance(random: RandomSource, p: number): boolean {
  if (p <= 0) return false;
  if (p >= 1) return true;
  return random.int(CHANCE_RESOLUTION) < Math.round(p * CHANCE_RESOLUTION);
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  return items[random.int(items.length)];
}
