/**
 * Particle creation and brush painting.
 *
 * New particles start with type-dependent defaults: water and cryotheum are
 * cold, wet sand is slightly cool, and a plant seed carries a random growth
 * budget. Randomness comes from a seeded generator so a run can be replayed.
 */

import type { Grid } from './sandbox/grid.ts';
import type { Particle, ParticleType, RandomSource } from './types.ts';

/**
 * Creates a deterministic pseudo-random number generator.
 *
 * Linear Congruential Generator with the Numerical Recipes constants
 * (a = 1664525, c = 1013904223, m = 2^32).
 *
 * @param seed - Initial seed value (integer)
 */
export function createRng(seed: number): RandomSource {
  let state = seed >>> 0;

  const next = (): number => {
    state = (1664525 * state + 1013904223) >>> 0;
    return state / 4294967296; // 2^32
  };

  return {
    next,
    int(min, maxExclusive) {
      return min + Math.floor(next() * (maxExclusive - min));
    },
  };
}

/** Starting temperature of each type. */
export const DEFAULT_TEMPERATURE = {
  Sand: 0,
  WetSand: -5,
  Water: -10,
  Acid: 0,
  Iridium: 0,
  Replicator: 0,
  Plant: 0,
  Cryotheum: -60,
  Unstable: 0,
  Electricity: 0,
  Glass: 0,
} as const satisfies Record<ParticleType, number>;

/** Plant growth budget is drawn from [PLANT_GROWTH_MIN, PLANT_GROWTH_MAX). */
export const PLANT_GROWTH_MIN = 5;
export const PLANT_GROWTH_MAX = 21;

/**
 * Creates a particle with its type's default temperature and extra data.
 * The generation stamp starts at 0 ("never updated").
 */
export function createParticle(type: ParticleType, rng: RandomSource): Particle {
  return {
    type,
    temperature: DEFAULT_TEMPERATURE[type],
    extraData1: type === 'Plant' ? rng.int(PLANT_GROWTH_MIN, PLANT_GROWTH_MAX) : 0,
    extraData2: 0,
    lastUpdate: 0,
  };
}

/**
 * Fills a disc of cells with fresh particles, or erases it when `type` is
 * null. Occupied cells keep their particle while painting; cells outside the
 * grid are skipped.
 *
 * @returns Number of cells changed
 */
export function paintCircle(
  grid: Grid,
  cx: number,
  cy: number,
  radius: number,
  type: ParticleType | null,
  rng: RandomSource
): number {
  const r = Math.floor(radius);
  const r2 = radius * radius;
  const centerX = Math.round(cx);
  const centerY = Math.round(cy);
  let changed = 0;

  for (let x = centerX - r; x <= centerX + r; x++) {
    for (let y = centerY - r; y <= centerY + r; y++) {
      if (!grid.inBounds(x, y)) continue;
      const dx = x - centerX;
      const dy = y - centerY;
      if (dx * dx + dy * dy > r2) continue;

      if (type === null) {
        if (grid.isEmpty(x, y)) continue;
        grid.set(x, y, null);
      } else {
        if (!grid.isEmpty(x, y)) continue;
        grid.set(x, y, createParticle(type, rng));
      }
      changed++;
    }
  }

  return changed;
}
