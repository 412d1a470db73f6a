/**
 * Default reaction hooks, run once per particle by the interaction pass.
 *
 * Hooks may rewrite the particle in place (type, temperature, extra data),
 * clear cells, or create particles around it. They never stamp generations;
 * anything they create in a cell the sweep has not reached yet may react
 * later in the same pass, so no hook spawns a particle of its own kind
 * ahead of the sweep.
 */

import type { Particle, ParticleType, RandomSource } from '../types.ts';
import type { Grid } from '../sandbox/grid.ts';
import type { ReactionStrategies } from './registry.ts';

export interface ReactionTuning {
  /** Sand at or above this temperature turns to glass. */
  sandMeltingPoint: number;
  /** Water at or above this temperature evaporates. */
  waterBoilingPoint: number;
  /** Water at or below this temperature turns to cryotheum. */
  waterFreezingPoint: number;
  /** Cryotheum at or above this temperature melts into water. */
  cryotheumMeltingPoint: number;
  /** Chance that acid is used up after dissolving something. */
  acidConsumeChance: number;
  /** Chance per step that a rooted plant grows a cell upward. */
  plantGrowChance: number;
  plantBurningPoint: number;
  /** Degrees an unstable particle gains every step. */
  unstableWarmRate: number;
  unstableDetonationPoint: number;
  blastRadius: number;
  /** Radius within which survivors of a blast are heated. */
  heatRadius: number;
  blastHeat: number;
  sparkHeat: number;
  /** Steps an electricity particle survives without touching anything. */
  sparkLifetime: number;
}

export const DEFAULT_REACTION_TUNING: ReactionTuning = {
  sandMeltingPoint: 100,
  waterBoilingPoint: 100,
  waterFreezingPoint: -50,
  cryotheumMeltingPoint: 0,
  acidConsumeChance: 1 / 3,
  plantGrowChance: 1 / 8,
  plantBurningPoint: 80,
  unstableWarmRate: 1,
  unstableDetonationPoint: 200,
  blastRadius: 6,
  heatRadius: 12,
  blastHeat: 100,
  sparkHeat: 15,
  sparkLifetime: 8,
};

/** Axis neighbours: down, right, up, left. */
const AXIS_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [1, 0],
  [0, -1],
  [-1, 0],
];

const ACID_PROOF: ReadonlySet<ParticleType> = new Set<ParticleType>(['Acid', 'Iridium']);

function particleAt(grid: Grid, x: number, y: number): Particle | null {
  return grid.inBounds(x, y) ? grid.get(x, y) : null;
}

function explode(grid: Grid, tuning: ReactionTuning, cx: number, cy: number): void {
  const blast2 = tuning.blastRadius * tuning.blastRadius;
  const heat2 = tuning.heatRadius * tuning.heatRadius;
  const reach = Math.max(tuning.blastRadius, tuning.heatRadius);

  for (let dx = -reach; dx <= reach; dx++) {
    for (let dy = -reach; dy <= reach; dy++) {
      const target = particleAt(grid, cx + dx, cy + dy);
      if (target === null) continue;

      const d2 = dx * dx + dy * dy;
      if (d2 <= blast2 && target.type !== 'Iridium') {
        grid.set(cx + dx, cy + dy, null);
      } else if (d2 <= heat2) {
        target.temperature += tuning.blastHeat;
      }
    }
  }
}

export function createReactionStrategies(
  rng: RandomSource,
  overrides: Partial<ReactionTuning> = {}
): ReactionStrategies {
  const tuning: ReactionTuning = { ...DEFAULT_REACTION_TUNING, ...overrides };

  return {
    sand(grid, x, y) {
      const sand = grid.get(x, y);
      if (sand === null) return;

      if (sand.temperature >= tuning.sandMeltingPoint) {
        sand.type = 'Glass';
        return;
      }

      for (const [dx, dy] of AXIS_OFFSETS) {
        const neighbor = particleAt(grid, x + dx, y + dy);
        if (neighbor?.type === 'Water') {
          grid.set(x + dx, y + dy, null);
          sand.type = 'WetSand';
          return;
        }
      }
    },

    water(grid, x, y) {
      const water = grid.get(x, y);
      if (water === null) return;

      if (water.temperature >= tuning.waterBoilingPoint) {
        grid.set(x, y, null);
      } else if (water.temperature <= tuning.waterFreezingPoint) {
        water.type = 'Cryotheum';
      }
    },

    acid(grid, x, y) {
      for (const [dx, dy] of AXIS_OFFSETS) {
        const neighbor = particleAt(grid, x + dx, y + dy);
        if (neighbor === null || ACID_PROOF.has(neighbor.type)) continue;

        grid.set(x + dx, y + dy, null);
        if (rng.next() < tuning.acidConsumeChance) {
          grid.set(x, y, null);
        }
        return;
      }
    },

    replicator(grid, x, y) {
      for (const [dx, dy] of AXIS_OFFSETS) {
        const source = particleAt(grid, x + dx, y + dy);
        if (source === null || source.type === 'Replicator') continue;

        const tx = x - dx;
        const ty = y - dy;
        if (!grid.inBounds(tx, ty) || !grid.isEmpty(tx, ty)) continue;

        grid.set(tx, ty, {
          type: source.type,
          temperature: source.temperature,
          extraData1: source.extraData1,
          extraData2: source.extraData2,
          lastUpdate: 0,
        });
      }
    },

    plant(grid, x, y) {
      const plant = grid.get(x, y);
      if (plant === null) return;

      if (plant.temperature >= tuning.plantBurningPoint) {
        grid.set(x, y, null);
        return;
      }

      // extraData2: 0 = loose seed, 1 = rooted
      if (plant.extraData2 === 0) {
        const below = particleAt(grid, x, y + 1);
        if (below !== null && (below.type === 'WetSand' || (below.type === 'Plant' && below.extraData2 === 1))) {
          plant.extraData2 = 1;
        }
        return;
      }

      // extraData1: remaining growth; the tip carries it, stems hold 0
      if (plant.extraData1 < 2 || rng.next() >= tuning.plantGrowChance) return;
      if (!grid.inBounds(x, y - 1) || !grid.isEmpty(x, y - 1)) return;

      grid.set(x, y - 1, {
        type: 'Plant',
        temperature: plant.temperature,
        extraData1: plant.extraData1 - 1,
        extraData2: 1,
        lastUpdate: 0,
      });
      plant.extraData1 = 0;
    },

    cryotheum(grid, x, y) {
      const cryotheum = grid.get(x, y);
      if (cryotheum !== null && cryotheum.temperature >= tuning.cryotheumMeltingPoint) {
        cryotheum.type = 'Water';
      }
    },

    unstable(grid, x, y) {
      const unstable = grid.get(x, y);
      if (unstable === null) return;

      unstable.temperature += tuning.unstableWarmRate;
      if (unstable.temperature >= tuning.unstableDetonationPoint) {
        explode(grid, tuning, x, y);
      }
    },

    electricity(grid, x, y) {
      const spark = grid.get(x, y);
      if (spark === null) return;

      spark.extraData1 += 1;
      let touched = false;
      for (const [dx, dy] of AXIS_OFFSETS) {
        const neighbor = particleAt(grid, x + dx, y + dy);
        if (neighbor === null || neighbor.type === 'Electricity') continue;
        neighbor.temperature += tuning.sparkHeat;
        touched = true;
      }

      if (touched || spark.extraData1 >= tuning.sparkLifetime) {
        grid.set(x, y, null);
      }
    },
  };
}
