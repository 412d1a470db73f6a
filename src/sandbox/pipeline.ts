/**
 * Per-step update pipeline.
 *
 * One step is three raster sweeps (x ascending, then y ascending):
 * 1. Movement: advance the generation, dispatch every particle not yet
 *    stamped with it to its movement strategy, stamp it where it lands.
 * 2. Diffusion: exchange heat between neighbours (see thermal.ts).
 * 3. Interaction: advance the generation again and run each unstamped
 *    particle's reaction hook. Nothing is stamped in this sweep.
 *
 * Stamping is what keeps a particle that moved down or right from being
 * picked up again later in the same movement sweep.
 */

import { BehaviorContractError } from '../errors.ts';
import type { Particle, ParticleType } from '../types.ts';
import type { BehaviorRegistry, MovementKind, ReactionKind } from '../behavior/registry.ts';
import type { Grid } from './grid.ts';
import { diffuseHeat } from './thermal.ts';

export interface PipelineOptions {
  /** Glass at or above this temperature moves as a liquid. */
  glassMeltingPoint: number;
}

/**
 * Movement family for a particle, or null when it stays put this step.
 */
export function movementKindOf(particle: Particle, options: PipelineOptions): MovementKind | null {
  switch (particle.type) {
    case 'Sand':
      return 'powder';
    case 'WetSand':
    case 'Cryotheum':
      return 'solid';
    case 'Water':
    case 'Acid':
      return 'liquid';
    case 'Electricity':
      return 'electric';
    case 'Iridium':
    case 'Replicator':
    case 'Unstable':
      return null;
    case 'Plant':
      // Seeds fall; rooted plants hold still while they grow.
      return particle.extraData2 === 0 ? 'powder' : null;
    case 'Glass':
      return particle.temperature >= options.glassMeltingPoint ? 'liquid' : 'solid';
    default: {
      const unknown: never = particle.type;
      throw new BehaviorContractError(`Unknown particle type: ${String(unknown)}`);
    }
  }
}

/**
 * Reaction hook for a type, or null for inert types.
 */
export function reactionKindOf(type: ParticleType): ReactionKind | null {
  switch (type) {
    case 'Sand':
      return 'sand';
    case 'Water':
      return 'water';
    case 'Acid':
      return 'acid';
    case 'Replicator':
      return 'replicator';
    case 'Plant':
      return 'plant';
    case 'Cryotheum':
      return 'cryotheum';
    case 'Unstable':
      return 'unstable';
    case 'Electricity':
      return 'electricity';
    case 'WetSand':
    case 'Iridium':
    case 'Glass':
      return null;
    default: {
      const unknown: never = type;
      throw new BehaviorContractError(`Unknown particle type: ${String(unknown)}`);
    }
  }
}

export function runMovementPass(grid: Grid, behaviors: BehaviorRegistry, options: PipelineOptions): void {
  const generation = grid.advanceGeneration();
  const { cells } = grid;

  for (let x = 0; x < grid.width; x++) {
    for (let y = 0; y < grid.height; y++) {
      // Re-read: an earlier hook may have emptied or refilled this cell.
      const particle = cells[x][y];
      if (particle === null || particle.lastUpdate === generation) continue;

      const kind = movementKindOf(particle, options);
      if (kind === null) {
        particle.lastUpdate = generation;
        continue;
      }

      const target = behaviors.movement[kind](grid, x, y);
      const moved = grid.get(target.x, target.y);
      if (moved !== particle) {
        const found = moved === null ? 'an empty cell' : `a ${moved.type}`;
        throw new BehaviorContractError(
          `${kind} move of ${particle.type} at (${x}, ${y}) reported (${target.x}, ${target.y}), which holds ${found}`
        );
      }
      particle.lastUpdate = generation;
    }
  }
}

export function runInteractionPass(grid: Grid, behaviors: BehaviorRegistry): void {
  const generation = grid.advanceGeneration();
  const { cells } = grid;

  for (let x = 0; x < grid.width; x++) {
    for (let y = 0; y < grid.height; y++) {
      const particle = cells[x][y];
      if (particle === null || particle.lastUpdate === generation) continue;

      const kind = reactionKindOf(particle.type);
      if (kind !== null) behaviors.reactions[kind](grid, x, y);
    }
  }
}

/**
 * Advances the grid by one simulated step.
 */
export function step(grid: Grid, behaviors: BehaviorRegistry, options: PipelineOptions): void {
  runMovementPass(grid, behaviors, options);
  diffuseHeat(grid);
  runInteractionPass(grid, behaviors);
}
