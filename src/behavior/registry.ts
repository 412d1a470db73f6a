/**
 * Behavior registry contracts.
 *
 * The update pipeline decides *when* a particle moves or reacts; the
 * registry decides *how*. Movement hooks relocate the particle and report
 * where it ended up, reaction hooks mutate the grid around it.
 */

import type { GridPosition, RandomSource } from '../types.ts';
import type { Grid } from '../sandbox/grid.ts';
import { createMovementStrategies } from './movement.ts';
import { createReactionStrategies } from './reactions.ts';
import type { ReactionTuning } from './reactions.ts';

/**
 * Moves the particle at (x, y) and returns its resulting coordinates.
 *
 * Contract: the returned coordinates are in bounds and hold the particle;
 * if it moved, its previous cell is empty or holds whatever it swapped with.
 */
export type MoveHook = (grid: Grid, x: number, y: number) => GridPosition;

/** Runs type-specific reactions for the particle at (x, y). */
export type ReactionHook = (grid: Grid, x: number, y: number) => void;

export interface MovementStrategies {
  powder: MoveHook;
  solid: MoveHook;
  liquid: MoveHook;
  electric: MoveHook;
}

export type MovementKind = keyof MovementStrategies;

export interface ReactionStrategies {
  sand: ReactionHook;
  water: ReactionHook;
  acid: ReactionHook;
  replicator: ReactionHook;
  plant: ReactionHook;
  cryotheum: ReactionHook;
  unstable: ReactionHook;
  electricity: ReactionHook;
}

export type ReactionKind = keyof ReactionStrategies;

export interface BehaviorRegistry {
  movement: MovementStrategies;
  reactions: ReactionStrategies;
}

export interface BehaviorOptions {
  reactions?: Partial<ReactionTuning>;
}

/**
 * Creates the default behavior set.
 *
 * @param rng - Randomness for direction choices, growth and dissolving
 */
export function createBehaviorRegistry(rng: RandomSource, options: BehaviorOptions = {}): BehaviorRegistry {
  return {
    movement: createMovementStrategies(rng),
    reactions: createReactionStrategies(rng, options.reactions),
  };
}
