/**
 * Default movement strategies.
 *
 * Four families cover every mobile particle:
 * - powder: falls, sinks through liquids, slides off slopes
 * - solid: falls straight down and sinks through liquids, never slides
 * - liquid: falls, slides, then spreads sideways into empty cells
 * - electric: falls and slides through empty cells only
 *
 * Y grows downward, so "below" is `y + 1`.
 */

import type { GridPosition, ParticleType, RandomSource } from '../types.ts';
import type { Grid } from '../sandbox/grid.ts';
import type { MovementStrategies } from './registry.ts';

const LIQUIDS: ReadonlySet<ParticleType> = new Set<ParticleType>(['Water', 'Acid']);

function isLiquidAt(grid: Grid, x: number, y: number): boolean {
  const cell = grid.get(x, y);
  return cell !== null && LIQUIDS.has(cell.type);
}

function isFreeAt(grid: Grid, x: number, y: number): boolean {
  return grid.inBounds(x, y) && grid.isEmpty(x, y);
}

/**
 * Picks -1 or 1 among the sides for which `open` holds; 0 when neither.
 */
function pickSide(rng: RandomSource, open: (dx: number) => boolean): number {
  const first = rng.next() < 0.5 ? -1 : 1;
  if (open(first)) return first;
  if (open(-first)) return -first;
  return 0;
}

/**
 * Falls one cell: into an empty cell, or swapping with a liquid when
 * `sink` is set. Returns the new position, or null when blocked.
 */
function fall(grid: Grid, x: number, y: number, sink: boolean): GridPosition | null {
  const below = y + 1;
  if (below >= grid.height) return null;

  if (grid.isEmpty(x, below)) {
    grid.move(x, y, x, below);
    return { x, y: below };
  }
  if (sink && isLiquidAt(grid, x, below)) {
    grid.swap(x, y, x, below);
    return { x, y: below };
  }
  return null;
}

function slideDiagonal(grid: Grid, rng: RandomSource, x: number, y: number): GridPosition | null {
  const dx = pickSide(rng, (side) => isFreeAt(grid, x + side, y + 1));
  if (dx === 0) return null;
  grid.move(x, y, x + dx, y + 1);
  return { x: x + dx, y: y + 1 };
}

function spreadSideways(grid: Grid, rng: RandomSource, x: number, y: number): GridPosition | null {
  const dx = pickSide(rng, (side) => isFreeAt(grid, x + side, y));
  if (dx === 0) return null;
  grid.move(x, y, x + dx, y);
  return { x: x + dx, y };
}

export function createMovementStrategies(rng: RandomSource): MovementStrategies {
  return {
    powder(grid, x, y) {
      return fall(grid, x, y, true) ?? slideDiagonal(grid, rng, x, y) ?? { x, y };
    },

    solid(grid, x, y) {
      return fall(grid, x, y, true) ?? { x, y };
    },

    liquid(grid, x, y) {
      return (
        fall(grid, x, y, false) ??
        slideDiagonal(grid, rng, x, y) ??
        spreadSideways(grid, rng, x, y) ?? { x, y }
      );
    },

    electric(grid, x, y) {
      return fall(grid, x, y, false) ?? slideDiagonal(grid, rng, x, y) ?? { x, y };
    },
  };
}
