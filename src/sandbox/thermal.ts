/**
 * Thermal diffusion pass.
 *
 * Heat moves between axis-adjacent occupied cells once per step. Every
 * occupied cell pushes a share of its own pre-pass temperature into each
 * occupied neighbour (down, right, up, left), so a pair exchanges heat in
 * both directions and a cell can gain or lose heat on all four sides within
 * one pass.
 *
 * The share is `temperature / (conductivity(a) + conductivity(b))` with the
 * division truncated toward zero; small gradients therefore freeze. Flows are
 * computed from a snapshot taken before the pass and applied cumulatively to
 * the live grid, which keeps the result independent of sweep order.
 */

import { PARTICLE_TYPES } from '../types.ts';
import type { Cell, Particle, ParticleType } from '../types.ts';
import { typeCode } from './grid.ts';
import type { Grid, ThermalSnapshot } from './grid.ts';

/**
 * Per-type thermal conductivity. Higher values mean slower transfer.
 * Every entry is greater than 1 so the divisor of a pair is at least 4.
 */
export const THERMAL_CONDUCTIVITY = {
  Sand: 3,
  WetSand: 4,
  Water: 5,
  Acid: 2,
  Iridium: 8,
  Replicator: 3,
  Plant: 3,
  Cryotheum: 2,
  Unstable: 2,
  Electricity: 2,
  Glass: 3,
} as const satisfies Record<ParticleType, number>;

export function thermalConductivity(type: ParticleType): number {
  return THERMAL_CONDUCTIVITY[type];
}

/** Conductivity indexed by snapshot type code; slot 0 (empty) is unused. */
const CONDUCTIVITY_BY_CODE = new Uint8Array(PARTICLE_TYPES.length + 1);
for (const type of PARTICLE_TYPES) {
  CONDUCTIVITY_BY_CODE[typeCode(type)] = THERMAL_CONDUCTIVITY[type];
}

/**
 * Heat pushed from snapshot index `from` into `to`, truncated toward zero.
 * Zero when either cell was empty.
 */
function flowBetween(snapshot: ThermalSnapshot, from: number, to: number): number {
  const { types, temperatures } = snapshot;
  const targetCode = types[to];
  if (targetCode === 0) return 0;
  const tc = CONDUCTIVITY_BY_CODE[types[from]] + CONDUCTIVITY_BY_CODE[targetCode];
  // `|| 0` turns -0 from a tiny negative gradient into 0.
  return Math.trunc(temperatures[from] / tc) || 0;
}

function pushHeat(
  snapshot: ThermalSnapshot,
  source: Particle,
  targetColumn: Cell[],
  targetY: number,
  from: number,
  to: number
): void {
  const flow = flowBetween(snapshot, from, to);
  if (flow === 0) return;
  const target = targetColumn[targetY];
  if (target === null) return;
  source.temperature -= flow;
  target.temperature += flow;
}

/**
 * Pushes heat from the cell at (ax, ay) into (bx, by).
 *
 * The flow is derived from the snapshot temperature of the source; both live
 * particles are updated. Returns the amount moved (0 when either cell is
 * empty).
 */
export function exchangeHeat(
  grid: Grid,
  snapshot: ThermalSnapshot,
  ax: number,
  ay: number,
  bx: number,
  by: number
): number {
  const source = grid.get(ax, ay);
  const target = grid.get(bx, by);
  if (source === null || target === null) return 0;

  const { height } = snapshot;
  const flow = flowBetween(snapshot, ax * height + ay, bx * height + by);
  if (flow === 0) return 0;

  source.temperature -= flow;
  target.temperature += flow;
  return flow;
}

/**
 * Runs one diffusion pass over the whole grid, pushing heat from each
 * occupied cell down, right, up, then left.
 *
 * Reads columns directly; the loop bounds stand in for `Grid`'s checks.
 */
export function diffuseHeat(grid: Grid): void {
  const snapshot = grid.snapshot();
  const { width, height } = snapshot;
  const { cells } = grid;

  for (let x = 0; x < width; x++) {
    const column = cells[x];
    for (let y = 0; y < height; y++) {
      const particle = column[y];
      if (particle === null) continue;

      const index = x * height + y;
      if (y + 1 < height) pushHeat(snapshot, particle, column, y + 1, index, index + 1);
      if (x + 1 < width) pushHeat(snapshot, particle, cells[x + 1], y, index, index + height);
      if (y > 0) pushHeat(snapshot, particle, column, y - 1, index, index - 1);
      if (x > 0) pushHeat(snapshot, particle, cells[x - 1], y, index, index - height);
    }
  }
}
