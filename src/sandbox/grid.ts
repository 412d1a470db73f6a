import { GridBoundsError } from '../errors.ts';
import type { Cell, Particle, ParticleType } from '../types.ts';

/** Largest generation value before the counter wraps back to 1. */
export const MAX_GENERATION = 255;

/**
 * Type and temperature of every cell, frozen at one instant.
 *
 * Flat arrays use column-major indexing (`x * height + y`), matching the
 * grid's `[x][y]` layout.
 */
export interface ThermalSnapshot {
  width: number;
  height: number;
  /** 0 for an empty cell, otherwise `typeCode` of the occupant. */
  types: Uint8Array;
  temperatures: Float64Array;
}

/** Snapshot code per type: `PARTICLE_TYPES` index + 1. */
const TYPE_CODES = {
  Sand: 1,
  WetSand: 2,
  Water: 3,
  Acid: 4,
  Iridium: 5,
  Replicator: 6,
  Plant: 7,
  Cryotheum: 8,
  Unstable: 9,
  Electricity: 10,
  Glass: 11,
} as const satisfies Record<ParticleType, number>;

export function typeCode(type: ParticleType): number {
  return TYPE_CODES[type];
}

/**
 * Grid store: a fixed-size `[x][y]` array of optional particles plus the
 * cycling update-generation counter.
 *
 * Every accessor checks bounds and throws `GridBoundsError` on a miss;
 * callers that probe neighbours test `inBounds` first.
 */
export class Grid {
  readonly width: number;
  readonly height: number;
  readonly cells: Cell[][];

  private generationValue = 1;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.cells = [];
    for (let x = 0; x < width; x++) {
      this.cells.push(new Array<Cell>(height).fill(null));
    }
  }

  /** Generation of the pass currently running (or the last one run). */
  get generation(): number {
    return this.generationValue;
  }

  /**
   * Moves to the next generation: 255 wraps to 1, never to 0.
   */
  advanceGeneration(): number {
    this.generationValue = this.generationValue >= MAX_GENERATION ? 1 : this.generationValue + 1;
    return this.generationValue;
  }

  inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  private assertInBounds(x: number, y: number): void {
    if (!this.inBounds(x, y)) {
      throw new GridBoundsError(x, y, this.width, this.height);
    }
  }

  get(x: number, y: number): Cell {
    this.assertInBounds(x, y);
    return this.cells[x][y];
  }

  set(x: number, y: number, cell: Cell): void {
    this.assertInBounds(x, y);
    this.cells[x][y] = cell;
  }

  isEmpty(x: number, y: number): boolean {
    return this.get(x, y) === null;
  }

  /**
   * Relocates whatever is at the source into the target; the source is left
   * empty and the target's previous occupant is discarded.
   */
  move(fromX: number, fromY: number, toX: number, toY: number): void {
    const particle = this.get(fromX, fromY);
    this.set(fromX, fromY, null);
    this.set(toX, toY, particle);
  }

  swap(ax: number, ay: number, bx: number, by: number): void {
    const a = this.get(ax, ay);
    this.set(ax, ay, this.get(bx, by));
    this.set(bx, by, a);
  }

  clear(): void {
    for (const column of this.cells) {
      column.fill(null);
    }
  }

  countParticles(): number {
    let count = 0;
    for (const column of this.cells) {
      for (const cell of column) {
        if (cell !== null) count++;
      }
    }
    return count;
  }

  /**
   * Visits every occupied cell in raster order: x ascending, then y.
   */
  forEachParticle(visit: (particle: Particle, x: number, y: number) => void): void {
    for (let x = 0; x < this.width; x++) {
      for (let y = 0; y < this.height; y++) {
        const particle = this.cells[x][y];
        if (particle !== null) visit(particle, x, y);
      }
    }
  }

  /**
   * Full copy of every cell's type and temperature.
   */
  snapshot(): ThermalSnapshot {
    const total = this.width * this.height;
    const types = new Uint8Array(total);
    const temperatures = new Float64Array(total);

    for (let x = 0; x < this.width; x++) {
      const column = this.cells[x];
      for (let y = 0; y < this.height; y++) {
        const particle = column[y];
        if (particle === null) continue;
        const index = x * this.height + y;
        types[index] = typeCode(particle.type);
        temperatures[index] = particle.temperature;
      }
    }

    return { width: this.width, height: this.height, types, temperatures };
  }
}
