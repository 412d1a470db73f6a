/**
 * Type definitions for the particle sandbox.
 *
 * The sandbox is a cellular automaton: a fixed-size grid where every cell is
 * either empty or holds exactly one typed particle. Each simulated step moves
 * particles, diffuses heat between neighbours and runs per-type reactions.
 */

/**
 * Every particle kind the sandbox knows about.
 * Lookup tables across the engine are keyed by this list, so adding a kind
 * here makes the compiler point at every table that needs a new entry.
 */
export const PARTICLE_TYPES = [
  'Sand',
  'WetSand',
  'Water',
  'Acid',
  'Iridium',
  'Replicator',
  'Plant',
  'Cryotheum',
  'Unstable',
  'Electricity',
  'Glass',
] as const;

export type ParticleType = (typeof PARTICLE_TYPES)[number];

/**
 * A single particle occupying one grid cell.
 */
export interface Particle {
  type: ParticleType;

  /** Signed integer temperature. Unbounded; only clamped when rendered. */
  temperature: number;

  /** Per-type scratch values, interpreted only by the behavior registry. */
  extraData1: number;
  extraData2: number;

  /**
   * Generation in which the update pipeline last handled this particle.
   * 0 means "never updated". Behaviors must not read or write it.
   */
  lastUpdate: number;
}

/** A grid cell: empty or holding one particle. */
export type Cell = Particle | null;

export interface GridPosition {
  x: number;
  y: number;
}

/**
 * RGB color with 0-255 integer channels.
 */
export interface RGB {
  r: number;
  g: number;
  b: number;
}

/**
 * Source of uniform randomness used when creating particles and inside
 * the default behaviors.
 */
export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;

  /** Uniform integer in [min, maxExclusive). */
  int(min: number, maxExclusive: number): number;
}

/**
 * Parameters of the turbulence field that shades particles.
 */
export interface NoiseConfig {
  /** Multiplier applied to `dt` to get the field's x/y offset. */
  timeScale: number;
  frequency: number;
  /** Frequency multiplier between octaves. */
  lacunarity: number;
  /** Amplitude multiplier between octaves. */
  gain: number;
  octaves: number;
}

export interface BrushConfig {
  /** Type painted by the primary pointer button. */
  type: ParticleType;
  radius: number;
}

/**
 * Complete configuration for a sandbox instance and its front end.
 */
export interface SandboxConfig {
  /** Grid width in cells (one pixel per cell). */
  width: number;

  /** Grid height in cells. */
  height: number;

  /** Glass at or above this temperature flows like a liquid. */
  glassMeltingPoint: number;

  /** Seed for particle creation and behaviors. Absent = time-based. */
  seed?: number;

  noise: NoiseConfig;
  brush: BrushConfig;

  /** Simulation steps performed per animation frame. */
  stepsPerFrame: number;

  /** Largest frame delta (seconds) fed into the noise animation clock. */
  maxFrameDelta: number;
}

/**
 * Front-end state shared between the loop, keyboard and GUI.
 */
export interface SimState {
  paused: boolean;

  /** Accumulated animation time in seconds, drives the noise offset. */
  elapsed: number;
}
