/**
 * Configuration factory for the particle sandbox.
 *
 * Defaults reproduce the reference setup: a 600x400 grid, glass that melts
 * at 30 degrees and a three-octave turbulence field animated at 20x the
 * elapsed time.
 */

import { SandboxConfigError } from './errors.ts';
import type { SandboxConfig } from './types.ts';

export interface ConfigOverrides
  extends Partial<Omit<SandboxConfig, 'noise' | 'brush'>> {
  noise?: Partial<SandboxConfig['noise']>;
  brush?: Partial<SandboxConfig['brush']>;
}

/**
 * Creates a new configuration object with default sandbox parameters.
 *
 * @param overrides - Values replacing the defaults; nested objects are merged
 */
export function createConfig(overrides: ConfigOverrides = {}): SandboxConfig {
  const { noise, brush, ...rest } = overrides;

  return {
    // === Grid ===
    width: 600,
    height: 400,

    // === Physics ===
    glassMeltingPoint: 30,

    // === Time ===
    stepsPerFrame: 1,
    maxFrameDelta: 0.033, // 30 FPS worth of animation time at most

    ...rest,

    // === Shading ===
    noise: {
      timeScale: 20,
      frequency: 0.02,
      lacunarity: 0.5,
      gain: 2,
      octaves: 3,
      ...noise,
    },

    // === Painting ===
    brush: {
      type: 'Sand',
      radius: 4,
      ...brush,
    },
  };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Rejects configurations the engine cannot run with.
 *
 * @throws SandboxConfigError naming the first offending field
 */
export function validateConfig(config: SandboxConfig): void {
  if (!isPositiveInteger(config.width) || !isPositiveInteger(config.height)) {
    throw new SandboxConfigError(
      `Grid dimensions must be positive integers, got ${config.width}x${config.height}`
    );
  }
  if (!Number.isFinite(config.glassMeltingPoint)) {
    throw new SandboxConfigError('glassMeltingPoint must be a finite number');
  }
  if (config.seed !== undefined && !Number.isFinite(config.seed)) {
    throw new SandboxConfigError('seed must be a finite number');
  }
  if (!isPositiveInteger(config.noise.octaves)) {
    throw new SandboxConfigError(`noise.octaves must be a positive integer, got ${config.noise.octaves}`);
  }
  if (!Number.isFinite(config.noise.timeScale) || !Number.isFinite(config.noise.frequency)) {
    throw new SandboxConfigError('noise.timeScale and noise.frequency must be finite');
  }
  if (!isPositiveInteger(config.stepsPerFrame)) {
    throw new SandboxConfigError(`stepsPerFrame must be a positive integer, got ${config.stepsPerFrame}`);
  }
  if (!(config.brush.radius >= 0)) {
    throw new SandboxConfigError(`brush.radius must be non-negative, got ${config.brush.radius}`);
  }
}
