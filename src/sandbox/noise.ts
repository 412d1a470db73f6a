/**
 * Turbulence field used to shade particles.
 *
 * Turbulence is fractal noise built from the absolute value of each octave:
 *
 *   t(x, y) = sum_i |simplex(x * f * l^i, y * f * l^i)| * g^i
 *
 * where f is the base frequency, l the lacunarity and g the gain. The whole
 * field is then rescaled linearly so its minimum maps to -1 and its maximum
 * to 1.
 */

import { createNoise2D } from 'simplex-noise';
import type { NoiseConfig } from '../types.ts';

/**
 * Generates a `width * height` field, row-major (`y * width + x`), sampled
 * starting at the given offsets with a spacing of one unit per sample.
 * When `out` has exactly `width * height` entries it is filled and returned
 * in place of a new array.
 */
export type NoiseFieldGenerator = (
  xOffset: number,
  yOffset: number,
  width: number,
  height: number,
  out?: Float32Array
) => Float32Array;

/**
 * Rescales `values` in place so the smallest maps to `min` and the largest
 * to `max`. A flat field maps to the midpoint.
 */
export function rescale(values: Float32Array, min: number, max: number): Float32Array {
  let lo = Infinity;
  let hi = -Infinity;
  for (const v of values) {
    if (v < lo) lo = v;
    if (v > hi) hi = v;
  }

  const range = hi - lo;
  if (!(range > 0)) {
    values.fill((min + max) / 2);
    return values;
  }

  const span = max - min;
  for (let i = 0; i < values.length; i++) {
    values[i] = min + ((values[i] - lo) / range) * span;
  }
  return values;
}

/**
 * Creates a turbulence field generator.
 *
 * @param config - Frequency, lacunarity, gain and octave count
 * @param random - Seeds the permutation table of the underlying noise
 */
export function createTurbulenceField(config: NoiseConfig, random: () => number = Math.random): NoiseFieldGenerator {
  const noise2D = createNoise2D(random);
  const { frequency, lacunarity, gain, octaves } = config;

  return (xOffset, yOffset, width, height, out) => {
    const size = width * height;
    const field = out !== undefined && out.length === size ? out : new Float32Array(size);

    let i = 0;
    for (let y = 0; y < height; y++) {
      const baseY = (yOffset + y) * frequency;
      for (let x = 0; x < width; x++) {
        let fx = (xOffset + x) * frequency;
        let fy = baseY;
        let amplitude = 1;
        let sum = 0;

        for (let octave = 0; octave < octaves; octave++) {
          sum += Math.abs(noise2D(fx, fy)) * amplitude;
          fx *= lacunarity;
          fy *= lacunarity;
          amplitude *= gain;
        }

        field[i++] = sum;
      }
    }

    return rescale(field, -1, 1);
  };
}
