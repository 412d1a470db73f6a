/**
 * Pixel renderer.
 *
 * Turns the grid into a row-major RGBA buffer, one pixel per cell:
 * 1. Empty cells are dark grey.
 * 2. Particles start from their type's palette color.
 * 3. A turbulence sample nudges all three channels by `sample * intensity`,
 *    clamped to [0, 255]. The intensity depends on the type.
 * 4. Temperature tints the pixel: cold adds to blue, warm to red, each
 *    clamped to 255 and added with saturation.
 *
 * The turbulence field is generated at twice the grid width and half its
 * height, then read with a plain running index in pixel order, not
 * remapped to the field's own shape.
 */

import { FrameBufferError } from '../errors.ts';
import type { Particle, ParticleType, RGB } from '../types.ts';
import type { Grid } from './grid.ts';
import type { NoiseFieldGenerator } from './noise.ts';

export const EMPTY_COLOR: Readonly<RGB> = { r: 20, g: 20, b: 20 };

/** Base color per type. Plant uses `PLANT_SHOOT_COLOR` below growth 2. */
export const PALETTE = {
  Sand: { r: 196, g: 192, b: 135 },
  WetSand: { r: 166, g: 162, b: 105 },
  Water: { r: 8, g: 130, b: 201 },
  Acid: { r: 128, g: 209, b: 0 },
  Iridium: { r: 205, g: 210, b: 211 },
  Replicator: { r: 68, g: 11, b: 67 },
  Plant: { r: 86, g: 216, b: 143 },
  Cryotheum: { r: 12, g: 191, b: 201 },
  Unstable: { r: 181, g: 158, b: 128 },
  Electricity: { r: 247, g: 244, b: 49 },
  Glass: { r: 159, g: 198, b: 197 },
} as const satisfies Record<ParticleType, RGB>;

export const PLANT_SHOOT_COLOR: Readonly<RGB> = { r: 75, g: 209, b: 216 };

/** Noise intensity per type; Plant and Unstable are computed. */
const NOISE_INTENSITY = {
  Sand: 10,
  WetSand: 10,
  Water: 30,
  Acid: 50,
  Iridium: 0,
  Replicator: 10,
  Plant: 5,
  Cryotheum: 10,
  Unstable: 0,
  Electricity: 200,
  Glass: 50,
} as const satisfies Record<ParticleType, number>;

export function baseColor(particle: Particle): Readonly<RGB> {
  if (particle.type === 'Plant' && particle.extraData1 < 2) return PLANT_SHOOT_COLOR;
  return PALETTE[particle.type];
}

export function noiseIntensity(particle: Particle): number {
  switch (particle.type) {
    case 'Plant':
      return particle.extraData1 < 2 ? 10 : 5;
    case 'Unstable':
      // Shimmers harder as it heats toward detonation.
      return particle.temperature > 0 ? Math.trunc(10 * (particle.temperature / 200)) : 0;
    default:
      return NOISE_INTENSITY[particle.type];
  }
}

function clampChannel(value: number): number {
  if (value < 0) return 0;
  if (value > 255) return 255;
  return value;
}

export type FrameBuffer = Uint8Array | Uint8ClampedArray;

export interface PixelRenderer {
  /**
   * Writes every pixel of the grid into `frame`.
   *
   * @param frame - Caller-owned buffer of at least `4 * width * height` bytes
   * @param dt - Elapsed time in seconds; animates the noise field
   */
  render(frame: FrameBuffer, dt: number): void;
}

/**
 * Creates a renderer bound to one grid.
 *
 * @param noise - Turbulence generator, sampled once per `render` call into
 *   a field buffer the renderer owns
 * @param timeScale - Noise offset per second of `dt`
 */
export function createPixelRenderer(grid: Grid, noise: NoiseFieldGenerator, timeScale: number): PixelRenderer {
  const { width, height } = grid;
  const noiseWidth = width * 2;
  const noiseHeight = Math.ceil(height / 2);
  const noiseBuffer = new Float32Array(noiseWidth * noiseHeight);

  return {
    render(frame, dt) {
      const required = 4 * width * height;
      if (frame.length < required) {
        throw new FrameBufferError(required, frame.length);
      }

      const offset = dt * timeScale;
      const field = noise(offset, offset, noiseWidth, noiseHeight, noiseBuffer);

      const { cells } = grid;
      let frameIndex = 0;
      let noiseIndex = 0;
      for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
          let r = EMPTY_COLOR.r;
          let g = EMPTY_COLOR.g;
          let b = EMPTY_COLOR.b;

          const particle = cells[x][y];
          if (particle !== null) {
            const color = baseColor(particle);
            r = color.r;
            g = color.g;
            b = color.b;

            const intensity = noiseIntensity(particle);
            if (intensity !== 0) {
              const m = Math.trunc(field[noiseIndex] * intensity);
              r = clampChannel(r + m);
              g = clampChannel(g + m);
              b = clampChannel(b + m);
            }

            const t = particle.temperature;
            if (t < 0) {
              b = Math.min(255, b + Math.min(-t, 255));
            } else {
              r = Math.min(255, r + Math.min(t, 255));
            }
          }

          frame[frameIndex] = r;
          frame[frameIndex + 1] = g;
          frame[frameIndex + 2] = b;
          frame[frameIndex + 3] = 255;

          frameIndex += 4;
          noiseIndex++;
        }
      }
    },
  };
}
