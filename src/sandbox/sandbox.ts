import { validateConfig, createConfig } from '../config.ts';
import type { ConfigOverrides } from '../config.ts';
import { createBehaviorRegistry } from '../behavior/registry.ts';
import type { BehaviorRegistry } from '../behavior/registry.ts';
import { createParticle, createRng, paintCircle } from '../spawn.ts';
import type { ParticleType, RandomSource, SandboxConfig } from '../types.ts';
import { Grid } from './grid.ts';
import { createTurbulenceField } from './noise.ts';
import type { NoiseFieldGenerator } from './noise.ts';
import { step } from './pipeline.ts';
import { createPixelRenderer } from './renderer.ts';
import type { FrameBuffer, PixelRenderer } from './renderer.ts';

export interface SandboxDependencies {
  /** Replaces the default behavior set built from the sandbox's rng. */
  behaviors?: BehaviorRegistry;
  /** Replaces the turbulence field (e.g. a flat field in tests). */
  noise?: NoiseFieldGenerator;
  rng?: RandomSource;
}

/**
 * A particle sandbox: grid, behaviors and renderer behind one object.
 *
 * `update()` and `render()` are synchronous and must be called serially.
 */
export class Sandbox {
  readonly config: SandboxConfig;
  readonly grid: Grid;
  readonly rng: RandomSource;
  readonly behaviors: BehaviorRegistry;

  private readonly renderer: PixelRenderer;

  constructor(config: ConfigOverrides = {}, deps: SandboxDependencies = {}) {
    this.config = createConfig(config);
    validateConfig(this.config);

    this.grid = new Grid(this.config.width, this.config.height);
    this.rng = deps.rng ?? createRng(this.config.seed ?? Date.now());
    this.behaviors = deps.behaviors ?? createBehaviorRegistry(this.rng);

    const noise = deps.noise ?? createTurbulenceField(this.config.noise, () => this.rng.next());
    this.renderer = createPixelRenderer(this.grid, noise, this.config.noise.timeScale);
  }

  get width(): number {
    return this.grid.width;
  }

  get height(): number {
    return this.grid.height;
  }

  /** Runs the movement, diffusion and interaction passes once. */
  update(): void {
    step(this.grid, this.behaviors, { glassMeltingPoint: this.config.glassMeltingPoint });
  }

  render(frame: FrameBuffer, dt: number): void {
    this.renderer.render(frame, dt);
  }

  /**
   * Places a fresh particle, replacing whatever occupied the cell.
   */
  place(x: number, y: number, type: ParticleType): void {
    this.grid.set(x, y, createParticle(type, this.rng));
  }

  erase(x: number, y: number): void {
    this.grid.set(x, y, null);
  }

  /** Paints (or erases, with `type` null) a disc; returns cells changed. */
  paint(cx: number, cy: number, radius: number, type: ParticleType | null): number {
    return paintCircle(this.grid, cx, cy, radius, type, this.rng);
  }

  clear(): void {
    this.grid.clear();
  }

  countParticles(): number {
    return this.grid.countParticles();
  }
}
