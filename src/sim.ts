/**
 * Browser wiring for the sandbox.
 *
 * Connects a canvas to a `Sandbox`: sizes the canvas to the grid, renders
 * into an ImageData buffer each frame, and applies the brush while the
 * pointer is held down.
 */

import type { ConfigOverrides } from './config.ts';
import { bindBrushPointerControls } from './core/input.ts';
import type { BrushPointer } from './core/input.ts';
import { Sandbox } from './sandbox/sandbox.ts';
import type { SandboxConfig, SimState } from './types.ts';

export interface Sim {
  sandbox: Sandbox;
  config: SandboxConfig;
  state: SimState;
  /** Advances time, paints, steps (unless paused) and draws. */
  frame(deltaSeconds: number): void;
  /** Runs exactly one simulation step, paused or not. */
  stepOnce(): void;
  clear(): void;
  draw(): void;
}

/**
 * Creates the sandbox and binds it to a canvas.
 *
 * @param canvas - Canvas to draw into; its backing size becomes the grid size
 */
export function createSim(canvas: HTMLCanvasElement, overrides: ConfigOverrides = {}): Sim {
  const sandbox = new Sandbox(overrides);
  const { config } = sandbox;

  canvas.width = config.width;
  canvas.height = config.height;
  const context = canvas.getContext('2d');
  if (!context) throw new Error('Could not create 2D canvas context');
  const ctx: CanvasRenderingContext2D = context;

  const imageData = ctx.createImageData(config.width, config.height);
  const state: SimState = { paused: false, elapsed: 0 };
  const pointer: BrushPointer = { active: false, erase: false, cell: { x: 0, y: 0 } };

  bindBrushPointerControls({ canvas, pointer });

  console.info(`Sandbox ready: ${config.width}x${config.height}, seed ${config.seed ?? 'time-based'}`);

  function applyBrush(): void {
    if (!pointer.active) return;
    const type = pointer.erase ? null : config.brush.type;
    sandbox.paint(pointer.cell.x, pointer.cell.y, config.brush.radius, type);
  }

  function draw(): void {
    sandbox.render(imageData.data, state.elapsed);
    ctx.putImageData(imageData, 0, 0);
  }

  return {
    sandbox,
    config,
    state,

    frame(deltaSeconds) {
      state.elapsed += Math.min(config.maxFrameDelta, Math.max(0, deltaSeconds));
      applyBrush();
      if (!state.paused) {
        for (let i = 0; i < config.stepsPerFrame; i++) sandbox.update();
      }
      draw();
    },

    stepOnce() {
      sandbox.update();
      draw();
    },

    clear() {
      sandbox.clear();
      draw();
    },

    draw,
  };
}
