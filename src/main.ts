/**
 * Application entry point.
 *
 * Mounts the canvas, builds the sandbox and its controls, and runs the
 * animation loop. Left button paints the selected particle, right button
 * erases; P pauses, M steps once, C clears.
 */

import './style.css';
import { setupGui } from './common/gui.ts';
import { bindSimulationKeyboardControls } from './core/keyboard.ts';
import { startAnimationLoop } from './core/loop.ts';
import { createSim } from './sim.ts';

const app = document.querySelector<HTMLDivElement>('#app');
if (!app) throw new Error('Missing #app container');

app.innerHTML = `
  <canvas id="sandbox-canvas" aria-label="Particle sandbox"></canvas>
`;

const canvas = document.querySelector<HTMLCanvasElement>('#sandbox-canvas');
if (!canvas) throw new Error('Missing sandbox canvas');

const sim = createSim(canvas);

const { stats } = setupGui(sim.config, sim.state, {
  onStep: () => {
    sim.state.paused = true;
    sim.stepOnce();
  },
  onClear: () => sim.clear(),
});

bindSimulationKeyboardControls({
  state: sim.state,
  step: () => sim.stepOnce(),
  clear: () => sim.clear(),
});

let lastTime = performance.now();

startAnimationLoop({
  frame: (now) => {
    stats.begin();

    const dt = (now - lastTime) / 1000;
    lastTime = now;
    sim.frame(dt);

    stats.end();
    stats.update();
  },
});
