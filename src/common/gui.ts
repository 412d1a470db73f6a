/**
 * lil-gui control panel and stats-gl FPS display for the sandbox.
 */

import GUI from 'lil-gui';
import Stats from 'stats-gl';
import { PARTICLE_TYPES } from '../types.ts';
import type { SandboxConfig, SimState } from '../types.ts';

export interface GuiCallbacks {
  onStep: () => void;
  onClear: () => void;
}

export interface GuiSetup {
  gui: GUI;
  stats: Stats;
  uiState: { showStats: boolean };
}

/**
 * Creates the control panel.
 *
 * @param config - Brush and timing settings the controls bind to
 * @param state - Pause flag, shown live so keyboard toggles are reflected
 */
export function setupGui(config: SandboxConfig, state: SimState, callbacks: GuiCallbacks): GuiSetup {
  const gui = new GUI({ title: 'Sandbox' });
  const stats = new Stats({ trackGPU: false, horizontal: true });
  stats.dom.style.display = 'none';
  document.body.appendChild(stats.dom);

  const uiState = { showStats: false };
  const actions = {
    step: () => callbacks.onStep(),
    clear: () => callbacks.onClear(),
  };

  // === Brush ===
  const brushFolder = gui.addFolder('Brush');
  brushFolder.add(config.brush, 'type', [...PARTICLE_TYPES]).name('Particle');
  brushFolder.add(config.brush, 'radius', 0, 30, 1).name('Radius');

  // === Simulation ===
  const simulationFolder = gui.addFolder('Simulation');
  simulationFolder.add(state, 'paused').name('Paused (P)').listen();
  simulationFolder.add(actions, 'step').name('Step (M)');
  simulationFolder.add(actions, 'clear').name('Clear (C)');
  simulationFolder.add(config, 'stepsPerFrame', 1, 8, 1).name('Steps Per Frame');

  // === Performance ===
  const performanceFolder = gui.addFolder('Performance');
  performanceFolder.close();
  performanceFolder
    .add(uiState, 'showStats')
    .name('Show FPS')
    .onChange((value: boolean) => {
      stats.dom.style.display = value ? 'block' : 'none';
    });

  return { gui, stats, uiState };
}
