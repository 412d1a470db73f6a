import type { SimState } from '../types.ts';

interface KeyboardControlOptions {
  state: SimState;
  step: () => void;
  clear: () => void;
}

export function bindSimulationKeyboardControls(options: KeyboardControlOptions) {
  const { state, step, clear } = options;

  document.addEventListener('keydown', (e) => {
    if (e.key === 'p') {
      state.paused = !state.paused;
    }

    if (e.key === 'm') {
      state.paused = true;
      step();
    }

    if (e.key === 'c') {
      clear();
    }
  });
}
