import type { GridPosition } from '../types.ts';

/**
 * Converts a client-space pointer position to the grid cell under it.
 * The canvas may be scaled by CSS; its backing size is one pixel per cell.
 */
export function clientToCell(
  canvas: HTMLCanvasElement,
  clientX: number,
  clientY: number
): GridPosition {
  const bounds = canvas.getBoundingClientRect();
  const scaleX = canvas.width / Math.max(1, bounds.width);
  const scaleY = canvas.height / Math.max(1, bounds.height);
  return {
    x: Math.floor((clientX - bounds.left) * scaleX),
    y: Math.floor((clientY - bounds.top) * scaleY),
  };
}

/** Pointer state sampled once per frame by the painter. */
export interface BrushPointer {
  active: boolean;
  erase: boolean;
  cell: GridPosition;
}

interface BrushPointerControlOptions {
  canvas: HTMLCanvasElement;
  pointer: BrushPointer;
}

export function bindBrushPointerControls(options: BrushPointerControlOptions) {
  const { canvas, pointer } = options;

  function track(clientX: number, clientY: number) {
    pointer.cell = clientToCell(canvas, clientX, clientY);
  }

  canvas.addEventListener('mousedown', (e) => {
    track(e.clientX, e.clientY);
    pointer.active = true;
    pointer.erase = e.button === 2;
  });
  window.addEventListener('mouseup', () => {
    pointer.active = false;
  });
  canvas.addEventListener('mousemove', (e) => track(e.clientX, e.clientY));
  canvas.addEventListener('contextmenu', (e) => e.preventDefault());

  canvas.addEventListener('touchstart', (e) => {
    const touch = e.touches[0];
    track(touch.clientX, touch.clientY);
    pointer.active = true;
    pointer.erase = false;
  });
  canvas.addEventListener('touchend', () => {
    pointer.active = false;
  });
  canvas.addEventListener('touchmove', (e) => {
    e.preventDefault();
    const touch = e.touches[0];
    track(touch.clientX, touch.clientY);
  }, { passive: false });
}
