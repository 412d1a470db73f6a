/**
 * Error types raised by the sandbox.
 *
 * None of these are recoverable inside the engine: they signal a broken
 * configuration or a behavior hook that violated its contract, and are
 * thrown straight out of `update()` / `render()`.
 */

export class SandboxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SandboxError';
  }
}

/** Invalid values in a `SandboxConfig`. */
export class SandboxConfigError extends SandboxError {
  constructor(message: string) {
    super(message);
    this.name = 'SandboxConfigError';
  }
}

/** A coordinate outside the grid was read or written. */
export class GridBoundsError extends SandboxError {
  readonly x: number;
  readonly y: number;

  constructor(x: number, y: number, width: number, height: number) {
    super(`Cell (${x}, ${y}) is outside the ${width}x${height} grid`);
    this.name = 'GridBoundsError';
    this.x = x;
    this.y = y;
  }
}

/** A collaborator broke its side of the engine contract. */
export class BehaviorContractError extends SandboxError {
  constructor(message: string) {
    super(message);
    this.name = 'BehaviorContractError';
  }
}

/** A pixel buffer too small for the grid was passed to the renderer. */
export class FrameBufferError extends SandboxError {
  constructor(required: number, actual: number) {
    super(`Frame buffer needs ${required} bytes, got ${actual}`);
    this.name = 'FrameBufferError';
  }
}
