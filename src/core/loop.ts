interface AnimationLoopOptions {
  frame: (now: number) => void;
}

/**
 * Drives `frame` from requestAnimationFrame until stopped.
 * A frame that throws stops the loop; the error is logged, not rethrown.
 *
 * @returns Function that stops the loop
 */
export function startAnimationLoop(options: AnimationLoopOptions): () => void {
  const { frame } = options;
  let handle = 0;
  let stopped = false;

  function tick(now: number) {
    if (stopped) return;
    try {
      frame(now);
    } catch (error) {
      stopped = true;
      console.error('Sandbox frame failed, animation loop stopped', error);
      return;
    }
    handle = requestAnimationFrame(tick);
  }

  handle = requestAnimationFrame(tick);

  return () => {
    stopped = true;
    cancelAnimationFrame(handle);
  };
}
