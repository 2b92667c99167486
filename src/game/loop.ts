/**
 * Frame Loop - calls `step` once per animation frame with the elapsed time.
 * Long gaps (a background tab) are clamped so timers never jump far.
 */

export const MAX_FRAME_MS = 250;

export interface FrameScheduler {
  request(callback: (now: number) => void): number;
  cancel(handle: number): void;
}

const animationFrames: FrameScheduler = {
  request: callback => requestAnimationFrame(callback),
  cancel: handle => cancelAnimationFrame(handle),
};

export class FrameLoop {
  private step: (dtMs: number) => void;
  private frames: FrameScheduler;
  private handle: number | null = null;
  private last: number | null = null;

  constructor(step: (dtMs: number) => void, frames: FrameScheduler = animationFrames) {
    this.step = step;
    this.frames = frames;
  }

  get running(): boolean {
    return this.handle !== null;
  }

  start() {
    if (this.handle !== null) return;
    this.last = null;
    this.handle = this.frames.request(this.frame);
  }

  stop() {
    if (this.handle === null) return;
    this.frames.cancel(this.handle);
    this.handle = null;
  }

  private frame = (now: number) => {
    const dt = this.last === null ? 0 : Math.min(MAX_FRAME_MS, Math.max(0, now - this.last));
    this.last = now;
    this.step(dt);
    // step() may have stopped the loop
    if (this.handle !== null) {
      this.handle = this.frames.request(this.frame);
    }
  };
}
