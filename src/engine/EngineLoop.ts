export type UpdateFn = (dt: number) => void;
export type RenderFn = (alpha: number) => void;

/** Abstracts the browser's frame callback so the loop can run without a DOM. */
export type FrameScheduler = {
  now: () => number;
  request: (callback: (time: number) => void) => number;
  cancel: (handle: number) => void;
};

export const animationFrameScheduler: FrameScheduler = {
  now: () => performance.now(),
  request: (callback) => requestAnimationFrame(callback),
  cancel: (handle) => cancelAnimationFrame(handle),
};

/** Longest frame delta fed into the accumulator, in seconds. */
const MAX_FRAME_DELTA = 0.25;

export class EngineLoop {
  private running = false;
  private lastTime = 0;
  private accumulator = 0;
  private frameId: number | null = null;

  constructor(
    private readonly update: UpdateFn,
    private readonly render?: RenderFn,
    private readonly timestep = 1 / 60,
    private readonly scheduler: FrameScheduler = animationFrameScheduler
  ) {}

  get isRunning() {
    return this.running;
  }

  start() {
    if (this.running) return;
    this.running = true;
    this.accumulator = 0;
    this.lastTime = this.scheduler.now();

    const tick = (time: number) => {
      if (!this.running) return;
      const delta = Math.min((time - this.lastTime) / 1000, MAX_FRAME_DELTA);
      this.lastTime = time;
      this.accumulator += Math.max(delta, 0);

      while (this.accumulator >= this.timestep) {
        this.update(this.timestep);
        this.accumulator -= this.timestep;
      }

      this.render?.(this.accumulator / this.timestep);

      this.frameId = this.scheduler.request(tick);
    };

    this.frameId = this.scheduler.request(tick);
  }

  stop() {
    this.running = false;
    if (this.frameId !== null) {
      this.scheduler.cancel(this.frameId);
      this.frameId = null;
    }
  }
}
