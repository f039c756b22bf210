/**
 * Elapsed play time, advanced by whoever owns the frame loop. Time only
 * accumulates while `isRunning` reports true, so pausing or winning stops it.
 */
export class SessionClock {
  private elapsed = 0;

  constructor(private readonly isRunning: () => boolean) {}

  tick(dtSeconds: number) {
    if (dtSeconds <= 0 || !this.isRunning()) return;
    this.elapsed += dtSeconds;
  }

  reset() {
    this.elapsed = 0;
  }

  get elapsedSeconds() {
    return this.elapsed;
  }
}

const pad2 = (value: number) => String(value).padStart(2, "0");

export const formatElapsed = (
  seconds: number,
  { tenths = false }: { tenths?: boolean } = {}
) => {
  const totalTenths = Math.floor(Math.max(0, seconds) * 10 + 1e-9);
  const wholeSeconds = Math.floor(totalTenths / 10);
  const minutes = Math.floor(wholeSeconds / 60);
  const base = `${pad2(minutes)}:${pad2(wholeSeconds % 60)}`;
  return tenths ? `${base}.${totalTenths % 10}` : base;
};
