import { describe, expect, it } from "vitest";
import { SessionClock, formatElapsed } from "../clock";

describe("SessionClock", () => {
  it("accumulates only while running", () => {
    let running = true;
    const clock = new SessionClock(() => running);
    clock.tick(1.5);
    running = false;
    clock.tick(10);
    running = true;
    clock.tick(0.5);
    expect(clock.elapsedSeconds).toBe(2);
  });

  it("ignores negative deltas and resets to zero", () => {
    const clock = new SessionClock(() => true);
    clock.tick(3);
    clock.tick(-1);
    expect(clock.elapsedSeconds).toBe(3);
    clock.reset();
    expect(clock.elapsedSeconds).toBe(0);
  });
});

describe("formatElapsed", () => {
  it("renders minutes and seconds", () => {
    expect(formatElapsed(0)).toBe("00:00");
    expect(formatElapsed(65)).toBe("01:05");
    expect(formatElapsed(3599.99)).toBe("59:59");
    expect(formatElapsed(-4)).toBe("00:00");
  });

  it("appends tenths on request", () => {
    expect(formatElapsed(65.3, { tenths: true })).toBe("01:05.3");
    expect(formatElapsed(0.05, { tenths: true })).toBe("00:00.0");
  });
});
