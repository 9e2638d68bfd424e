import { describe, expect, it } from "vitest";
import * as fc from "fast-check";

import { RateGate } from "./limiter.js";
import { maxInWindow } from "../test-support/timers.js";

describe("RateGate", () => {
  it("admits the first call and enforces minimum spacing", () => {
    const gate = new RateGate({ windowCapacity: 30, windowDurationMs: 60_000, minSpacingMs: 2_000 });

    expect(gate.tryAcquire(0)).toBe(true);
    gate.recordCall(0);

    expect(gate.tryAcquire(1_999)).toBe(false);
    expect(gate.nextAvailableAt(1_000)).toBe(2_000);
    expect(gate.tryAcquire(2_000)).toBe(true);
  });

  it("blocks once the window is full and frees a slot when the oldest call ages out", () => {
    const gate = new RateGate({ windowCapacity: 3, windowDurationMs: 1_000, minSpacingMs: 0 });
    for (const t of [0, 100, 200]) {
      expect(gate.tryAcquire(t)).toBe(true);
      gate.recordCall(t);
    }

    expect(gate.tryAcquire(500)).toBe(false);
    expect(gate.nextAvailableAt(500)).toBe(1_000);
    expect(gate.tryAcquire(999)).toBe(false);
  });

  it("treats a call exactly one window old as expired", () => {
    const gate = new RateGate({ windowCapacity: 1, windowDurationMs: 1_000, minSpacingMs: 0 });
    gate.recordCall(0);

    expect(gate.tryAcquire(999)).toBe(false);
    expect(gate.tryAcquire(1_000)).toBe(true);
  });

  it("takes the later of the window slot and the spacing deadline", () => {
    const gate = new RateGate({ windowCapacity: 2, windowDurationMs: 1_000, minSpacingMs: 300 });
    gate.recordCall(0);
    gate.recordCall(900);

    // window frees at 1000, spacing at 1200
    expect(gate.nextAvailableAt(950)).toBe(1_200);
  });

  it("is side-effect free until a call is recorded", () => {
    const gate = new RateGate({ windowCapacity: 1, windowDurationMs: 1_000, minSpacingMs: 0 });

    expect(gate.tryAcquire(0)).toBe(true);
    expect(gate.tryAcquire(0)).toBe(true);
    expect(gate.snapshot(0)).toEqual({ callsInWindow: 0, remaining: 1, nextAvailableAt: 0 });
  });

  it("reports remaining budget", () => {
    const gate = new RateGate({ windowCapacity: 30, windowDurationMs: 60_000, minSpacingMs: 2_000 });
    gate.recordCall(10_000);
    gate.recordCall(12_000);

    expect(gate.snapshot(13_000)).toEqual({ callsInWindow: 2, remaining: 28, nextAvailableAt: 14_000 });
    expect(gate.snapshot(72_000)).toEqual({ callsInWindow: 0, remaining: 30, nextAvailableAt: 72_000 });
  });

  it("never exceeds capacity or undercuts spacing for any arrival pattern", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 10 }),
        fc.integer({ min: 1, max: 2_000 }),
        fc.integer({ min: 0, max: 500 }),
        fc.array(fc.integer({ min: 0, max: 20_000 }), { minLength: 1, maxLength: 80 }),
        (capacity, windowMs, spacingMs, arrivals) => {
          const gate = new RateGate({
            windowCapacity: capacity,
            windowDurationMs: windowMs,
            minSpacingMs: spacingMs,
          });
          const granted: number[] = [];
          let clock = 0;

          for (const arrival of [...arrivals].sort((a, b) => a - b)) {
            let now = Math.max(clock, arrival);
            while (!gate.tryAcquire(now)) {
              const next = gate.nextAvailableAt(now);
              expect(next).toBeGreaterThan(now);
              now = next;
            }
            gate.recordCall(now);
            granted.push(now);
            clock = now;
          }

          for (let i = 1; i < granted.length; i++) {
            expect(granted[i] - granted[i - 1]).toBeGreaterThanOrEqual(spacingMs);
          }
          expect(maxInWindow(granted, windowMs)).toBeLessThanOrEqual(capacity);
        },
      ),
      { seed: 30_060, numRuns: 300 },
    );
  });
});
