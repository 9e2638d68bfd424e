import { vi } from "vitest";

export const START_TIME = 1_700_000_000_000;

/**
 * Fake the clock and timers but leave setImmediate real, so `settle` can
 * drain pending promise callbacks without moving time.
 */
export function useFakeClock(): void {
  vi.useFakeTimers({
    toFake: ["setTimeout", "clearTimeout", "setInterval", "clearInterval", "Date"],
    now: START_TIME,
  });
}

export async function settle(): Promise<void> {
  for (let i = 0; i < 5; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

/** Largest number of timestamps falling inside any window of `windowMs`. */
export function maxInWindow(times: readonly number[], windowMs: number): number {
  let max = 0;
  for (let i = 0; i < times.length; i++) {
    let j = i;
    while (j < times.length && times[j] - times[i] < windowMs) j++;
    max = Math.max(max, j - i);
  }
  return max;
}
