import type { DeviceLevel } from "./util/types.js";

/**
 * Decide what a device should display after a poll.
 *
 * While a command for the device is still queued or in flight, the poll
 * predates the user's intent and the optimistic value stays. Otherwise the
 * polled value is the truth. A device missing from the poll keeps what it had.
 */
export function reconcile(
  displayed: DeviceLevel | null,
  polled: DeviceLevel | undefined,
  hasOutstandingCommand: boolean,
): DeviceLevel | null {
  if (polled === undefined || hasOutstandingCommand) return displayed;
  return polled;
}
