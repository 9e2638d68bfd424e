import { RemoteFailureError, RemoteTimeoutError } from "../util/errors.js";
import type { DeviceId, DeviceLevel, DeviceStatusMap, RemoteClient, SetDeviceResult } from "../util/types.js";

export type InjectedFault = "failure" | "timeout";

export type MemoryCall =
  | { op: "setDeviceValue"; deviceId: DeviceId; value: DeviceLevel; at: number }
  | { op: "getDevicesStatus"; at: number };

/**
 * In-process device table standing in for the cloud API: used for dry runs
 * and by tests. Every call is recorded with the time it was made.
 */
export class MemoryAdapter implements RemoteClient {
  readonly calls: MemoryCall[] = [];
  private readonly devices: Map<DeviceId, DeviceLevel>;
  private readonly faults: InjectedFault[] = [];

  constructor(initial: Iterable<readonly [DeviceId, DeviceLevel]> = []) {
    this.devices = new Map(initial);
  }

  /** Make the next call(s) fail, in order. */
  failNext(...faults: InjectedFault[]): void {
    this.faults.push(...faults);
  }

  async setDeviceValue(deviceId: DeviceId, value: DeviceLevel): Promise<SetDeviceResult> {
    this.calls.push({ op: "setDeviceValue", deviceId, value, at: Date.now() });
    this.throwInjected(`setDeviceValue(${deviceId})`);
    if (!this.devices.has(deviceId)) {
      throw new RemoteFailureError(`Unknown device ${deviceId}`, 404);
    }
    this.devices.set(deviceId, value);
    return { deviceId, value };
  }

  async getDevicesStatus(): Promise<DeviceStatusMap> {
    this.calls.push({ op: "getDevicesStatus", at: Date.now() });
    this.throwInjected("getDevicesStatus");
    return new Map(this.devices);
  }

  /** Change a device behind the dispatcher's back, as a wall switch would. */
  setExternally(deviceId: DeviceId, value: DeviceLevel): void {
    this.devices.set(deviceId, value);
  }

  private throwInjected(operation: string): void {
    const fault = this.faults.shift();
    if (fault === "failure") throw new RemoteFailureError(`${operation} failed`, 500);
    if (fault === "timeout") throw new RemoteTimeoutError(`${operation} timed out`);
  }
}
