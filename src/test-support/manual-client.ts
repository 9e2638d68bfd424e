import type { DeviceId, DeviceLevel, DeviceStatusMap, RemoteClient, SetDeviceResult } from "../util/types.js";

type PendingCall<T> = {
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
};

export type PendingSet = PendingCall<SetDeviceResult> & { deviceId: DeviceId; value: DeviceLevel };

/** Remote client whose calls stay open until the test settles them. */
export class ManualClient implements RemoteClient {
  readonly sets: PendingSet[] = [];
  readonly polls: PendingCall<DeviceStatusMap>[] = [];

  setDeviceValue(deviceId: DeviceId, value: DeviceLevel): Promise<SetDeviceResult> {
    return new Promise((resolve, reject) => {
      this.sets.push({ deviceId, value, resolve, reject });
    });
  }

  getDevicesStatus(): Promise<DeviceStatusMap> {
    return new Promise((resolve, reject) => {
      this.polls.push({ resolve, reject });
    });
  }
}
