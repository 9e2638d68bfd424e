export type DeviceId = string;

/** Device output level, 0 (off) to 100 (fully on). Relays only use 0 and 100. */
export type DeviceLevel = number;

export type DeviceStatusMap = ReadonlyMap<DeviceId, DeviceLevel>;

export type SetDeviceResult = { deviceId: DeviceId; value: DeviceLevel };

/**
 * The remote device-control API. Every call costs one unit of the account's
 * rate budget, and each implementation owns its own request timeout.
 */
export interface RemoteClient {
  setDeviceValue(deviceId: DeviceId, value: DeviceLevel): Promise<SetDeviceResult>;
  getDevicesStatus(): Promise<DeviceStatusMap>;
}

export type DeviceView = {
  deviceId: DeviceId;
  displayedValue: DeviceLevel | null;
  lastPolledValue: DeviceLevel | null;
  isOn: boolean;
  commandOutstanding: boolean;
};
