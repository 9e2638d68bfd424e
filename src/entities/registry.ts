import type { Logger } from "pino";
import type { StatusCoordinator } from "../coordinator.js";
import type { DeviceId, DeviceStatusMap } from "../util/types.js";
import { DeviceEntity, type EntityDispatcher } from "./device-entity.js";

export type DeviceRegistryOptions = {
  dispatcher: EntityDispatcher;
  isAllowed: (deviceId: DeviceId) => boolean;
  logger?: Logger;
  onEntityChange?: (entity: DeviceEntity) => void;
};

/**
 * Holds one entity per device seen in a poll and forwards every status map
 * to them. Devices outside the allowlist never get an entity.
 */
export class DeviceRegistry {
  private readonly entities = new Map<DeviceId, DeviceEntity>();
  private readonly dispatcher: EntityDispatcher;
  private readonly isAllowed: (deviceId: DeviceId) => boolean;
  private readonly logger?: Logger;
  private readonly onEntityChange?: (entity: DeviceEntity) => void;

  constructor(opts: DeviceRegistryOptions) {
    this.dispatcher = opts.dispatcher;
    this.isAllowed = opts.isAllowed;
    this.logger = opts.logger;
    this.onEntityChange = opts.onEntityChange;
  }

  attach(coordinator: Pick<StatusCoordinator, "subscribe">): () => void {
    return coordinator.subscribe((statuses) => this.handleStatusUpdate(statuses));
  }

  handleStatusUpdate(statuses: DeviceStatusMap): void {
    for (const deviceId of statuses.keys()) {
      if (!this.isAllowed(deviceId) || this.entities.has(deviceId)) continue;
      this.entities.set(
        deviceId,
        new DeviceEntity({
          deviceId,
          dispatcher: this.dispatcher,
          logger: this.logger,
          onStateChange: this.onEntityChange,
        }),
      );
    }
    for (const entity of this.entities.values()) entity.handleStatusUpdate(statuses);
  }

  get(deviceId: DeviceId): DeviceEntity | undefined {
    return this.entities.get(deviceId);
  }

  list(): DeviceEntity[] {
    return [...this.entities.values()].sort((a, b) => a.deviceId.localeCompare(b.deviceId));
  }
}
