import type { Logger } from "pino";
import type { Dispatcher } from "../queue/dispatcher.js";
import { reconcile } from "../reconcile.js";
import { isDispatchError } from "../util/errors.js";
import { silentLogger } from "../util/logger.js";
import type { DeviceId, DeviceLevel, DeviceStatusMap, DeviceView, SetDeviceResult } from "../util/types.js";

export type CommandOutcome =
  | { status: "applied"; result: SetDeviceResult }
  | { status: "superseded" }
  | { status: "failed"; code: string; message: string };

export type EntityDispatcher = Pick<Dispatcher, "accepting" | "enqueueCommand" | "hasOutstandingCommand">;

export type DeviceEntityOptions = {
  deviceId: DeviceId;
  dispatcher: EntityDispatcher;
  logger?: Logger;
  onStateChange?: (entity: DeviceEntity) => void;
};

const MAX_BRIGHTNESS = 255;

export function clampLevel(level: number): DeviceLevel {
  return Math.min(100, Math.max(0, Math.round(level)));
}

/** Map a 0–255 brightness to a 0–100 device level. */
export function brightnessToLevel(brightness: number): DeviceLevel {
  return clampLevel((brightness / MAX_BRIGHTNESS) * 100);
}

export function levelToBrightness(level: DeviceLevel): number {
  return Math.round((level / 100) * MAX_BRIGHTNESS);
}

/**
 * One controllable device. Commands update `displayedValue` straight away;
 * polls only overwrite it once no command for the device is outstanding.
 */
export class DeviceEntity {
  readonly deviceId: DeviceId;
  private readonly dispatcher: EntityDispatcher;
  private readonly log: Logger;
  private readonly onStateChange?: (entity: DeviceEntity) => void;

  displayedValue: DeviceLevel | null = null;
  lastPolledValue: DeviceLevel | null = null;

  constructor(opts: DeviceEntityOptions) {
    this.deviceId = opts.deviceId;
    this.dispatcher = opts.dispatcher;
    this.onStateChange = opts.onStateChange;
    this.log = (opts.logger ?? silentLogger).child({ component: "entity", deviceId: opts.deviceId });
  }

  get isOn(): boolean {
    return (this.displayedValue ?? 0) > 0;
  }

  get level(): DeviceLevel | null {
    return this.displayedValue;
  }

  get brightness(): number | null {
    return this.displayedValue === null ? null : levelToBrightness(this.displayedValue);
  }

  get commandOutstanding(): boolean {
    return this.dispatcher.hasOutstandingCommand(this.deviceId);
  }

  /**
   * Show `level` immediately and queue the command. The returned promise
   * settles with the outcome and never rejects, so callers may ignore it.
   * A stopped dispatcher refuses the command and the display is left alone.
   */
  setLevel(level: number): Promise<CommandOutcome> {
    const value = clampLevel(level);
    const queued = this.dispatcher.accepting;
    const sent = this.dispatcher.enqueueCommand(this.deviceId, value);
    if (queued) {
      this.displayedValue = value;
      this.notify();
    }
    return sent.then(
      (result): CommandOutcome => ({ status: "applied", result }),
      (err: unknown) => this.commandFailed(err),
    );
  }

  /** Turn on at a 0–255 brightness, full by default. */
  turnOn(brightness: number = MAX_BRIGHTNESS): Promise<CommandOutcome> {
    return this.setLevel(brightnessToLevel(brightness));
  }

  turnOff(): Promise<CommandOutcome> {
    return this.setLevel(0);
  }

  handleStatusUpdate(statuses: DeviceStatusMap): void {
    const polled = statuses.get(this.deviceId);
    if (polled === undefined) return;

    const outstanding = this.dispatcher.hasOutstandingCommand(this.deviceId);
    const before = this.displayedValue;
    this.lastPolledValue = polled;
    this.displayedValue = reconcile(this.displayedValue, polled, outstanding);
    if (outstanding && polled !== before) {
      this.log.debug({ polled, displayed: this.displayedValue }, "poll ignored while command outstanding");
    }
    this.notify();
  }

  view(): DeviceView {
    return {
      deviceId: this.deviceId,
      displayedValue: this.displayedValue,
      lastPolledValue: this.lastPolledValue,
      isOn: this.isOn,
      commandOutstanding: this.commandOutstanding,
    };
  }

  private commandFailed(err: unknown): CommandOutcome {
    if (isDispatchError(err)) {
      if (err.code === "SUPERSEDED") {
        this.log.debug("command superseded");
        return { status: "superseded" };
      }
      this.log.warn({ err }, "command failed");
      return { status: "failed", code: err.code, message: err.message };
    }
    this.log.error({ err }, "command failed unexpectedly");
    return { status: "failed", code: "UNKNOWN", message: err instanceof Error ? err.message : String(err) };
  }

  private notify(): void {
    this.onStateChange?.(this);
  }
}
