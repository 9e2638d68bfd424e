import type { Logger } from "pino";
import type { Dispatcher } from "./queue/dispatcher.js";
import { silentLogger } from "./util/logger.js";
import type { DeviceStatusMap } from "./util/types.js";

export type StatusListener = (statuses: DeviceStatusMap) => void;

export type StatusCoordinatorOptions = {
  dispatcher: Pick<Dispatcher, "enqueuePoll">;
  pollIntervalMs: number;
  logger?: Logger;
};

/**
 * Drives the periodic "refresh everything" poll through the dispatcher and
 * fans each status map out to subscribers. A failed poll leaves the last good
 * data in place; the next one still runs on schedule.
 */
export class StatusCoordinator {
  readonly pollIntervalMs: number;
  private readonly dispatcher: Pick<Dispatcher, "enqueuePoll">;
  private readonly log: Logger;
  private readonly listeners = new Set<StatusListener>();
  private timer: NodeJS.Timeout | null = null;

  data: DeviceStatusMap | null = null;
  lastUpdateSuccess = false;
  lastError: Error | null = null;
  lastUpdatedAt: number | null = null;

  constructor(opts: StatusCoordinatorOptions) {
    this.dispatcher = opts.dispatcher;
    this.pollIntervalMs = opts.pollIntervalMs;
    this.log = (opts.logger ?? silentLogger).child({ component: "coordinator" });
  }

  subscribe(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Poll once and report whether it succeeded. Never throws. */
  async refresh(): Promise<boolean> {
    let statuses: DeviceStatusMap;
    try {
      statuses = await this.dispatcher.enqueuePoll();
    } catch (err) {
      this.lastUpdateSuccess = false;
      this.lastError = err instanceof Error ? err : new Error(String(err));
      this.log.warn({ err }, "status poll failed; keeping previous data");
      return false;
    }

    this.data = statuses;
    this.lastUpdateSuccess = true;
    this.lastError = null;
    this.lastUpdatedAt = Date.now();
    for (const listener of this.listeners) {
      try {
        listener(statuses);
      } catch (err) {
        this.log.error({ err }, "status listener threw");
      }
    }
    return true;
  }

  /** Initial refresh; throws when it fails since nothing is known yet. */
  async firstRefresh(): Promise<DeviceStatusMap> {
    const ok = await this.refresh();
    if (!ok || this.data === null) {
      throw new Error(`Initial device status poll failed: ${this.lastError?.message ?? "no data"}`, {
        cause: this.lastError ?? undefined,
      });
    }
    return this.data;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.refresh();
    }, this.pollIntervalMs);
    this.log.info({ pollIntervalMs: this.pollIntervalMs }, "polling started");
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.log.info("polling stopped");
  }
}
