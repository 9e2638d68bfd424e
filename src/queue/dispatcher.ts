import type { Logger } from "pino";
import { DispatcherStoppedError, SupersededError, toRemoteError } from "../util/errors.js";
import { RateGate, type RateGateSnapshot } from "../util/limiter.js";
import { silentLogger } from "../util/logger.js";
import type {
  DeviceId,
  DeviceLevel,
  DeviceStatusMap,
  RemoteClient,
  SetDeviceResult,
} from "../util/types.js";
import { DebounceIndex } from "./debounce.js";
import {
  RequestEnvelope,
  RequestPriority,
  isCommand,
  type AnyEnvelope,
  type CommandEnvelope,
  type RequestKind,
} from "./envelope.js";
import { PriorityQueue } from "./priority-queue.js";

export type DispatcherOptions = {
  client: RemoteClient;
  gate?: RateGate;
  logger?: Logger;
};

export type DispatcherStats = {
  dispatched: number;
  failed: number;
  superseded: number;
};

export type DispatcherSnapshot = {
  running: boolean;
  pendingCommands: number;
  pendingPolls: number;
  inFlight: { kind: RequestKind; targetKey: DeviceId | null; submittedAt: number } | null;
  gate: RateGateSnapshot;
  stats: DispatcherStats;
};

/**
 * The single consumer of the request queue. Producers (entities, the poller)
 * only ever append through `enqueueCommand` / `enqueuePoll`, which run to
 * completion on the event loop; the loop in `run` is the only code that pops
 * the queue or writes to the rate gate, so no further locking is needed.
 */
export class Dispatcher {
  private readonly client: RemoteClient;
  private readonly gate: RateGate;
  private readonly log: Logger;
  private readonly queue = new PriorityQueue();
  private readonly debounce = new DebounceIndex();
  private readonly stats: DispatcherStats = { dispatched: 0, failed: 0, superseded: 0 };

  private inFlight: AnyEnvelope | null = null;
  private running = false;
  private acceptingRequests = true;
  // Bumped by start and stop; a loop from an older generation exits.
  private generation = 0;
  private loop: Promise<void> | null = null;
  private wakeUp: (() => void) | null = null;
  private cancelSleep: (() => void) | null = null;

  constructor(opts: DispatcherOptions) {
    this.client = opts.client;
    this.gate = opts.gate ?? new RateGate();
    this.log = (opts.logger ?? silentLogger).child({ component: "dispatcher" });
  }

  /**
   * Queue a set-value command. A still-pending command for the same device is
   * replaced in its queue slot and rejected with `SupersededError`.
   */
  enqueueCommand(deviceId: DeviceId, value: DeviceLevel): Promise<SetDeviceResult> {
    if (!this.acceptingRequests) return Promise.reject(new DispatcherStoppedError());

    const envelope = RequestEnvelope.command(deviceId, value, Date.now());
    const offer = this.debounce.offer(envelope);
    const superseded = offer.accepted ? offer.superseded : null;

    const replaced = superseded !== null && this.queue.replace(superseded, envelope);
    if (!replaced) this.queue.enqueue(envelope);
    if (superseded) {
      this.stats.superseded += 1;
      superseded.fail(new SupersededError(deviceId));
      this.log.debug({ deviceId, value, replaced: superseded.payload }, "debounced pending command");
    }

    this.wake();
    return envelope.result;
  }

  /** Queue a status poll, or join the one already waiting. */
  enqueuePoll(): Promise<DeviceStatusMap> {
    if (!this.acceptingRequests) return Promise.reject(new DispatcherStoppedError());

    const envelope = RequestEnvelope.poll(Date.now());
    const offer = this.debounce.offer(envelope);
    if (!offer.accepted) return offer.existing.result;

    this.queue.enqueue(envelope);
    this.wake();
    return envelope.result;
  }

  /** False once `stop` has been called, until the next `start`. */
  get accepting(): boolean {
    return this.acceptingRequests;
  }

  /** True while a command for `deviceId` is waiting or being sent. */
  hasOutstandingCommand(deviceId: DeviceId): boolean {
    if (this.debounce.pendingCommandFor(deviceId) !== undefined) return true;
    return this.inFlight !== null && isCommand(this.inFlight) && this.inFlight.targetKey === deviceId;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.acceptingRequests = true;
    const generation = ++this.generation;
    // A loop still finishing after stop() is awaited before the new one pops.
    this.loop = this.run(generation, this.loop).catch((err: unknown) => {
      this.running = false;
      this.log.fatal({ err }, "dispatch loop crashed");
    });
    this.log.info(
      {
        windowCapacity: this.gate.windowCapacity,
        windowDurationMs: this.gate.windowDurationMs,
        minSpacingMs: this.gate.minSpacingMs,
      },
      "dispatcher started",
    );
  }

  /**
   * Stop taking requests, reject everything still queued with
   * `DispatcherStoppedError`, and wait for an in-flight call to finish.
   */
  async stop(): Promise<void> {
    this.acceptingRequests = false;
    this.running = false;
    this.generation += 1;
    this.wake();
    this.cancelSleep?.();

    const dropped = this.queue.drain();
    this.debounce.clear();
    for (const envelope of dropped) envelope.fail(new DispatcherStoppedError());

    const loop = this.loop;
    if (loop) await loop;
    if (this.loop === loop) this.loop = null;
    this.log.info({ dropped: dropped.length }, "dispatcher stopped");
  }

  snapshot(): DispatcherSnapshot {
    const inFlight = this.inFlight;
    return {
      running: this.running,
      pendingCommands: this.queue.sizeOf(RequestPriority.COMMAND),
      pendingPolls: this.queue.sizeOf(RequestPriority.POLL),
      inFlight: inFlight
        ? { kind: inFlight.kind, targetKey: inFlight.targetKey, submittedAt: inFlight.submittedAt }
        : null,
      gate: this.gate.snapshot(Date.now()),
      stats: { ...this.stats },
    };
  }

  private async run(generation: number, previous: Promise<void> | null): Promise<void> {
    if (previous) await previous;
    while (this.running && generation === this.generation) {
      if (this.queue.nextReady() === undefined) {
        await this.idle();
        continue;
      }

      const now = Date.now();
      if (!this.gate.tryAcquire(now)) {
        // Leave the head queued: whatever is highest priority after the
        // wait is what gets sent.
        await this.sleep(this.gate.nextAvailableAt(now) - now);
        continue;
      }

      const envelope = this.queue.pop();
      if (!envelope) continue;
      this.gate.recordCall(now);
      this.debounce.release(envelope);
      await this.dispatch(envelope);
    }
  }

  private async dispatch(envelope: AnyEnvelope): Promise<void> {
    envelope.markInFlight();
    this.inFlight = envelope;
    const waitedMs = Date.now() - envelope.submittedAt;
    try {
      if (isCommand(envelope)) {
        const result = await this.sendCommand(envelope);
        envelope.fulfil(result);
        this.log.debug({ deviceId: result.deviceId, value: result.value, waitedMs }, "command sent");
      } else {
        const statuses = await this.client.getDevicesStatus();
        envelope.fulfil(statuses);
        this.log.debug({ devices: statuses.size, waitedMs }, "poll complete");
      }
      this.stats.dispatched += 1;
    } catch (err) {
      // No retry here: the caller decides whether to try again.
      const error = toRemoteError(err, operationName(envelope));
      this.stats.failed += 1;
      this.log.warn({ err: error, kind: envelope.kind, deviceId: envelope.targetKey }, "remote call failed");
      envelope.fail(error);
    } finally {
      this.inFlight = null;
    }
  }

  private sendCommand(envelope: CommandEnvelope): Promise<SetDeviceResult> {
    const { targetKey, payload } = envelope;
    if (targetKey === null || payload === null) {
      throw new Error("Command request is missing its device or value");
    }
    return this.client.setDeviceValue(targetKey, payload);
  }

  private idle(): Promise<void> {
    return new Promise((resolve) => {
      this.wakeUp = resolve;
    });
  }

  private wake(): void {
    const wakeUp = this.wakeUp;
    this.wakeUp = null;
    wakeUp?.();
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const finish = () => {
        clearTimeout(timer);
        this.cancelSleep = null;
        resolve();
      };
      const timer = setTimeout(finish, Math.max(1, ms));
      this.cancelSleep = finish;
    });
  }
}

function operationName(envelope: AnyEnvelope): string {
  return isCommand(envelope) ? `setDeviceValue(${envelope.targetKey})` : "getDevicesStatus";
}
