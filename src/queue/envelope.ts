import type { DeviceId, DeviceLevel, DeviceStatusMap, SetDeviceResult } from "../util/types.js";

export enum RequestKind {
  Command = "command",
  Poll = "poll",
}

/**
 * Lower value runs first. Commands always preempt the routine poll.
 */
export enum RequestPriority {
  COMMAND = 0,
  POLL = 1,
}

export const REQUEST_PRIORITY_ORDER: readonly RequestPriority[] = Object.freeze([
  RequestPriority.COMMAND,
  RequestPriority.POLL,
]);

export type EnvelopeState = "pending" | "in-flight" | "resolved";

class Deferred<T> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => undefined;
  reject: (reason: unknown) => void = () => undefined;

  constructor() {
    // the executor runs synchronously, replacing both placeholders
    this.promise = new Promise<T>((res, rej) => {
      this.resolve = res;
      this.reject = rej;
    });
  }
}

/**
 * One request travelling through the queue. The outcome slot is fulfilled
 * exactly once; later attempts are ignored and reported as `false`.
 */
export class RequestEnvelope<TResult> {
  readonly priority: RequestPriority;
  private currentState: EnvelopeState = "pending";
  private readonly outcome = new Deferred<TResult>();

  private constructor(
    readonly kind: RequestKind,
    readonly targetKey: DeviceId | null,
    readonly payload: DeviceLevel | null,
    readonly submittedAt: number,
  ) {
    this.priority = kind === RequestKind.Command ? RequestPriority.COMMAND : RequestPriority.POLL;
  }

  static command(deviceId: DeviceId, value: DeviceLevel, now: number): CommandEnvelope {
    return new RequestEnvelope<SetDeviceResult>(RequestKind.Command, deviceId, value, now);
  }

  static poll(now: number): PollEnvelope {
    return new RequestEnvelope<DeviceStatusMap>(RequestKind.Poll, null, null, now);
  }

  get state(): EnvelopeState {
    return this.currentState;
  }

  get result(): Promise<TResult> {
    return this.outcome.promise;
  }

  markInFlight(): void {
    if (this.currentState !== "pending") {
      throw new Error(`Cannot dispatch a request that is ${this.currentState}`);
    }
    this.currentState = "in-flight";
  }

  fulfil(value: TResult): boolean {
    if (this.currentState === "resolved") return false;
    this.currentState = "resolved";
    this.outcome.resolve(value);
    return true;
  }

  fail(error: unknown): boolean {
    if (this.currentState === "resolved") return false;
    this.currentState = "resolved";
    this.outcome.reject(error);
    return true;
  }
}

export type CommandEnvelope = RequestEnvelope<SetDeviceResult>;
export type PollEnvelope = RequestEnvelope<DeviceStatusMap>;
export type AnyEnvelope = CommandEnvelope | PollEnvelope;

export function isCommand(envelope: AnyEnvelope): envelope is CommandEnvelope {
  return envelope.kind === RequestKind.Command;
}
