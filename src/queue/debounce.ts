import type { DeviceId } from "../util/types.js";
import { isCommand, type AnyEnvelope, type CommandEnvelope, type PollEnvelope } from "./envelope.js";

export type OfferResult =
  | { accepted: true; superseded: CommandEnvelope | null }
  /** A poll is already pending; the caller should share its outcome. */
  | { accepted: false; existing: PollEnvelope };

/**
 * Tracks the one pending (not yet dispatched) request per target: one slot
 * per device for commands and a single global slot for the poll.
 *
 * Only pending envelopes live here. Once the dispatcher takes a request it
 * calls `release`, so a newer request for the same target is queued as an
 * independent follow-up and the in-flight one is left alone.
 */
export class DebounceIndex {
  private readonly commands = new Map<DeviceId, CommandEnvelope>();
  private poll: PollEnvelope | null = null;

  offer(envelope: AnyEnvelope): OfferResult {
    if (isCommand(envelope)) {
      const key = commandKey(envelope);
      const previous = this.commands.get(key);
      this.commands.set(key, envelope);
      return {
        accepted: true,
        superseded: previous !== undefined && previous.state === "pending" ? previous : null,
      };
    }

    if (this.poll !== null && this.poll.state === "pending") {
      return { accepted: false, existing: this.poll };
    }
    this.poll = envelope;
    return { accepted: true, superseded: null };
  }

  /** Forget `envelope` if it is still the one registered for its target. */
  release(envelope: AnyEnvelope): void {
    if (isCommand(envelope)) {
      const key = commandKey(envelope);
      if (this.commands.get(key) === envelope) this.commands.delete(key);
    } else if (this.poll === envelope) {
      this.poll = null;
    }
  }

  pendingCommandFor(deviceId: DeviceId): CommandEnvelope | undefined {
    return this.commands.get(deviceId);
  }

  pendingPoll(): PollEnvelope | null {
    return this.poll;
  }

  clear(): void {
    this.commands.clear();
    this.poll = null;
  }
}

function commandKey(envelope: CommandEnvelope): DeviceId {
  if (envelope.targetKey === null) {
    throw new Error("Command request has no target device");
  }
  return envelope.targetKey;
}
