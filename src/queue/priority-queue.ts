import { REQUEST_PRIORITY_ORDER, RequestPriority, type AnyEnvelope } from "./envelope.js";

type LaneEntry = {
  envelope: AnyEnvelope;
  // Ordering key; stays with the slot when its envelope is replaced.
  readonly submittedAt: number;
  readonly sequence: number;
};

/**
 * Two FIFO lanes ordered by submission time, served in strict priority:
 * the poll lane is only offered once the command lane is empty.
 *
 * The queue knows nothing about rate limits; the dispatcher decides when the
 * head may actually be sent.
 */
export class PriorityQueue {
  private readonly lanes = new Map<RequestPriority, LaneEntry[]>([
    [RequestPriority.COMMAND, []],
    [RequestPriority.POLL, []],
  ]);

  private nextSequence = 0;
  private totalSize = 0;

  enqueue(envelope: AnyEnvelope): void {
    const lane = this.lane(envelope.priority);
    const entry: LaneEntry = {
      envelope,
      submittedAt: envelope.submittedAt,
      sequence: this.nextSequence++,
    };

    // Insert by submittedAt, sequence breaking ties, so a clock that steps
    // backwards cannot reorder the lane.
    let low = 0;
    let high = lane.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const other = lane[mid];
      if (
        other.submittedAt < entry.submittedAt ||
        (other.submittedAt === entry.submittedAt && other.sequence < entry.sequence)
      ) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    lane.splice(low, 0, entry);
    this.totalSize += 1;
  }

  /**
   * Swap `next` into the slot held by `previous`. Returns false when
   * `previous` is no longer queued.
   */
  replace(previous: AnyEnvelope, next: AnyEnvelope): boolean {
    if (previous.priority !== next.priority) {
      throw new Error("Cannot replace a request with one of a different priority");
    }
    const entry = this.lane(previous.priority).find((e) => e.envelope === previous);
    if (!entry) return false;
    entry.envelope = next;
    return true;
  }

  /** Head of the highest non-empty lane, left in place. */
  nextReady(): AnyEnvelope | undefined {
    for (const priority of REQUEST_PRIORITY_ORDER) {
      const lane = this.lane(priority);
      if (lane.length > 0) return lane[0].envelope;
    }
    return undefined;
  }

  pop(): AnyEnvelope | undefined {
    for (const priority of REQUEST_PRIORITY_ORDER) {
      const lane = this.lane(priority);
      const entry = lane.shift();
      if (entry) {
        this.totalSize -= 1;
        return entry.envelope;
      }
    }
    return undefined;
  }

  drain(): AnyEnvelope[] {
    const drained: AnyEnvelope[] = [];
    for (const priority of REQUEST_PRIORITY_ORDER) {
      const lane = this.lane(priority);
      for (const entry of lane) drained.push(entry.envelope);
      lane.length = 0;
    }
    this.totalSize = 0;
    return drained;
  }

  sizeOf(priority: RequestPriority): number {
    return this.lane(priority).length;
  }

  get size(): number {
    return this.totalSize;
  }

  private lane(priority: RequestPriority): LaneEntry[] {
    const lane = this.lanes.get(priority);
    if (!lane) {
      throw new Error(`Invalid request priority: ${priority}`);
    }
    return lane;
  }
}
