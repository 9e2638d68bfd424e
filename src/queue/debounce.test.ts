import { describe, expect, it } from "vitest";

import { DebounceIndex } from "./debounce.js";
import { RequestEnvelope } from "./envelope.js";

describe("DebounceIndex", () => {
  it("accepts the first command for a device", () => {
    const index = new DebounceIndex();
    const command = RequestEnvelope.command("a", 10, 0);

    expect(index.offer(command)).toEqual({ accepted: true, superseded: null });
    expect(index.pendingCommandFor("a")).toBe(command);
  });

  it("supersedes a pending command for the same device", () => {
    const index = new DebounceIndex();
    const first = RequestEnvelope.command("a", 10, 0);
    const second = RequestEnvelope.command("a", 20, 1);
    index.offer(first);

    expect(index.offer(second)).toEqual({ accepted: true, superseded: first });
    expect(index.pendingCommandFor("a")).toBe(second);
  });

  it("leaves other devices alone", () => {
    const index = new DebounceIndex();
    index.offer(RequestEnvelope.command("a", 10, 0));

    expect(index.offer(RequestEnvelope.command("b", 10, 0))).toEqual({ accepted: true, superseded: null });
  });

  it("queues a follow-up once the earlier command is in flight", () => {
    const index = new DebounceIndex();
    const first = RequestEnvelope.command("a", 10, 0);
    index.offer(first);
    first.markInFlight();
    index.release(first);

    const followUp = RequestEnvelope.command("a", 20, 1);
    expect(index.offer(followUp)).toEqual({ accepted: true, superseded: null });
    expect(first.state).toBe("in-flight");
  });

  it("reuses a pending poll", () => {
    const index = new DebounceIndex();
    const poll = RequestEnvelope.poll(0);
    index.offer(poll);

    expect(index.offer(RequestEnvelope.poll(1))).toEqual({ accepted: false, existing: poll });
  });

  it("accepts a new poll while the previous one is in flight", () => {
    const index = new DebounceIndex();
    const poll = RequestEnvelope.poll(0);
    index.offer(poll);
    poll.markInFlight();
    index.release(poll);

    const next = RequestEnvelope.poll(1);
    expect(index.offer(next)).toEqual({ accepted: true, superseded: null });
    expect(index.pendingPoll()).toBe(next);
  });

  it("only releases the envelope it was given", () => {
    const index = new DebounceIndex();
    const first = RequestEnvelope.command("a", 10, 0);
    const second = RequestEnvelope.command("a", 20, 1);
    index.offer(first);
    index.offer(second);
    index.release(first);

    expect(index.pendingCommandFor("a")).toBe(second);
  });
});
