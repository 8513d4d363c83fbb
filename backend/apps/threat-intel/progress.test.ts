import { describe, expect, it } from "vitest";
import type { ProgressEvent } from "@shared/types/progress";
import { createProgressReporter, ProgressChannel, toProgressPayload } from "./progress";

const nextTick = () => new Promise<void>((resolve) => setImmediate(resolve));

function event(sessionId: string, progressPercent: number): ProgressEvent {
  return {
    sessionId,
    stage: "scraping",
    status: `step ${progressPercent}`,
    progressPercent,
    timestamp: new Date("2024-01-15T10:30:00Z"),
  };
}

describe("ProgressChannel", () => {
  it("delivers events on a later tick, in order", async () => {
    const channel = new ProgressChannel();
    const seen: number[] = [];
    channel.subscribe((e) => seen.push(e.progressPercent));

    channel.publish(event("s", 10));
    channel.publish(event("s", 25));
    expect(seen).toEqual([]);

    await nextTick();
    expect(seen).toEqual([10, 25]);
    expect(channel.pending()).toBe(0);
  });

  it("drops the oldest event when full", async () => {
    const channel = new ProgressChannel(2);
    const seen: number[] = [];
    channel.subscribe((e) => seen.push(e.progressPercent));

    expect(channel.publish(event("s", 1))).toBe(true);
    expect(channel.publish(event("s", 2))).toBe(true);
    expect(channel.publish(event("s", 3))).toBe(false);
    expect(channel.dropped).toBe(1);

    await nextTick();
    expect(seen).toEqual([2, 3]);
  });

  it("isolates a failing listener", async () => {
    const channel = new ProgressChannel();
    const seen: string[] = [];
    channel.subscribe(() => {
      throw new Error("listener broke");
    });
    channel.subscribe((e) => seen.push(e.sessionId));

    channel.publish(event("a", 10));
    await nextTick();
    expect(seen).toEqual(["a"]);
  });

  it("stops delivering after unsubscribe", async () => {
    const channel = new ProgressChannel();
    const seen: number[] = [];
    const unsubscribe = channel.subscribe((e) => seen.push(e.progressPercent));
    unsubscribe();

    channel.publish(event("s", 10));
    await nextTick();
    expect(seen).toEqual([]);
  });

  it("remembers the latest event per session", () => {
    const channel = new ProgressChannel();
    const report = createProgressReporter(channel, "session-1");
    report("analyzing", "Checking stored intelligence", 10);
    report("completed", "Done", 100);

    expect(channel.latestFor("session-1")).toMatchObject({ stage: "completed", progressPercent: 100 });
    expect(channel.latestFor("other")).toBeUndefined();
  });

  it("tolerates a missing channel", () => {
    const report = createProgressReporter(null, "session-1");
    expect(() => report("scraping", "Scraping sources", 25)).not.toThrow();
  });
});

describe("toProgressPayload", () => {
  it("uses snake_case fields and ISO timestamps", () => {
    expect(toProgressPayload(event("s-1", 50))).toEqual({
      session_id: "s-1",
      stage: "scraping",
      status: "step 50",
      progress_percent: 50,
      timestamp: "2024-01-15T10:30:00.000Z",
    });
  });
});
