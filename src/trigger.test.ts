import { describe, expect, it } from "vitest";
import { settle } from "./test-helpers";
import { Trigger } from "./trigger";

/**
 * Drains the initial fetch+redraw so tests start from a quiet trigger.
 */
async function quietTrigger(targetCount: number): Promise<Trigger> {
  const trigger = new Trigger(targetCount);
  await trigger.waitAndDrain();
  return trigger;
}

function track<T>(promise: Promise<T>): { settled: () => boolean; value: () => T | undefined } {
  let done = false;
  let result: T | undefined;
  void promise.then((value) => {
    done = true;
    result = value;
  });
  return { settled: () => done, value: () => result };
}

describe("Trigger", () => {
  it("starts with a fetch and a redraw pending", async () => {
    const trigger = new Trigger(2);
    await expect(trigger.waitAndDrain()).resolves.toEqual({ fetch: true, redraw: true });
    expect(trigger.formatIndex).toBe(0);
  });

  it("rejects target counts below one", () => {
    expect(() => new Trigger(0)).toThrow(RangeError);
    expect(() => new Trigger(1.5)).toThrow(RangeError);
  });

  it("parks until something is requested", async () => {
    const trigger = await quietTrigger(1);
    const drain = track(trigger.waitAndDrain());

    await settle();
    expect(drain.settled()).toBe(false);

    trigger.wake(false, true);
    await settle();
    expect(drain.value()).toEqual({ fetch: false, redraw: true });
  });

  it("ignores a wake that requests nothing", async () => {
    const trigger = await quietTrigger(1);
    const drain = track(trigger.waitAndDrain());

    trigger.wake(false, false);
    await settle();
    expect(drain.settled()).toBe(false);

    trigger.wake(true, false);
    await settle();
    expect(drain.value()).toEqual({ fetch: true, redraw: true });
  });

  it("drains fetch iff a fetch was asked for, redraw iff either was", async () => {
    const wakes: Array<[boolean, boolean]> = [
      [false, false],
      [false, true],
      [true, false],
      [true, true],
    ];
    const sequences: Array<Array<[boolean, boolean]>> = [[]];
    for (let length = 0; length < 3; length++) {
      for (const sequence of sequences.filter((s) => s.length === length)) {
        for (const wake of wakes) sequences.push([...sequence, wake]);
      }
    }

    for (const sequence of sequences) {
      const trigger = await quietTrigger(2);
      for (const [fetch, redraw] of sequence) trigger.wake(fetch, redraw);

      const fetch = sequence.some(([f]) => f);
      const redraw = sequence.some(([f, r]) => f || r);
      if (!fetch && !redraw) {
        const drain = track(trigger.waitAndDrain());
        await settle(5);
        expect(drain.settled()).toBe(false);
        trigger.close();
        continue;
      }
      await expect(trigger.waitAndDrain()).resolves.toEqual({ fetch, redraw });
    }
  });

  it("coalesces wakes between two drains", async () => {
    const trigger = await quietTrigger(1);

    trigger.wake(true, false);
    trigger.wake(false, true);
    trigger.wake(true, true);
    await expect(trigger.waitAndDrain()).resolves.toEqual({ fetch: true, redraw: true });

    const next = track(trigger.waitAndDrain());
    await settle();
    expect(next.settled()).toBe(false);
    trigger.close();
  });

  it("applies toggles when drained, modulo the target count", async () => {
    const trigger = await quietTrigger(3);

    trigger.requestToggle();
    trigger.requestToggle();
    expect(trigger.formatIndex).toBe(0);

    await expect(trigger.waitAndDrain()).resolves.toEqual({ fetch: false, redraw: true });
    expect(trigger.formatIndex).toBe(2);

    trigger.requestToggle();
    await trigger.waitAndDrain();
    expect(trigger.formatIndex).toBe(0);
  });

  it("applies toggles on request without clearing the pending redraw", async () => {
    const trigger = await quietTrigger(3);

    trigger.requestToggle();
    trigger.applyToggles();
    expect(trigger.formatIndex).toBe(1);

    await expect(trigger.waitAndDrain()).resolves.toEqual({ fetch: false, redraw: true });
    expect(trigger.formatIndex).toBe(1);
  });

  it("returns to the same index after N toggles", async () => {
    const trigger = await quietTrigger(4);
    trigger.requestToggle();
    await trigger.waitAndDrain();
    const start = trigger.formatIndex;

    for (let i = 0; i < 4; i++) {
      trigger.requestToggle();
      await trigger.waitAndDrain();
      expect(trigger.formatIndex).toBeGreaterThanOrEqual(0);
      expect(trigger.formatIndex).toBeLessThan(4);
    }

    expect(trigger.formatIndex).toBe(start);
  });

  it("keeps the index at zero with a single target", async () => {
    const trigger = await quietTrigger(1);
    for (let i = 0; i < 5; i++) trigger.requestToggle();
    await trigger.waitAndDrain();
    expect(trigger.formatIndex).toBe(0);
  });

  it("releases a parked worker on close", async () => {
    const trigger = await quietTrigger(2);
    const drain = track(trigger.waitAndDrain());

    trigger.close();
    await settle();
    expect(drain.settled()).toBe(true);
    expect(drain.value()).toBeUndefined();
    await expect(trigger.waitAndDrain()).resolves.toBeUndefined();
  });
});
