import { describe, expect, it } from "vitest";

import { InMemoryScheduler } from "../src/adapters/in-memory/InMemoryScheduler.js";

describe("InMemoryScheduler", () => {
  it("fires repeating tasks on every interval boundary", async () => {
    const scheduler = new InMemoryScheduler();
    const fired: number[] = [];

    scheduler.scheduleRepeating(1_000, () => {
      fired.push(scheduler.now());
    });

    await scheduler.runFor(999);
    expect(fired).toEqual([]);

    await scheduler.runFor(2_001);
    expect(fired).toEqual([1_000, 2_000, 3_000]);
    expect(scheduler.now()).toBe(3_000);
  });

  it("interleaves tasks in time order", async () => {
    const scheduler = new InMemoryScheduler(100);
    const fired: string[] = [];

    scheduler.scheduleRepeating(300, () => {
      fired.push(`slow@${scheduler.now()}`);
    });
    scheduler.scheduleRepeating(200, () => {
      fired.push(`fast@${scheduler.now()}`);
    });

    await scheduler.runFor(600);
    expect(fired).toEqual(["fast@300", "slow@400", "fast@500", "slow@700", "fast@700"]);
  });

  it("stops firing a cancelled task, even from inside itself", async () => {
    const scheduler = new InMemoryScheduler();
    let runs = 0;

    const task = scheduler.scheduleRepeating(10, () => {
      runs += 1;
      if (runs === 2) {
        task.cancel();
      }
    });

    await scheduler.runFor(100);
    expect(runs).toBe(2);
    expect(scheduler.pendingTasks).toBe(0);
  });

  it("awaits asynchronous tasks before advancing", async () => {
    const scheduler = new InMemoryScheduler();
    const order: string[] = [];

    scheduler.scheduleRepeating(50, async () => {
      order.push(`start@${scheduler.now()}`);
      await Promise.resolve();
      order.push(`end@${scheduler.now()}`);
    });

    await scheduler.runFor(100);
    expect(order).toEqual(["start@50", "end@50", "start@100", "end@100"]);
  });

  it("refuses to run backwards or with a non-positive interval", async () => {
    const scheduler = new InMemoryScheduler();

    await expect(scheduler.runFor(-1)).rejects.toThrow("Cannot run scheduler backwards in time");
    expect(() => scheduler.scheduleRepeating(0, () => undefined)).toThrow(
      "Repeat interval must be positive",
    );
  });
});
