/* eslint-disable functional/immutable-data */
import type { ScheduledTask, Scheduler } from "../../domain/ports/Scheduler.js";
import type { TimePoint } from "../../domain/typedefs.js";

/**
 * Deterministic scheduler used in tests.
 *
 * Instead of relying on {@link setInterval}, the scheduler keeps a virtual clock and a list of
 * repeating tasks, and exposes a {@link runFor} helper that advances the clock (in milliseconds),
 * firing every task whose turn comes up on the way in time order.
 */
interface RepeatingTask {
  readonly seq: number;
  readonly intervalMs: number;
  readonly task: () => Promise<void> | void;
  nextAt: TimePoint;
  cancelled: boolean;
}

export class InMemoryScheduler implements Scheduler {
  #now: TimePoint;
  #tasks: RepeatingTask[] = [];
  #nextSeq = 1;

  constructor(startAt: TimePoint = 0) {
    this.#now = startAt;
  }

  now(): TimePoint {
    return this.#now;
  }

  scheduleRepeating(intervalMs: number, task: () => Promise<void> | void): ScheduledTask {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error("Repeat interval must be positive");
    }

    const entry: RepeatingTask = {
      seq: this.#nextSeq++,
      intervalMs,
      task,
      nextAt: this.#now + intervalMs,
      cancelled: false,
    };
    this.#tasks = [...this.#tasks, entry];

    return {
      cancel: () => {
        entry.cancelled = true;
        this.#tasks = this.#tasks.filter((candidate) => candidate !== entry);
      },
    };
  }

  get pendingTasks(): number {
    return this.#tasks.length;
  }

  async runFor(milliseconds: number): Promise<void> {
    if (milliseconds < 0) {
      throw new Error("Cannot run scheduler backwards in time");
    }

    const targetTime = this.#now + milliseconds;

    for (;;) {
      const next = this.#earliestDue(targetTime);
      if (!next) {
        break;
      }

      this.#now = next.nextAt;
      next.nextAt += next.intervalMs;
      await next.task();
    }

    this.#now = targetTime;
  }

  #earliestDue(targetTime: TimePoint): RepeatingTask | undefined {
    let earliest: RepeatingTask | undefined;
    for (const entry of this.#tasks) {
      if (entry.cancelled || entry.nextAt > targetTime) continue;
      if (
        !earliest ||
        entry.nextAt < earliest.nextAt ||
        (entry.nextAt === earliest.nextAt && entry.seq < earliest.seq)
      ) {
        earliest = entry;
      }
    }
    return earliest;
  }
}
