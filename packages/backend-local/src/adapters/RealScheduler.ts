/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { Logger, ScheduledTask, Scheduler, TimePoint } from "../core.js";

interface RealSchedulerOptions {
  readonly logger?: Logger;
  readonly clock?: () => TimePoint;
}

/** Wall-clock scheduler backed by `setInterval`. */
export class RealScheduler implements Scheduler {
  #timers: Set<ReturnType<typeof setInterval>> = new Set();
  readonly #logger: Logger | undefined;
  readonly #clock: () => TimePoint;

  constructor(options: RealSchedulerOptions = {}) {
    this.#logger = options.logger;
    this.#clock = options.clock ?? Date.now;
  }

  now(): TimePoint {
    return this.#clock();
  }

  scheduleRepeating(intervalMs: number, task: () => Promise<void> | void): ScheduledTask {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error("Repeat interval must be positive");
    }

    const timer = setInterval(async () => {
      try {
        await task();
      } catch (error) {
        this.#logger?.error("Scheduled task failed", { intervalMs, error });
      }
    }, intervalMs);
    timer.unref();

    this.#timers.add(timer);
    this.#logger?.debug("Repeating task scheduled", { intervalMs });

    return {
      cancel: () => {
        clearInterval(timer);
        this.#timers.delete(timer);
      },
    };
  }

  get activeTimers(): number {
    return this.#timers.size;
  }

  cancelAll(): void {
    for (const timer of this.#timers) {
      clearInterval(timer);
    }
    this.#timers.clear();
  }
}
