import type { TimePoint } from "../typedefs.js";

export interface ScheduledTask {
  cancel(): void;
}

/**
 * Infrastructure abstraction for time. Implementations may rely on real timers
 * or on a virtual clock; sessions only ever read `now()` through it and
 * register their periodic idle sweep with it.
 */
export interface Scheduler {
  now(): TimePoint;
  scheduleRepeating(intervalMs: number, task: () => Promise<void> | void): ScheduledTask;
}
