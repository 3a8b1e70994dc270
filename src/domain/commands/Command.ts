import type { Session } from "../entities/SessionRules.js";
import type { Result } from "../errors/SessionFailure.js";
import type { SessionEvent } from "../ports/SessionEvent.js";
import type { TimePoint } from "../typedefs.js";

export interface CommandOutcome<TReply> {
  /** Snapshot after the command; the input snapshot when nothing changed */
  readonly state: Session;
  readonly reply: Result<TReply>;
  /** Broadcast once `state` is committed; absent for reads, failures and no-ops */
  readonly event?: SessionEvent;
}

/**
 * An intent addressed to one session. Commands are applied one at a time by
 * the session's actor; `apply` must be pure and synchronous.
 */
export abstract class Command<TReply = Session> {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  /** Whether an accepted command counts as activity for the idle sweep */
  abstract readonly mutates: boolean;
  abstract apply(state: Session): CommandOutcome<TReply>;
}
