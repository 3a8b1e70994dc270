import { Command, type CommandOutcome } from "./Command.js";
import { resetRound, type Session } from "../entities/SessionRules.js";
import { ok } from "../errors/SessionFailure.js";
import type { TimePoint } from "../typedefs.js";

export class ResetRound extends Command<Session> {
  readonly type = "ResetRound" as const;
  readonly mutates = true;

  constructor(public readonly at: TimePoint) {
    super();
  }

  apply(state: Session): CommandOutcome<Session> {
    const next = resetRound(state);
    return {
      state: next,
      reply: ok(next),
      event: { type: "round_reset", sessionId: next.id, at: this.at, session: next },
    };
  }
}
