import { Command, type CommandOutcome } from "./Command.js";
import { revealVotes, type Session } from "../entities/SessionRules.js";
import { ok } from "../errors/SessionFailure.js";
import type { TimePoint } from "../typedefs.js";

/** Voting → revealed. Revealing twice is a silent no-op. */
export class RevealVotes extends Command<Session> {
  readonly type = "RevealVotes" as const;
  readonly mutates = true;

  constructor(public readonly at: TimePoint) {
    super();
  }

  apply(state: Session): CommandOutcome<Session> {
    const next = revealVotes(state);
    if (next === state) {
      return { state, reply: ok(state) };
    }

    return {
      state: next,
      reply: ok(next),
      event: { type: "votes_revealed", sessionId: next.id, at: this.at, session: next },
    };
  }
}
