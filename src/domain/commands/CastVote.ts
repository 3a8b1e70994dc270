import { Command, type CommandOutcome } from "./Command.js";
import { assertParticipantId } from "./validation.js";
import { castVote, type Session } from "../entities/SessionRules.js";
import { ok } from "../errors/SessionFailure.js";
import type { Card, ParticipantId, TimePoint } from "../typedefs.js";

export class CastVote extends Command<Session> {
  readonly type = "CastVote" as const;
  readonly mutates = true;

  constructor(
    public readonly participantId: ParticipantId,
    public readonly card: Card,
    public readonly at: TimePoint,
  ) {
    super();
    assertParticipantId(participantId);
  }

  apply(state: Session): CommandOutcome<Session> {
    const result = castVote(state, this.participantId, this.card);
    if (!result.ok) {
      return { state, reply: result };
    }

    const next = result.value;
    if (next === state) {
      return { state, reply: ok(state) };
    }

    return {
      state: next,
      reply: ok(next),
      event: {
        type: "vote_cast",
        sessionId: next.id,
        at: this.at,
        participantId: this.participantId,
      },
    };
  }
}
