import { Command, type CommandOutcome } from "./Command.js";
import { assertParticipantId } from "./validation.js";
import { removeParticipant, type Session } from "../entities/SessionRules.js";
import { ok } from "../errors/SessionFailure.js";
import type { ParticipantId, TimePoint } from "../typedefs.js";

export class LeaveSession extends Command<Session> {
  readonly type = "LeaveSession" as const;
  readonly mutates = true;

  constructor(
    public readonly participantId: ParticipantId,
    public readonly at: TimePoint,
  ) {
    super();
    assertParticipantId(participantId);
  }

  apply(state: Session): CommandOutcome<Session> {
    const next = removeParticipant(state, this.participantId);
    if (next === state) {
      return { state, reply: ok(state) };
    }

    return {
      state: next,
      reply: ok(next),
      event: {
        type: "participant_left",
        sessionId: next.id,
        at: this.at,
        participantId: this.participantId,
      },
    };
  }
}
