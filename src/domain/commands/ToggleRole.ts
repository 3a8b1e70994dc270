import { Command, type CommandOutcome } from "./Command.js";
import { assertParticipantId } from "./validation.js";
import { toggleRole, type Session } from "../entities/SessionRules.js";
import { ok } from "../errors/SessionFailure.js";
import type { ParticipantId, TimePoint } from "../typedefs.js";

export class ToggleRole extends Command<Session> {
  readonly type = "ToggleRole" as const;
  readonly mutates = true;

  constructor(
    public readonly participantId: ParticipantId,
    public readonly at: TimePoint,
  ) {
    super();
    assertParticipantId(participantId);
  }

  apply(state: Session): CommandOutcome<Session> {
    const next = toggleRole(state, this.participantId);
    if (next === state) {
      return { state, reply: ok(state) };
    }

    return {
      state: next,
      reply: ok(next),
      event: {
        type: "role_toggled",
        sessionId: next.id,
        at: this.at,
        participantId: this.participantId,
      },
    };
  }
}
