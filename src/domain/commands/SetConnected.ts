import { Command, type CommandOutcome } from "./Command.js";
import { assertParticipantId } from "./validation.js";
import { setConnected, type Session } from "../entities/SessionRules.js";
import { ok } from "../errors/SessionFailure.js";
import type { ParticipantId, TimePoint } from "../typedefs.js";

/** Tracks live-socket presence. Only an actual flip is broadcast. */
export class SetConnected extends Command<Session> {
  readonly type = "SetConnected" as const;
  readonly mutates = true;

  constructor(
    public readonly participantId: ParticipantId,
    public readonly connected: boolean,
    public readonly at: TimePoint,
  ) {
    super();
    assertParticipantId(participantId);
  }

  apply(state: Session): CommandOutcome<Session> {
    const next = setConnected(state, this.participantId, this.connected);
    if (next === state) {
      return { state, reply: ok(state) };
    }

    return {
      state: next,
      reply: ok(next),
      event: {
        type: this.connected ? "participant_connected" : "participant_disconnected",
        sessionId: next.id,
        at: this.at,
        participantId: this.participantId,
      },
    };
  }
}
