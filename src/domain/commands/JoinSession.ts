import { Command, type CommandOutcome } from "./Command.js";
import { assertParticipantId, isRole } from "./validation.js";
import { isAvatarId } from "../entities/Avatar.js";
import { createParticipant } from "../entities/Participant.js";
import { generatePlayerName, type RandomSource } from "../entities/SessionNames.js";
import {
  addParticipant,
  removeParticipant,
  type Session,
} from "../entities/SessionRules.js";
import { SessionCommandInputError } from "../errors/SessionCommandInputError.js";
import { fail, ok } from "../errors/SessionFailure.js";
import type { AvatarId, ParticipantId, Role, TimePoint } from "../typedefs.js";

/**
 * Adds a participant, claiming the requested avatar in the same step so two
 * concurrent joins can never both take it. Joining again with a known id
 * replaces the earlier entry and releases its avatar first.
 */
export class JoinSession extends Command<Session> {
  readonly type = "JoinSession" as const;
  readonly mutates = true;
  readonly name: string;

  constructor(
    public readonly participantId: ParticipantId,
    name: string,
    public readonly role: Role,
    public readonly avatarId: number | null,
    public readonly at: TimePoint,
    rng: RandomSource = Math.random,
  ) {
    super();

    assertParticipantId(participantId);
    if (!isRole(role)) {
      throw SessionCommandInputError.because(['Role must be "voter" or "spectator"']);
    }

    const trimmed = name.trim();
    this.name = trimmed === "" ? generatePlayerName(rng) : trimmed;
  }

  apply(state: Session): CommandOutcome<Session> {
    const withoutPrevious = removeParticipant(state, this.participantId);
    let avatarId: AvatarId | null = null;

    if (this.avatarId !== null) {
      if (!isAvatarId(this.avatarId)) {
        return { state, reply: fail("invalid_avatar", `Unknown avatar: ${this.avatarId}`) };
      }
      if (withoutPrevious.usedAvatars.includes(this.avatarId)) {
        return {
          state,
          reply: fail("avatar_unavailable", `Avatar ${this.avatarId} is already taken`),
        };
      }
      avatarId = this.avatarId;
    }

    const participant = createParticipant(this.participantId, this.name, this.role, {
      avatarId,
      joinedAt: this.at,
    });
    const next = addParticipant(withoutPrevious, participant);

    return {
      state: next,
      reply: ok(next),
      event: {
        type: "participant_joined",
        sessionId: next.id,
        at: this.at,
        participant,
      },
    };
  }
}
