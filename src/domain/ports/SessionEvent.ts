import type { Participant } from "../entities/Participant.js";
import type { Session } from "../entities/SessionRules.js";
import type { ParticipantId, SessionId, TimePoint } from "../typedefs.js";

interface EventBase {
  readonly sessionId: SessionId;
  readonly at: TimePoint;
}

/**
 * Change notifications broadcast after an accepted mutation. Payloads are the
 * minimum an observer needs to decide whether to re-fetch the session.
 */
export type SessionEvent =
  | (EventBase & { readonly type: "participant_joined"; readonly participant: Participant })
  | (EventBase & { readonly type: "participant_left"; readonly participantId: ParticipantId })
  | (EventBase & {
      readonly type: "participant_connected" | "participant_disconnected";
      readonly participantId: ParticipantId;
    })
  | (EventBase & { readonly type: "vote_cast"; readonly participantId: ParticipantId })
  | (EventBase & { readonly type: "votes_revealed"; readonly session: Session })
  | (EventBase & { readonly type: "round_reset"; readonly session: Session })
  | (EventBase & { readonly type: "role_toggled"; readonly participantId: ParticipantId })
  | (EventBase & { readonly type: "story_changed"; readonly storyName: string | null });

export type SessionEventType = SessionEvent["type"];

export function sessionChannel(sessionId: SessionId): string {
  return `session:${sessionId}`;
}
