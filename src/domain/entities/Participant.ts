import type { AvatarId, Card, ParticipantId, Role, TimePoint } from "../typedefs.js";

/** One occupant of a session. Transitions return new values. */
export interface Participant {
  readonly id: ParticipantId;
  readonly name: string;
  readonly role: Role;
  /** Meaningful for voters only; spectators never hold a vote */
  readonly vote: Card | null;
  readonly avatarId: AvatarId | null;
  /** Live-socket presence, not membership */
  readonly connected: boolean;
  readonly joinedAt: TimePoint;
}

export interface ParticipantOptions {
  readonly avatarId?: AvatarId | null;
  readonly joinedAt?: TimePoint;
}

export function createParticipant(
  id: ParticipantId,
  name: string,
  role: Role,
  options: ParticipantOptions = {},
): Participant {
  return {
    id,
    name,
    role,
    vote: null,
    avatarId: options.avatarId ?? null,
    connected: true,
    joinedAt: options.joinedAt ?? Date.now(),
  };
}

/** Spectators keep their (empty) vote: recording for them is a no-op. */
export function recordVote(participant: Participant, card: Card): Participant {
  if (participant.role !== "voter" || participant.vote === card) {
    return participant;
  }
  return { ...participant, vote: card };
}

export function clearVote(participant: Participant): Participant {
  if (participant.vote === null) return participant;
  return { ...participant, vote: null };
}

export function setParticipantConnected(
  participant: Participant,
  connected: boolean,
): Participant {
  if (participant.connected === connected) return participant;
  return { ...participant, connected };
}

export function toggleParticipantRole(participant: Participant): Participant {
  return {
    ...participant,
    role: participant.role === "voter" ? "spectator" : "voter",
    vote: null,
  };
}

export function hasVoted(participant: Participant): boolean {
  return participant.vote !== null;
}

export function isVoter(participant: Participant): boolean {
  return participant.role === "voter";
}

export function isSpectator(participant: Participant): boolean {
  return participant.role === "spectator";
}

export function participantInitial(participant: Participant): string {
  return participant.name.trim().charAt(0).toUpperCase();
}
