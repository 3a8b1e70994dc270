import { avatarIds, isAvatarId } from "./Avatar.js";
import { deckCards, isDeckType, isValidCard, numericValue } from "./Deck.js";
import {
  clearVote,
  hasVoted,
  isSpectator,
  isVoter,
  recordVote,
  setParticipantConnected,
  toggleParticipantRole,
  type Participant,
} from "./Participant.js";
import { InvalidSessionStateError } from "../errors/InvalidSessionStateError.js";
import { fail, ok, type Result } from "../errors/SessionFailure.js";
import type {
  AvatarId,
  Card,
  DeckType,
  ParticipantId,
  RoundState,
  SessionId,
  TimePoint,
} from "../typedefs.js";

/**
 * The authoritative snapshot of one estimation room. Every transition below
 * takes a snapshot and returns a new one; a transition that changes nothing
 * returns its input unchanged so callers can detect no-ops by identity.
 */
export interface Session {
  readonly id: SessionId;
  readonly name: string;
  readonly deckType: DeckType;
  readonly state: RoundState;
  /** Label of the story under estimation; cleared on every reset */
  readonly storyName: string | null;
  readonly participants: Readonly<Record<ParticipantId, Participant>>;
  /** Avatars held by current participants, ascending */
  readonly usedAvatars: readonly AvatarId[];
  readonly createdAt: TimePoint;
}

export interface CardCount {
  readonly card: Card;
  readonly count: number;
}

export interface VoteStatistics {
  /** Mean of numeric votes rounded to one decimal, `null` without numeric votes */
  readonly average: number | null;
  /** Every cast card, numeric ascending first, special cards trailing in deck order */
  readonly distribution: readonly CardCount[];
}

export function createSession(
  id: SessionId,
  name: string,
  deckType: DeckType,
  createdAt: TimePoint,
): Session {
  return {
    id,
    name,
    deckType,
    state: "voting",
    storyName: null,
    participants: {},
    usedAvatars: [],
    createdAt,
  };
}

// -----------------------------------------------------------------------------
//  Roster
// -----------------------------------------------------------------------------

/**
 * Inserts the participant and claims its avatar. Availability is checked by
 * the caller inside the same critical section.
 */
export function addParticipant(session: Session, participant: Participant): Session {
  const next: Session = {
    ...session,
    participants: { ...session.participants, [participant.id]: participant },
  };
  return participant.avatarId === null ? next : claimAvatar(next, participant.avatarId);
}

export function removeParticipant(session: Session, participantId: ParticipantId): Session {
  const participant = getParticipant(session, participantId);
  if (!participant) return session;

  const { [participantId]: _removed, ...participants } = session.participants;
  const next: Session = { ...session, participants };
  return participant.avatarId === null ? next : releaseAvatar(next, participant.avatarId);
}

export function updateParticipant(
  session: Session,
  participantId: ParticipantId,
  update: (participant: Participant) => Participant,
): Session {
  const participant = getParticipant(session, participantId);
  if (!participant) return session;

  const updated = update(participant);
  if (updated === participant) return session;

  return {
    ...session,
    participants: { ...session.participants, [participantId]: updated },
  };
}

function claimAvatar(session: Session, avatarId: AvatarId): Session {
  if (session.usedAvatars.includes(avatarId)) return session;
  return {
    ...session,
    usedAvatars: [...session.usedAvatars, avatarId].sort((a, b) => a - b),
  };
}

function releaseAvatar(session: Session, avatarId: AvatarId): Session {
  return {
    ...session,
    usedAvatars: session.usedAvatars.filter((used) => used !== avatarId),
  };
}

export function availableAvatars(session: Session): AvatarId[] {
  return avatarIds().filter((id) => !session.usedAvatars.includes(id));
}

// -----------------------------------------------------------------------------
//  Round transitions
// -----------------------------------------------------------------------------

/** Overwrites any earlier vote; only legal while voting and for cards of the deck. */
export function castVote(
  session: Session,
  participantId: ParticipantId,
  card: Card,
): Result<Session> {
  if (session.state === "revealed") {
    return fail("already_revealed", "Votes are already revealed");
  }
  if (!isValidCard(session.deckType, card)) {
    return fail("invalid_card", `Card ${card} is not part of the ${session.deckType} deck`);
  }
  return ok(updateParticipant(session, participantId, (p) => recordVote(p, card)));
}

export function revealVotes(session: Session): Session {
  if (session.state === "revealed") return session;
  return { ...session, state: "revealed" };
}

export function resetRound(session: Session): Session {
  const participants = Object.fromEntries(
    Object.entries(session.participants).map(([id, participant]) => [
      id,
      clearVote(participant),
    ]),
  );
  return { ...session, state: "voting", storyName: null, participants };
}

export function setStoryName(session: Session, storyName: string | null): Session {
  return { ...session, storyName };
}

export function setConnected(
  session: Session,
  participantId: ParticipantId,
  connected: boolean,
): Session {
  return updateParticipant(session, participantId, (p) =>
    setParticipantConnected(p, connected),
  );
}

/**
 * Flips voter/spectator; the vote is cleared, never carried across roles.
 * Revealed votes stay frozen until a reset, so this is a no-op while revealed.
 */
export function toggleRole(session: Session, participantId: ParticipantId): Session {
  if (session.state === "revealed") return session;
  return updateParticipant(session, participantId, toggleParticipantRole);
}

// -----------------------------------------------------------------------------
//  Queries
// -----------------------------------------------------------------------------

export function participantList(session: Session): Participant[] {
  return Object.values(session.participants);
}

export function voters(session: Session): Participant[] {
  return participantList(session).filter(isVoter);
}

export function spectators(session: Session): Participant[] {
  return participantList(session).filter(isSpectator);
}

export function connectedParticipants(session: Session): Participant[] {
  return participantList(session).filter((p) => p.connected);
}

/** Only connected voters gate the reveal; an empty set never counts as done. */
export function allVotersVoted(session: Session): boolean {
  const connectedVoters = voters(session).filter((p) => p.connected);
  return connectedVoters.length > 0 && connectedVoters.every(hasVoted);
}

export function anyVotes(session: Session): boolean {
  return voters(session).some(hasVoted);
}

export function participantCount(session: Session): number {
  return Object.keys(session.participants).length;
}

export function isEmpty(session: Session): boolean {
  return participantCount(session) === 0;
}

export function getParticipant(
  session: Session,
  participantId: ParticipantId,
): Participant | undefined {
  return Object.hasOwn(session.participants, participantId)
    ? session.participants[participantId]
    : undefined;
}

export function hasParticipant(session: Session, participantId: ParticipantId): boolean {
  return getParticipant(session, participantId) !== undefined;
}

export function calculateStatistics(session: Session): VoteStatistics {
  const votes: Card[] = [];
  for (const participant of voters(session)) {
    if (participant.vote !== null) votes.push(participant.vote);
  }

  const counts = new Map<Card, number>();
  for (const card of votes) {
    counts.set(card, (counts.get(card) ?? 0) + 1);
  }

  const deckOrder = deckCards(session.deckType);
  const sortKey = (card: Card): [number, number] => {
    const value = numericValue(card);
    return value === undefined ? [1, deckOrder.indexOf(card)] : [0, value];
  };

  const distribution = [...counts.entries()]
    .map(([card, count]) => ({ card, count }))
    .sort((a, b) => {
      const [groupA, orderA] = sortKey(a.card);
      const [groupB, orderB] = sortKey(b.card);
      return groupA - groupB || orderA - orderB;
    });

  const numericVotes = votes
    .map(numericValue)
    .filter((value): value is number => value !== undefined);

  const average =
    numericVotes.length === 0
      ? null
      : Math.round((numericVotes.reduce((sum, v) => sum + v, 0) / numericVotes.length) * 10) /
        10;

  return { average, distribution };
}

// -----------------------------------------------------------------------------
//  Assertion function: structural invariants of a snapshot
// -----------------------------------------------------------------------------
export function assertValidSession(session: Session): void {
  const invalid = (reason: string): never => {
    throw new InvalidSessionStateError(reason, session);
  };

  if (!isDeckType(session.deckType)) invalid("invalid deck type");
  if (session.state !== "voting" && session.state !== "revealed") invalid("invalid round state");

  const held: AvatarId[] = [];
  for (const [key, participant] of Object.entries(session.participants)) {
    if (participant.id !== key) invalid(`participant stored under foreign key ${key}`);

    if (participant.vote !== null) {
      if (participant.role === "spectator") invalid(`spectator ${key} holds a vote`);
      if (!isValidCard(session.deckType, participant.vote))
        invalid(`invalid card recorded for ${key}`);
    }

    if (participant.avatarId !== null) {
      if (!isAvatarId(participant.avatarId)) invalid(`invalid avatar for ${key}`);
      if (held.includes(participant.avatarId))
        invalid(`avatar ${participant.avatarId} held twice`);
      held.push(participant.avatarId);
    }
  }

  const sortedHeld = [...held].sort((a, b) => a - b);
  const matches =
    sortedHeld.length === session.usedAvatars.length &&
    sortedHeld.every((id, index) => id === session.usedAvatars[index]);
  if (!matches) invalid("used avatars out of sync with participants");
}
