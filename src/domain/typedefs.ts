/**
 * Core domain typedefs used throughout the estimation engine.
 * Identifiers stay plain strings; uniqueness is enforced where they are issued.
 */

/** Unique identifier of a session (one estimation room) */
export type SessionId = string;

/** Unique identifier of a participant, stable for a browser session */
export type ParticipantId = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** Round state of a session */
export type RoundState = "voting" | "revealed";

/** Participant role; only voters' cards count toward statistics */
export type Role = "voter" | "spectator";

/** Supported estimation decks */
export type DeckType = "fibonacci" | "tshirt";

/** Opaque card label, valid for exactly one deck */
export type Card = string;

/** One of the fixed avatar presets */
export type AvatarId = 1 | 2 | 3 | 4 | 5 | 6 | 7;
