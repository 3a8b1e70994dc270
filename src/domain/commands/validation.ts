import { SessionCommandInputError } from "../errors/SessionCommandInputError.js";
import type { ParticipantId, Role } from "../typedefs.js";

const WHITESPACE_PATTERN = /\s/;

export function isValidParticipantId(id: unknown): id is ParticipantId {
  return typeof id === "string" && id.length > 0 && !WHITESPACE_PATTERN.test(id);
}

export function isRole(value: unknown): value is Role {
  return value === "voter" || value === "spectator";
}

export function assertParticipantId(id: unknown): void {
  if (!isValidParticipantId(id)) {
    throw SessionCommandInputError.because([
      "Participant identifier must be a non-empty string without whitespace",
    ]);
  }
}
