import type { Session } from "../entities/SessionRules.js";

export class InvalidSessionStateError extends Error {
  constructor(
    public readonly reason: string,
    public readonly state: Session,
  ) {
    super(`Invalid session state: ${reason}`);
    this.name = "InvalidSessionStateError";
  }
}
