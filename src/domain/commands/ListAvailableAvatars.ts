import { Command, type CommandOutcome } from "./Command.js";
import { availableAvatars, type Session } from "../entities/SessionRules.js";
import { ok } from "../errors/SessionFailure.js";
import type { AvatarId, TimePoint } from "../typedefs.js";

export class ListAvailableAvatars extends Command<AvatarId[]> {
  readonly type = "ListAvailableAvatars" as const;
  readonly mutates = false;

  constructor(public readonly at: TimePoint) {
    super();
  }

  apply(state: Session): CommandOutcome<AvatarId[]> {
    return { state, reply: ok(availableAvatars(state)) };
  }
}
