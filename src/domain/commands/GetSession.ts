import { Command, type CommandOutcome } from "./Command.js";
import type { Session } from "../entities/SessionRules.js";
import { ok } from "../errors/SessionFailure.js";
import type { TimePoint } from "../typedefs.js";

export class GetSession extends Command<Session> {
  readonly type = "GetSession" as const;
  readonly mutates = false;

  constructor(public readonly at: TimePoint) {
    super();
  }

  apply(state: Session): CommandOutcome<Session> {
    return { state, reply: ok(state) };
  }
}
