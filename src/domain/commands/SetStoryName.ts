import { Command, type CommandOutcome } from "./Command.js";
import { setStoryName, type Session } from "../entities/SessionRules.js";
import { ok } from "../errors/SessionFailure.js";
import type { TimePoint } from "../typedefs.js";

export class SetStoryName extends Command<Session> {
  readonly type = "SetStoryName" as const;
  readonly mutates = true;
  readonly storyName: string | null;

  constructor(storyName: string | null, public readonly at: TimePoint) {
    super();
    const trimmed = storyName?.trim() ?? "";
    this.storyName = trimmed === "" ? null : trimmed;
  }

  apply(state: Session): CommandOutcome<Session> {
    const next = setStoryName(state, this.storyName);
    return {
      state: next,
      reply: ok(next),
      event: {
        type: "story_changed",
        sessionId: next.id,
        at: this.at,
        storyName: this.storyName,
      },
    };
  }
}
