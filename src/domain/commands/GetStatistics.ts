import { Command, type CommandOutcome } from "./Command.js";
import {
  allVotersVoted,
  anyVotes,
  calculateStatistics,
  type Session,
  type VoteStatistics,
} from "../entities/SessionRules.js";
import { ok } from "../errors/SessionFailure.js";
import type { TimePoint } from "../typedefs.js";

export interface RoundSummary extends VoteStatistics {
  readonly allVotersVoted: boolean;
  readonly anyVotes: boolean;
}

export class GetStatistics extends Command<RoundSummary> {
  readonly type = "GetStatistics" as const;
  readonly mutates = false;

  constructor(public readonly at: TimePoint) {
    super();
  }

  apply(state: Session): CommandOutcome<RoundSummary> {
    return {
      state,
      reply: ok({
        ...calculateStatistics(state),
        allVotersVoted: allVotersVoted(state),
        anyVotes: anyVotes(state),
      }),
    };
  }
}
