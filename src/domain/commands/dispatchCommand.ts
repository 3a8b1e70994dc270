import type { Command, CommandOutcome } from "./Command.js";
import type { Session } from "../entities/SessionRules.js";
import type { Logger } from "../ports/Logger.js";

export function dispatchCommand<TReply>(
  command: Command<TReply>,
  state: Session,
  logger?: Logger,
): CommandOutcome<TReply> {
  const started = Date.now();

  try {
    logger?.debug(`[CMD] ${command.type}`, { sessionId: state.id, at: command.at });
    const outcome = command.apply(state);
    logger?.debug(`[CMD OK] ${command.type}`, {
      sessionId: state.id,
      ok: outcome.reply.ok,
      ms: Date.now() - started,
    });
    return outcome;
  } catch (error) {
    logger?.error(`[CMD ERR] ${command.type}`, { sessionId: state.id, error });
    throw error;
  }
}
