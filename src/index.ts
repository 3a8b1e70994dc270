export type { Command, CommandOutcome } from "./domain/commands/Command.js";
export { CastVote } from "./domain/commands/CastVote.js";
export { GetSession } from "./domain/commands/GetSession.js";
export { GetStatistics, type RoundSummary } from "./domain/commands/GetStatistics.js";
export { JoinSession } from "./domain/commands/JoinSession.js";
export { LeaveSession } from "./domain/commands/LeaveSession.js";
export { ListAvailableAvatars } from "./domain/commands/ListAvailableAvatars.js";
export { ResetRound } from "./domain/commands/ResetRound.js";
export { RevealVotes } from "./domain/commands/RevealVotes.js";
export { SetConnected } from "./domain/commands/SetConnected.js";
export { SetStoryName } from "./domain/commands/SetStoryName.js";
export { ToggleRole } from "./domain/commands/ToggleRole.js";
export { dispatchCommand } from "./domain/commands/dispatchCommand.js";

export * from "./domain/entities/Avatar.js";
export * from "./domain/entities/Deck.js";
export * from "./domain/entities/Participant.js";
export * from "./domain/entities/SessionNames.js";
export * from "./domain/entities/SessionRules.js";
export * from "./domain/errors/index.js";

export type { Logger } from "./domain/ports/Logger.js";
export type {
  EventListener,
  EventSource,
  MessageBus,
  PubSub,
  Unsubscribe,
} from "./domain/ports/MessageBus.js";
export type { ScheduledTask, Scheduler } from "./domain/ports/Scheduler.js";
export {
  sessionChannel,
  type SessionEvent,
  type SessionEventType,
} from "./domain/ports/SessionEvent.js";

export {
  createSessionConfig,
  type SessionConfig,
  type SessionConfigOverrides,
} from "./domain/SessionConfig.js";
export {
  SessionActor,
  type ActorStatus,
  type SessionActorOptions,
  type TerminationListener,
  type TerminationReason,
} from "./domain/sessions/SessionActor.js";
export {
  SessionDirectory,
  generateParticipantId,
  generateSessionId,
  type CreateSessionInput,
  type SessionDirectoryOptions,
  type SessionIdGenerator,
} from "./domain/sessions/SessionDirectory.js";
export type * from "./domain/typedefs.js";

export { InMemoryPubSub } from "./adapters/in-memory/InMemoryPubSub.js";
export { InMemoryScheduler } from "./adapters/in-memory/InMemoryScheduler.js";
