/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { CastVote } from "../commands/CastVote.js";
import type { Command, CommandOutcome } from "../commands/Command.js";
import { dispatchCommand } from "../commands/dispatchCommand.js";
import { GetSession } from "../commands/GetSession.js";
import { GetStatistics, type RoundSummary } from "../commands/GetStatistics.js";
import { JoinSession } from "../commands/JoinSession.js";
import { LeaveSession } from "../commands/LeaveSession.js";
import { ListAvailableAvatars } from "../commands/ListAvailableAvatars.js";
import { ResetRound } from "../commands/ResetRound.js";
import { RevealVotes } from "../commands/RevealVotes.js";
import { SetConnected } from "../commands/SetConnected.js";
import { SetStoryName } from "../commands/SetStoryName.js";
import { ToggleRole } from "../commands/ToggleRole.js";
import type { RandomSource } from "../entities/SessionNames.js";
import { assertValidSession, isEmpty, type Session } from "../entities/SessionRules.js";
import { notFound, type Result } from "../errors/SessionFailure.js";
import type { SessionConfig } from "../SessionConfig.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus } from "../ports/MessageBus.js";
import type { ScheduledTask, Scheduler } from "../ports/Scheduler.js";
import { sessionChannel, type SessionEvent } from "../ports/SessionEvent.js";
import type { AvatarId, Card, ParticipantId, Role, SessionId, TimePoint } from "../typedefs.js";

export type ActorStatus = "active" | "terminated";

export type TerminationReason = "stopped" | "idle" | "crashed";

export type TerminationListener = (
  sessionId: SessionId,
  reason: TerminationReason,
  error?: unknown,
) => void;

export interface SessionActorOptions {
  readonly session: Session;
  readonly bus: MessageBus<SessionEvent>;
  readonly scheduler: Scheduler;
  readonly config: SessionConfig;
  readonly logger?: Logger;
  /** Draws generated names for participants joining without one */
  readonly rng?: RandomSource;
  readonly onTerminated?: TerminationListener;
}

interface Envelope {
  run(): Promise<void>;
  /** Settles the caller when the actor terminates before the envelope runs */
  abandon(): void;
}

/**
 * Owns one session. Commands sent to it are queued and applied strictly one
 * at a time in arrival order; each caller receives the reply of its own
 * command. Events are broadcast only after the new snapshot is committed.
 *
 * A command that throws, or that leaves the snapshot violating its
 * invariants, crashes the actor: the caller's promise rejects, everything
 * still queued resolves as not found, and the termination listener is told.
 */
export class SessionActor {
  #state: Session;
  #status: ActorStatus = "active";
  #lastActivity: TimePoint;
  #mailbox: Envelope[] = [];
  #draining = false;
  readonly #sweep: ScheduledTask;
  readonly #bus: MessageBus<SessionEvent>;
  readonly #scheduler: Scheduler;
  readonly #config: SessionConfig;
  readonly #logger: Logger | undefined;
  readonly #onTerminated: TerminationListener | undefined;
  readonly #rng: RandomSource;

  constructor(options: SessionActorOptions) {
    assertValidSession(options.session);

    this.#state = options.session;
    this.#bus = options.bus;
    this.#scheduler = options.scheduler;
    this.#config = options.config;
    this.#logger = options.logger;
    this.#onTerminated = options.onTerminated;
    this.#rng = options.rng ?? Math.random;
    this.#lastActivity = options.scheduler.now();

    this.#sweep = this.#scheduler.scheduleRepeating(this.#config.idleCheckIntervalMs, () =>
      this.#enqueueIdleCheck(),
    );
  }

  get id(): SessionId {
    return this.#state.id;
  }

  get status(): ActorStatus {
    return this.#status;
  }

  /** Last committed snapshot, readable without queueing; kept after termination */
  get snapshot(): Session {
    return this.#state;
  }

  get lastActivity(): TimePoint {
    return this.#lastActivity;
  }

  send<TReply>(command: Command<TReply>): Promise<Result<TReply>> {
    if (this.#status === "terminated") {
      return Promise.resolve(notFound(this.id));
    }

    return new Promise<Result<TReply>>((resolve, reject) => {
      this.#enqueue({
        run: async () => {
          let outcome: CommandOutcome<TReply>;
          try {
            outcome = dispatchCommand(command, this.#state, this.#logger);
            assertValidSession(outcome.state);
          } catch (error) {
            reject(error);
            this.#crash(error);
            return;
          }

          this.#state = outcome.state;
          if (command.mutates && outcome.reply.ok) {
            this.#lastActivity = this.#scheduler.now();
          }
          if (outcome.event) {
            await this.#broadcast(outcome.event);
          }
          resolve(outcome.reply);
        },
        abandon: () => resolve(notFound(this.id)),
      });
    });
  }

  /** Terminates immediately; commands still waiting in the mailbox resolve as not found. */
  stop(reason: Exclude<TerminationReason, "crashed"> = "stopped"): void {
    if (!this.#terminate()) {
      return;
    }
    this.#logger?.info("Session terminated", { sessionId: this.id, reason });
    this.#onTerminated?.(this.id, reason);
  }

  get(): Promise<Result<Session>> {
    return this.send(new GetSession(this.#scheduler.now()));
  }

  async join(
    participantId: ParticipantId,
    name: string,
    role: Role = "voter",
    avatarId: number | null = null,
  ): Promise<Result<Session>> {
    const at = this.#scheduler.now();
    return this.send(new JoinSession(participantId, name, role, avatarId, at, this.#rng));
  }

  async leave(participantId: ParticipantId): Promise<Result<Session>> {
    return this.send(new LeaveSession(participantId, this.#scheduler.now()));
  }

  async castVote(participantId: ParticipantId, card: Card): Promise<Result<Session>> {
    return this.send(new CastVote(participantId, card, this.#scheduler.now()));
  }

  reveal(): Promise<Result<Session>> {
    return this.send(new RevealVotes(this.#scheduler.now()));
  }

  reset(): Promise<Result<Session>> {
    return this.send(new ResetRound(this.#scheduler.now()));
  }

  setStoryName(storyName: string | null): Promise<Result<Session>> {
    return this.send(new SetStoryName(storyName, this.#scheduler.now()));
  }

  async setConnected(
    participantId: ParticipantId,
    connected: boolean,
  ): Promise<Result<Session>> {
    return this.send(new SetConnected(participantId, connected, this.#scheduler.now()));
  }

  async toggleRole(participantId: ParticipantId): Promise<Result<Session>> {
    return this.send(new ToggleRole(participantId, this.#scheduler.now()));
  }

  availableAvatars(): Promise<Result<AvatarId[]>> {
    return this.send(new ListAvailableAvatars(this.#scheduler.now()));
  }

  statistics(): Promise<Result<RoundSummary>> {
    return this.send(new GetStatistics(this.#scheduler.now()));
  }

  #enqueue(envelope: Envelope): void {
    this.#mailbox.push(envelope);
    void this.#drain();
  }

  async #drain(): Promise<void> {
    if (this.#draining) {
      return;
    }
    this.#draining = true;

    try {
      while (this.#status === "active") {
        const envelope = this.#mailbox.shift();
        if (!envelope) {
          break;
        }
        await envelope.run();
      }
    } finally {
      this.#draining = false;
    }
  }

  /** The check runs through the mailbox so it never interleaves with a mutation. */
  #enqueueIdleCheck(): Promise<void> {
    if (this.#status === "terminated") {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.#enqueue({
        run: async () => {
          const idleFor = this.#scheduler.now() - this.#lastActivity;
          if (isEmpty(this.#state) && idleFor > this.#config.idleTimeoutMs) {
            this.#logger?.info("Session idle, reclaiming", { sessionId: this.id, idleFor });
            this.stop("idle");
          }
          resolve();
        },
        abandon: resolve,
      });
    });
  }

  async #broadcast(event: SessionEvent): Promise<void> {
    try {
      await this.#bus.publish(sessionChannel(this.id), event);
    } catch (error) {
      this.#logger?.warn("Failed to broadcast session event", {
        sessionId: this.id,
        type: event.type,
        error,
      });
    }
  }

  #crash(error: unknown): void {
    if (!this.#terminate()) {
      return;
    }
    this.#logger?.error("Session crashed", { sessionId: this.id, error });
    this.#onTerminated?.(this.id, "crashed", error);
  }

  #terminate(): boolean {
    if (this.#status === "terminated") {
      return false;
    }
    this.#status = "terminated";
    this.#sweep.cancel();

    const pending = this.#mailbox;
    this.#mailbox = [];
    for (const envelope of pending) {
      envelope.abandon();
    }
    return true;
  }
}
