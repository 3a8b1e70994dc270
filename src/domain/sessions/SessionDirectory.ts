/* eslint-disable functional/immutable-data */
import { randomBytes } from "node:crypto";

import { SessionActor, type TerminationReason } from "./SessionActor.js";
import type { Command } from "../commands/Command.js";
import { isDeckType } from "../entities/Deck.js";
import { generateSessionName, type RandomSource } from "../entities/SessionNames.js";
import { createSession, type Session } from "../entities/SessionRules.js";
import { SessionCommandInputError } from "../errors/SessionCommandInputError.js";
import { SessionIdExhaustedError } from "../errors/SessionIdExhaustedError.js";
import { notFound, ok, type Result } from "../errors/SessionFailure.js";
import { createSessionConfig, type SessionConfig } from "../SessionConfig.js";
import type { Logger } from "../ports/Logger.js";
import type { EventListener, PubSub, Unsubscribe } from "../ports/MessageBus.js";
import type { Scheduler } from "../ports/Scheduler.js";
import { sessionChannel, type SessionEvent } from "../ports/SessionEvent.js";
import type { DeckType, ParticipantId, SessionId } from "../typedefs.js";

export type SessionIdGenerator = (length: number) => SessionId;

export interface SessionDirectoryOptions {
  readonly bus: PubSub<SessionEvent>;
  readonly scheduler: Scheduler;
  readonly config?: SessionConfig;
  readonly logger?: Logger;
  readonly generateId?: SessionIdGenerator;
  readonly rng?: RandomSource;
}

export interface CreateSessionInput {
  readonly name?: string | null;
  readonly deckType?: string;
}

/** Every 3 random bytes encode to 4 base64url characters. */
export function generateSessionId(length: number): SessionId {
  const bytes = Math.ceil((length * 3) / 4);
  return randomBytes(bytes).toString("base64url").slice(0, length).toLowerCase();
}

export function generateParticipantId(): ParticipantId {
  return randomBytes(16).toString("base64url");
}

/**
 * Registry of live session actors. An actor leaves the registry in the same
 * tick it terminates, so a lookup never hands out a dead handle. A crashed
 * actor is replaced by a fresh, empty session under the same id.
 */
export class SessionDirectory {
  readonly #actors = new Map<SessionId, SessionActor>();
  readonly #bus: PubSub<SessionEvent>;
  readonly #scheduler: Scheduler;
  readonly #config: SessionConfig;
  readonly #logger: Logger | undefined;
  readonly #generateId: SessionIdGenerator;
  readonly #rng: RandomSource;

  constructor(options: SessionDirectoryOptions) {
    this.#bus = options.bus;
    this.#scheduler = options.scheduler;
    this.#config = options.config ?? createSessionConfig();
    this.#logger = options.logger;
    this.#generateId = options.generateId ?? generateSessionId;
    this.#rng = options.rng ?? Math.random;
  }

  get config(): SessionConfig {
    return this.#config;
  }

  /** Random source behind generated session and participant names */
  get rng(): RandomSource {
    return this.#rng;
  }

  createSession(input: CreateSessionInput = {}): Session {
    const deckType = input.deckType ?? "fibonacci";
    if (!isDeckType(deckType)) {
      throw SessionCommandInputError.because([`Unknown deck type: ${deckType}`]);
    }

    const trimmed = input.name?.trim() ?? "";
    const name = trimmed === "" ? generateSessionName(this.#rng) : trimmed;
    const id = this.#reserveId();

    const session = createSession(id, name, deckType, this.#scheduler.now());
    this.#spawn(session);
    this.#logger?.info("Session created", { sessionId: id, name, deckType });

    return session;
  }

  lookup(sessionId: SessionId): SessionActor | undefined {
    return this.#actors.get(sessionId);
  }

  exists(sessionId: SessionId): boolean {
    return this.#actors.has(sessionId);
  }

  dispatch<TReply>(sessionId: SessionId, command: Command<TReply>): Promise<Result<TReply>> {
    const actor = this.#actors.get(sessionId);
    if (!actor) {
      return Promise.resolve(notFound(sessionId));
    }
    return actor.send(command);
  }

  stopSession(sessionId: SessionId): Result<void> {
    const actor = this.#actors.get(sessionId);
    if (!actor) {
      return notFound(sessionId);
    }
    actor.stop();
    return ok(undefined);
  }

  stopAll(): void {
    for (const actor of [...this.#actors.values()]) {
      actor.stop();
    }
  }

  get sessionCount(): number {
    return this.#actors.size;
  }

  sessionIds(): SessionId[] {
    return [...this.#actors.keys()];
  }

  subscribe(sessionId: SessionId, listener: EventListener<SessionEvent>): Unsubscribe {
    return this.#bus.subscribe(sessionChannel(sessionId), listener);
  }

  unsubscribe(sessionId: SessionId, listener: EventListener<SessionEvent>): void {
    this.#bus.unsubscribe(sessionChannel(sessionId), listener);
  }

  generateParticipantId(): ParticipantId {
    return generateParticipantId();
  }

  #reserveId(): SessionId {
    for (let attempt = 1; attempt <= this.#config.maxIdAttempts; attempt++) {
      const candidate = this.#generateId(this.#config.sessionIdLength);
      if (candidate.length > 0 && !this.#actors.has(candidate)) {
        return candidate;
      }
      this.#logger?.debug("Session id collision, retrying", { candidate, attempt });
    }
    throw new SessionIdExhaustedError(this.#config.maxIdAttempts);
  }

  #spawn(session: Session): SessionActor {
    const actor = new SessionActor({
      session,
      bus: this.#bus,
      scheduler: this.#scheduler,
      config: this.#config,
      logger: this.#logger,
      rng: this.#rng,
      onTerminated: (sessionId, reason) => this.#handleTermination(actor, sessionId, reason),
    });
    this.#actors.set(session.id, actor);
    return actor;
  }

  #handleTermination(
    actor: SessionActor,
    sessionId: SessionId,
    reason: TerminationReason,
  ): void {
    if (this.#actors.get(sessionId) !== actor) {
      return;
    }
    this.#actors.delete(sessionId);

    if (reason !== "crashed") {
      return;
    }

    const previous = actor.snapshot;
    this.#spawn(createSession(sessionId, previous.name, previous.deckType, this.#scheduler.now()));
    this.#logger?.warn("Session restarted after crash", { sessionId });
  }
}
