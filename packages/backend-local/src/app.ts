import { Hono } from "hono";
import type { Context, Next } from "hono";

import {
  CastVote,
  GetSession,
  GetStatistics,
  JoinSession,
  LeaveSession,
  ListAvailableAvatars,
  ResetRound,
  RevealVotes,
  SessionCommandInputError,
  SetConnected,
  SetStoryName,
  ToggleRole,
  allAvatars,
  avatarUrl,
  cardIcon,
  deckCards,
  deckDisplayName,
  deckTypes,
  numericValue,
} from "./core.js";
import type {
  Command,
  FailureReason,
  Logger,
  Result,
  Role,
  SessionDirectory,
  SessionFailure,
} from "./core.js";

export interface CreateBackendAppOptions {
  readonly port: number;
  readonly directory: SessionDirectory;
  readonly logger: Logger;
}

type Body = Readonly<Record<string, unknown>>;

const FAILURE_STATUS: Readonly<Record<FailureReason, 404 | 409 | 422>> = {
  not_found: 404,
  invalid_card: 422,
  invalid_avatar: 422,
  already_revealed: 409,
  avatar_unavailable: 409,
};

export function createBackendApp({ port, directory, logger }: CreateBackendAppOptions): Hono {
  const app = new Hono();

  const execute = async <TReply extends object>(
    c: Context,
    command: Command<TReply>,
    status: 200 | 201 = 200,
  ): Promise<Response> => {
    const sessionId = c.req.param("id") ?? "";
    const result: Result<TReply> = await directory.dispatch(sessionId, command);
    if (!result.ok) {
      return failure(c, result.error);
    }
    return c.json(result.value, status);
  };

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,POST,PUT,DELETE,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.onError((error, c) => {
    if (error instanceof SessionCommandInputError) {
      logger.warn("Rejected request input", { path: c.req.path, issues: error.issues });
      return c.json({ error: error.message, issues: error.issues }, 400);
    }
    logger.error("Request failed", { path: c.req.path, error });
    return c.json({ error: "Internal server error" }, 500);
  });

  app.get("/api/health", (c: Context) =>
    c.json({
      ok: true,
      timestamp: Date.now(),
      sessions: directory.sessionCount,
      config: { port },
    }),
  );

  app.get("/api/decks", (c: Context) =>
    c.json(
      deckTypes().map((type) => ({
        type,
        name: deckDisplayName(type),
        cards: deckCards(type).map((card) => ({
          card,
          value: numericValue(card) ?? null,
          icon: cardIcon(card) ?? null,
        })),
      })),
    ),
  );

  app.get("/api/avatars", (c: Context) =>
    c.json(allAvatars().map((avatar) => ({ ...avatar, url: avatarUrl(avatar.id) }))),
  );

  app.post("/api/sessions", async (c: Context) => {
    const body = await readBody(c);
    const name = optionalString(body, "name");
    const deckType = optionalString(body, "deckType");

    const session = directory.createSession({
      ...(name === undefined ? {} : { name }),
      ...(deckType === undefined ? {} : { deckType }),
    });
    return c.json(session, 201);
  });

  app.get("/api/sessions/:id", (c: Context) => execute(c, new GetSession(Date.now())));

  app.delete("/api/sessions/:id", (c: Context) => {
    const result = directory.stopSession(c.req.param("id") ?? "");
    if (!result.ok) {
      return failure(c, result.error);
    }
    return c.json({ ok: true });
  });

  app.get("/api/sessions/:id/avatars", (c: Context) =>
    execute(c, new ListAvailableAvatars(Date.now())),
  );

  app.get("/api/sessions/:id/statistics", (c: Context) =>
    execute(c, new GetStatistics(Date.now())),
  );

  app.post("/api/sessions/:id/participants", async (c: Context) => {
    const body = await readBody(c);
    const participantId =
      optionalString(body, "participantId") ?? directory.generateParticipantId();
    const role = optionalString(body, "role") ?? "voter";
    const avatarId = body["avatarId"];

    if (avatarId !== undefined && avatarId !== null && typeof avatarId !== "number") {
      throw SessionCommandInputError.because(["avatarId must be a number"]);
    }

    const command = new JoinSession(
      participantId,
      optionalString(body, "name") ?? "",
      narrowRole(role),
      avatarId ?? null,
      Date.now(),
      directory.rng,
    );
    const result = await directory.dispatch(c.req.param("id") ?? "", command);
    if (!result.ok) {
      return failure(c, result.error);
    }
    return c.json({ participantId, session: result.value }, 201);
  });

  app.delete("/api/sessions/:id/participants/:participantId", (c: Context) =>
    execute(c, new LeaveSession(c.req.param("participantId") ?? "", Date.now())),
  );

  app.post("/api/sessions/:id/participants/:participantId/vote", async (c: Context) => {
    const body = await readBody(c);
    const card = body["card"];
    if (typeof card !== "string") {
      throw SessionCommandInputError.because(["card is required"]);
    }
    return execute(c, new CastVote(c.req.param("participantId") ?? "", card, Date.now()));
  });

  app.post("/api/sessions/:id/participants/:participantId/role", (c: Context) =>
    execute(c, new ToggleRole(c.req.param("participantId") ?? "", Date.now())),
  );

  app.post("/api/sessions/:id/participants/:participantId/connection", async (c: Context) => {
    const body = await readBody(c);
    const connected = body["connected"];
    if (typeof connected !== "boolean") {
      throw SessionCommandInputError.because(["connected must be a boolean"]);
    }
    return execute(
      c,
      new SetConnected(c.req.param("participantId") ?? "", connected, Date.now()),
    );
  });

  app.post("/api/sessions/:id/reveal", (c: Context) => execute(c, new RevealVotes(Date.now())));

  app.post("/api/sessions/:id/reset", (c: Context) => execute(c, new ResetRound(Date.now())));

  app.put("/api/sessions/:id/story", async (c: Context) => {
    const body = await readBody(c);
    const storyName = body["storyName"];
    if (storyName !== null && typeof storyName !== "string") {
      throw SessionCommandInputError.because(["storyName must be a string or null"]);
    }
    return execute(c, new SetStoryName(storyName, Date.now()));
  });

  return app;
}

function failure(c: Context, error: SessionFailure): Response {
  return c.json({ error: error.message, reason: error.reason }, FAILURE_STATUS[error.reason]);
}

async function readBody(c: Context): Promise<Body> {
  const body: unknown = await c.req.json().catch(() => null);
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return {};
  }
  return Object.fromEntries(Object.entries(body));
}

function optionalString(body: Body, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw SessionCommandInputError.because([`${key} must be a string`]);
  }
  return value;
}

function narrowRole(role: string): Role {
  if (role !== "voter" && role !== "spectator") {
    throw SessionCommandInputError.because(['Role must be "voter" or "spectator"']);
  }
  return role;
}
