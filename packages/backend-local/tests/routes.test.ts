import type { Hono } from "hono";
import { describe, expect, it } from "vitest";

import { createBackendApp } from "../src/app.js";
import {
  InMemoryPubSub,
  InMemoryScheduler,
  SessionDirectory,
  createSessionConfig,
  type Logger,
  type SessionEvent,
} from "../src/core.js";

const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

function createTestApp(): { app: Hono; directory: SessionDirectory } {
  let next = 0;
  const directory = new SessionDirectory({
    bus: new InMemoryPubSub<SessionEvent>(),
    scheduler: new InMemoryScheduler(),
    config: createSessionConfig(),
    generateId: () => `room0${++next}`,
    rng: () => 0,
  });
  const app = createBackendApp({ port: 4321, directory, logger: silentLogger });
  return { app, directory };
}

async function call(app: Hono, method: string, path: string, body?: unknown): Promise<Response> {
  return app.request(path, {
    method,
    headers: { "content-type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

async function createRoom(app: Hono, body: unknown = {}): Promise<string> {
  const response = await call(app, "POST", "/api/sessions", body);
  const session: unknown = await response.json();
  if (typeof session !== "object" || session === null || !("id" in session)) {
    throw new Error("Session payload without id");
  }
  return String(session.id);
}

describe("backend-local HTTP routes", () => {
  it("reports health status", async () => {
    const { app } = createTestApp();

    const response = await app.request("/api/health");

    expect(response.status).toBe(200);
    const body: unknown = await response.json();
    expect(body).toMatchObject({ ok: true, sessions: 0, config: { port: 4321 } });
    expect(body).toHaveProperty("timestamp", expect.any(Number));
  });

  it("answers CORS preflight requests", async () => {
    const { app } = createTestApp();

    const response = await app.request("/api/sessions", { method: "OPTIONS" });

    expect(response.headers.get("Access-Control-Allow-Origin")).toBe("*");
    expect(response.headers.get("Access-Control-Allow-Methods")).toBe(
      "GET,POST,PUT,DELETE,OPTIONS",
    );
  });

  it("describes the decks", async () => {
    const { app } = createTestApp();

    const decks: unknown = await (await app.request("/api/decks")).json();

    expect(decks).toMatchObject([
      { type: "fibonacci", name: "Fibonacci" },
      { type: "tshirt", name: "T-Shirt Sizes" },
    ]);
    expect(decks).toHaveProperty([0, "cards", 4], { card: "5", value: 5, icon: null });
    expect(decks).toHaveProperty([1, "cards", 8], {
      card: "coffee",
      value: null,
      icon: "pause-circle",
    });
  });

  it("lists the avatar catalog with urls", async () => {
    const { app } = createTestApp();

    const avatars: unknown = await (await app.request("/api/avatars")).json();

    expect(avatars).toHaveLength(7);
    expect(avatars).toHaveProperty([6], {
      id: 7,
      name: "Ruby",
      color: "e53935",
      eyes: "sensor",
      mouth: "grill02",
      sides: "cables02",
      top: "glowingBulb01",
      url: "https://api.dicebear.com/9.x/bottts/svg?baseColor=e53935&eyes=sensor&mouth=grill02&sides=cables02&top=glowingBulb01",
    });
  });

  describe("sessions", () => {
    it("creates a session", async () => {
      const { app, directory } = createTestApp();

      const response = await call(app, "POST", "/api/sessions", {
        name: "Sprint 9",
        deckType: "tshirt",
      });

      expect(response.status).toBe(201);
      expect(await response.json()).toEqual({
        id: "room01",
        name: "Sprint 9",
        deckType: "tshirt",
        state: "voting",
        storyName: null,
        participants: {},
        usedAvatars: [],
        createdAt: 0,
      });
      expect(directory.exists("room01")).toBe(true);
    });

    it("creates a default session without a body", async () => {
      const { app } = createTestApp();

      const response = await app.request("/api/sessions", { method: "POST" });

      expect(response.status).toBe(201);
      expect(await response.json()).toMatchObject({
        name: "Swift Falcon 1",
        deckType: "fibonacci",
      });
    });

    it("rejects unknown decks", async () => {
      const { app } = createTestApp();

      const response = await call(app, "POST", "/api/sessions", { deckType: "planets" });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: "Unknown deck type: planets",
        issues: ["Unknown deck type: planets"],
      });
    });

    it("answers 404 for unknown sessions", async () => {
      const { app } = createTestApp();

      const response = await app.request("/api/sessions/nope00");

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({
        error: "Session not found: nope00",
        reason: "not_found",
      });
    });

    it("stops a session", async () => {
      const { app } = createTestApp();
      const id = await createRoom(app);

      const stopped = await call(app, "DELETE", `/api/sessions/${id}`);
      expect(stopped.status).toBe(200);
      expect(await stopped.json()).toEqual({ ok: true });

      expect((await app.request(`/api/sessions/${id}`)).status).toBe(404);
      expect((await call(app, "DELETE", `/api/sessions/${id}`)).status).toBe(404);
    });
  });

  describe("participants", () => {
    it("joins with a chosen id and avatar", async () => {
      const { app } = createTestApp();
      const id = await createRoom(app);

      const response = await call(app, "POST", `/api/sessions/${id}/participants`, {
        participantId: "p-ada",
        name: "Ada",
        avatarId: 2,
      });

      expect(response.status).toBe(201);
      expect(await response.json()).toMatchObject({
        participantId: "p-ada",
        session: {
          usedAvatars: [2],
          participants: {
            "p-ada": { id: "p-ada", name: "Ada", role: "voter", vote: null, avatarId: 2 },
          },
        },
      });

      const avatars = await app.request(`/api/sessions/${id}/avatars`);
      expect(await avatars.json()).toEqual([1, 3, 4, 5, 6, 7]);
    });

    it("issues a participant id when none is given", async () => {
      const { app } = createTestApp();
      const id = await createRoom(app);

      const response = await call(app, "POST", `/api/sessions/${id}/participants`, {
        name: "Ben",
        role: "spectator",
      });

      expect(response.status).toBe(201);
      expect(await response.json()).toHaveProperty(
        "participantId",
        expect.stringMatching(/^[A-Za-z0-9_-]{22}$/),
      );
    });

    it("refuses a taken avatar with 409 and an unknown one with 422", async () => {
      const { app } = createTestApp();
      const id = await createRoom(app);
      await call(app, "POST", `/api/sessions/${id}/participants`, {
        participantId: "p-ada",
        name: "Ada",
        avatarId: 3,
      });

      const taken = await call(app, "POST", `/api/sessions/${id}/participants`, {
        participantId: "p-ben",
        name: "Ben",
        avatarId: 3,
      });
      expect(taken.status).toBe(409);
      expect(await taken.json()).toEqual({
        error: "Avatar 3 is already taken",
        reason: "avatar_unavailable",
      });

      const unknown = await call(app, "POST", `/api/sessions/${id}/participants`, {
        participantId: "p-ben",
        name: "Ben",
        avatarId: 12,
      });
      expect(unknown.status).toBe(422);
    });

    it("validates join input", async () => {
      const { app } = createTestApp();
      const id = await createRoom(app);

      const badRole = await call(app, "POST", `/api/sessions/${id}/participants`, {
        participantId: "p-ada",
        name: "Ada",
        role: "host",
      });
      expect(badRole.status).toBe(400);
      expect(await badRole.json()).toMatchObject({
        error: 'Role must be "voter" or "spectator"',
      });

      const badAvatar = await call(app, "POST", `/api/sessions/${id}/participants`, {
        participantId: "p-ada",
        avatarId: "two",
      });
      expect(badAvatar.status).toBe(400);
    });

    it("toggles roles, tracks connections and removes participants", async () => {
      const { app } = createTestApp();
      const id = await createRoom(app);
      await call(app, "POST", `/api/sessions/${id}/participants`, {
        participantId: "p-ada",
        name: "Ada",
      });

      const toggled = await call(app, "POST", `/api/sessions/${id}/participants/p-ada/role`);
      expect(await toggled.json()).toHaveProperty(["participants", "p-ada", "role"], "spectator");

      const offline = await call(
        app,
        "POST",
        `/api/sessions/${id}/participants/p-ada/connection`,
        { connected: false },
      );
      expect(await offline.json()).toHaveProperty(["participants", "p-ada", "connected"], false);

      const malformed = await call(
        app,
        "POST",
        `/api/sessions/${id}/participants/p-ada/connection`,
        { connected: "no" },
      );
      expect(malformed.status).toBe(400);

      const left = await call(app, "DELETE", `/api/sessions/${id}/participants/p-ada`);
      expect(left.status).toBe(200);
      expect(await left.json()).toHaveProperty("participants", {});
    });
  });

  describe("rounds", () => {
    it("plays a round through votes, reveal, statistics and reset", async () => {
      const { app } = createTestApp();
      const id = await createRoom(app);
      for (const participantId of ["p-ada", "p-ben"]) {
        await call(app, "POST", `/api/sessions/${id}/participants`, {
          participantId,
          name: participantId,
        });
      }

      const story = await call(app, "PUT", `/api/sessions/${id}/story`, {
        storyName: "Export CSV",
      });
      expect(await story.json()).toHaveProperty("storyName", "Export CSV");

      await call(app, "POST", `/api/sessions/${id}/participants/p-ada/vote`, { card: "3" });
      await call(app, "POST", `/api/sessions/${id}/participants/p-ben/vote`, { card: "8" });

      const invalid = await call(app, "POST", `/api/sessions/${id}/participants/p-ben/vote`, {
        card: "XL",
      });
      expect(invalid.status).toBe(422);

      const revealed = await call(app, "POST", `/api/sessions/${id}/reveal`);
      expect(await revealed.json()).toHaveProperty("state", "revealed");

      const late = await call(app, "POST", `/api/sessions/${id}/participants/p-ada/vote`, {
        card: "5",
      });
      expect(late.status).toBe(409);
      expect(await late.json()).toEqual({
        error: "Votes are already revealed",
        reason: "already_revealed",
      });

      const statistics = await app.request(`/api/sessions/${id}/statistics`);
      expect(await statistics.json()).toEqual({
        average: 5.5,
        distribution: [
          { card: "3", count: 1 },
          { card: "8", count: 1 },
        ],
        allVotersVoted: true,
        anyVotes: true,
      });

      const reset = await call(app, "POST", `/api/sessions/${id}/reset`);
      expect(await reset.json()).toMatchObject({
        state: "voting",
        storyName: null,
        participants: { "p-ada": { vote: null }, "p-ben": { vote: null } },
      });
    });

    it("requires a card", async () => {
      const { app } = createTestApp();
      const id = await createRoom(app);

      const response = await call(app, "POST", `/api/sessions/${id}/participants/p-ada/vote`, {});

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ error: "card is required" });
    });

    it("clears the story with null and rejects other types", async () => {
      const { app } = createTestApp();
      const id = await createRoom(app);

      const cleared = await call(app, "PUT", `/api/sessions/${id}/story`, { storyName: null });
      expect(await cleared.json()).toHaveProperty("storyName", null);

      const wrong = await call(app, "PUT", `/api/sessions/${id}/story`, { storyName: 42 });
      expect(wrong.status).toBe(400);
    });
  });
});
