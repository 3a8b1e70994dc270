import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { Context } from "hono";
import type { WSContext } from "hono/ws";
import type { AddressInfo } from "node:net";
import type { WebSocket } from "ws";

import { RealScheduler } from "./adapters/RealScheduler.js";
import { WebSocketBus } from "./adapters/WebSocketBus.js";
import { createBackendApp } from "./app.js";
import { loadBackendConfig } from "./config.js";
import { SessionDirectory, sessionChannel, type Logger } from "./core.js";
import { createConsoleLogger } from "./logger.js";

export async function startServer(): Promise<void> {
  const logger = createConsoleLogger("backend-local");
  const config = loadBackendConfig();
  const bus = new WebSocketBus(logger);
  const scheduler = new RealScheduler({ logger });
  const directory = new SessionDirectory({
    bus,
    scheduler,
    config: config.session,
    logger,
  });

  const app = createBackendApp({ port: config.port, directory, logger });
  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  app.get(
    "/ws/:sessionId",
    upgradeWebSocket((c: Context) => {
      const sessionId = c.req.param("sessionId") ?? "";
      const participantId = c.req.query("participantId");

      return {
        onOpen(_event: Event, ws: WSContext<WebSocket>): void {
          const rawSocket = ws.raw;
          if (!rawSocket) {
            logger.warn("WebSocket connection missing raw handle", { sessionId });
            return;
          }
          if (!directory.exists(sessionId)) {
            ws.close(4404, "Session not found");
            return;
          }
          bus.attach(sessionChannel(sessionId), rawSocket);
          if (participantId) {
            markConnected(directory, logger, sessionId, participantId, true);
          }
        },
        onClose(): void {
          if (participantId) {
            markConnected(directory, logger, sessionId, participantId, false);
          }
        },
      };
    }),
  );

  const server = serve({ fetch: app.fetch, port: config.port }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });

  injectWebSocket(server);

  const shutdown = (): void => {
    logger.info("Shutting down", { sessions: directory.sessionCount });
    directory.stopAll();
    scheduler.cancelAll();
    server.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

function markConnected(
  directory: SessionDirectory,
  logger: Logger,
  sessionId: string,
  participantId: string,
  connected: boolean,
): void {
  const actor = directory.lookup(sessionId);
  if (!actor) {
    return;
  }
  actor.setConnected(participantId, connected).catch((error: unknown) => {
    logger.warn("Failed to update connection state", { sessionId, participantId, error });
  });
}

void startServer().catch((error) => {
  createConsoleLogger("backend-local").error("Failed to start backend", { error });
  process.exit(1);
});
