import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { Context } from "hono";
import type { WSContext } from "hono/ws";
import type { AddressInfo } from "node:net";
import type { WebSocket } from "ws";

import { RealScheduler } from "./adapters/RealScheduler.js";
import { RoomConnectionHandler } from "./adapters/RoomConnectionHandler.js";
import { WebSocketChannel } from "./adapters/WebSocketChannel.js";
import { createBackendApp } from "./app.js";
import { loadServerConfig } from "./config.js";
import {
  BroadcastHub,
  InMemoryPersistenceGateway,
  InMemoryRoomRegistry,
  PhrasePool,
  SerialRoomExecutor,
  createGameConfig,
  dispatchCommand,
} from "./core.js";
import type { CommandContext } from "./core.js";
import { createConsoleLogger } from "./logger.js";
import { SEED_PHRASES } from "./seedPhrases.js";

export async function startServer(): Promise<void> {
  const serverConfig = loadServerConfig();
  const logger = createConsoleLogger("backend-local", { debug: serverConfig.debug });
  const config = createGameConfig();

  const persistence = new InMemoryPersistenceGateway({ phrases: SEED_PHRASES });
  const phrases = await PhrasePool.load(persistence, config.phraseLoadLimit, logger);
  const rooms = new InMemoryRoomRegistry();
  const hub = new BroadcastHub(logger);
  const executor = new SerialRoomExecutor();

  const scheduler = new RealScheduler({
    contextFactory: async (): Promise<CommandContext> => createContext(),
    logger,
  });

  const createContext = (): CommandContext => ({
    rooms,
    persistence,
    bus: hub,
    scheduler,
    phrases,
    config,
    executor,
    logger,
  });

  const app = createBackendApp({
    port: serverConfig.port,
    rooms,
    persistence,
    logger,
    createContext,
    dispatch: dispatchCommand,
  });

  const connections = new RoomConnectionHandler({
    hub,
    rooms,
    persistence,
    createContext,
    logger,
  });

  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  app.get(
    "/ws/:roomId/:playerId",
    upgradeWebSocket((c: Context) => {
      const roomId = c.req.param("roomId");
      const playerId = c.req.param("playerId");
      let channel: WebSocketChannel | undefined;
      // Frames from one socket are handled in arrival order, after the join.
      let pending: Promise<unknown> = Promise.resolve();

      return {
        onOpen(_event: Event, ws: WSContext<WebSocket>): void {
          const rawSocket = ws.raw;
          if (!rawSocket) {
            logger.warn("WebSocket connection missing raw handle", { roomId, playerId });
            ws.close();
            return;
          }
          const opened = new WebSocketChannel(playerId, rawSocket);
          channel = opened;
          pending = connections.onConnect(roomId, opened);
        },
        onMessage(event): void {
          const current = channel;
          if (!current) return;
          const raw = typeof event.data === "string" ? event.data : String(event.data);
          pending = pending.then(() => connections.onMessage(roomId, current, raw));
        },
        onClose(): void {
          const current = channel;
          if (!current) return;
          pending = pending.then(() => connections.onDisconnect(roomId, current));
        },
      };
    }),
  );

  const server = serve({ fetch: app.fetch, port: serverConfig.port }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });

  injectWebSocket(server);

  const shutdown = (): void => {
    logger.info("Shutting down", { pendingTimers: scheduler.pending });
    scheduler.stop();
    server.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

void startServer().catch((error) => {
  createConsoleLogger("backend-local").error("Failed to start backend", { error });
  process.exit(1);
});
