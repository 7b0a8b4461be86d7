import { Hono } from "hono";
import type { Context, Next } from "hono";
import { randomUUID } from "node:crypto";

import {
  CreateRoom,
  JoinRoom,
  PlayerNotInRoomError,
  RoomCommandInputError,
  RoomFullError,
  RoomNotFoundError,
  StartRound,
  dispatchCommand,
  toRoomView,
  validateProfile,
} from "./core.js";
import type {
  CommandContext,
  Logger,
  PersistenceGateway,
  PlayerProfile,
  RoomKind,
  RoomRegistry,
} from "./core.js";
import { DEFAULT_AVATAR, resolveProfile } from "./profiles.js";

export interface CreateBackendAppOptions {
  readonly port: number;
  readonly rooms: RoomRegistry;
  readonly persistence: PersistenceGateway;
  readonly logger: Logger;
  readonly createContext: () => CommandContext;
  readonly dispatch: typeof dispatchCommand;
  readonly now?: () => number;
}

type ErrorStatus = 400 | 404 | 409 | 500;

export function createBackendApp({
  port,
  rooms,
  persistence,
  logger,
  createContext,
  dispatch,
  now = Date.now,
}: CreateBackendAppOptions): Hono {
  const app = new Hono();

  const fail = (c: Context, error: unknown, action: string): Response => {
    const status = statusFor(error);
    const issues = error instanceof RoomCommandInputError ? error.issues : [];
    if (status === 500) {
      logger.error(`${action} failed`, { error });
    } else {
      logger.warn(`${action} rejected`, { error });
    }
    return c.json({ error: getErrorMessage(error), issues }, status);
  };

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.get("/api/health", (c: Context) =>
    c.json({ ok: true, timestamp: now(), rooms: rooms.list().length, config: { port } }),
  );

  app.post("/api/players", async (c: Context) => {
    const body = await c.req
      .json<{
        readonly id?: unknown;
        readonly name?: unknown;
        readonly avatar?: unknown;
      }>()
      .catch(() => null);

    if (!body) {
      return c.json({ error: "JSON body is required", issues: [] }, 400);
    }

    const profile: PlayerProfile = {
      id: typeof body.id === "string" ? body.id : randomUUID(),
      name: typeof body.name === "string" ? body.name.trim() : "",
      avatar: typeof body.avatar === "string" && body.avatar.length > 0 ? body.avatar : DEFAULT_AVATAR,
    };

    const issues = validateProfile(profile, "Player");
    if (issues.length > 0) {
      return fail(c, RoomCommandInputError.because(issues), "Player creation");
    }

    try {
      await persistence.savePlayer(profile);
      return c.json(profile, 201);
    } catch (error) {
      return fail(c, error, "Player creation");
    }
  });

  app.get("/api/players/:id/stats", async (c: Context) => {
    const playerId = c.req.param("id");
    try {
      return c.json(await persistence.getPlayerStats(playerId));
    } catch (error) {
      return fail(c, error, "Stats lookup");
    }
  });

  app.post("/api/rooms", async (c: Context) => {
    const body = await c.req
      .json<{
        readonly hostId?: unknown;
        readonly kind?: unknown;
        readonly maxPlayers?: unknown;
      }>()
      .catch(() => null);

    if (!body || typeof body.hostId !== "string" || body.hostId.length === 0) {
      return c.json({ error: "hostId is required", issues: [] }, 400);
    }

    const kind = parseRoomKind(body.kind);
    if (!kind) {
      return c.json({ error: "kind must be public or private", issues: [] }, 400);
    }

    if (body.maxPlayers !== undefined && typeof body.maxPlayers !== "number") {
      return c.json({ error: "maxPlayers must be a number", issues: [] }, 400);
    }

    try {
      const host = await resolveProfile(persistence, body.hostId, logger);
      const room = await dispatch(
        new CreateRoom(host, kind, body.maxPlayers, now()),
        createContext(),
      );
      return c.json(room, 201);
    } catch (error) {
      return fail(c, error, "Room creation");
    }
  });

  app.post("/api/rooms/join", async (c: Context) => {
    const body = await c.req
      .json<{
        readonly code?: unknown;
        readonly playerId?: unknown;
      }>()
      .catch(() => null);

    if (!body || typeof body.code !== "string" || typeof body.playerId !== "string") {
      return c.json({ error: "code and playerId are required", issues: [] }, 400);
    }

    const room = rooms.findByCode(body.code);
    if (!room) {
      return fail(c, new RoomNotFoundError(body.code), "Room join");
    }

    try {
      const player = await resolveProfile(persistence, body.playerId, logger);
      const view = await dispatch(new JoinRoom(room.id, player, now()), createContext());
      return c.json(view);
    } catch (error) {
      return fail(c, error, "Room join");
    }
  });

  app.get("/api/rooms/:id", (c: Context) => {
    const roomId = c.req.param("id");
    const room = rooms.findById(roomId);
    if (!room) {
      return fail(c, new RoomNotFoundError(roomId), "Room lookup");
    }
    return c.json(toRoomView(room));
  });

  app.post("/api/rooms/:id/start", async (c: Context) => {
    const roomId = c.req.param("id");
    try {
      const started = await dispatch(new StartRound(roomId, now()), createContext());
      return c.json(started);
    } catch (error) {
      return fail(c, error, "Round start");
    }
  });

  return app;
}

function parseRoomKind(value: unknown): RoomKind | undefined {
  if (value === undefined) return "public";
  if (value === "public" || value === "private") return value;
  return undefined;
}

function statusFor(error: unknown): ErrorStatus {
  if (error instanceof RoomNotFoundError || error instanceof PlayerNotInRoomError) {
    return 404;
  }
  if (error instanceof RoomFullError) {
    return 409;
  }
  if (error instanceof RoomCommandInputError) {
    return 400;
  }
  return 500;
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return "Unknown error";
}
