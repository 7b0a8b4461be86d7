import {
  InboundMessageError,
  JoinRoom,
  LeaveRoom,
  PlayerDisconnected,
  ReconnectPlayer,
  RoomFullError,
  StartRound,
  SubmitText,
  dispatchCommand,
  parseInboundMessage,
} from "../core.js";
import type {
  BroadcastHub,
  CommandContext,
  InboundMessage,
  Logger,
  OutboundChannel,
  PersistenceGateway,
  RoomId,
  RoomRegistry,
} from "../core.js";
import { resolveProfile } from "../profiles.js";

export interface RoomConnectionHandlerOptions {
  readonly hub: BroadcastHub;
  readonly rooms: RoomRegistry;
  readonly persistence: PersistenceGateway;
  readonly createContext: () => CommandContext;
  readonly dispatch?: typeof dispatchCommand;
  readonly logger?: Logger;
  readonly now?: () => number;
}

/**
 * Binds one live connection to a room and a player and translates its
 * lifecycle and frames into commands. Errors raised by a command are sent back
 * to the connection that caused them and never broadcast.
 */
export class RoomConnectionHandler {
  readonly #hub: BroadcastHub;
  readonly #rooms: RoomRegistry;
  readonly #persistence: PersistenceGateway;
  readonly #createContext: () => CommandContext;
  readonly #dispatch: typeof dispatchCommand;
  readonly #logger: Logger | undefined;
  readonly #now: () => number;

  constructor(options: RoomConnectionHandlerOptions) {
    this.#hub = options.hub;
    this.#rooms = options.rooms;
    this.#persistence = options.persistence;
    this.#createContext = options.createContext;
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#logger = options.logger;
    this.#now = options.now ?? Date.now;
  }

  /** Returns false when the connection was refused and closed. */
  async onConnect(roomId: RoomId, channel: OutboundChannel): Promise<boolean> {
    const room = this.#rooms.findById(roomId);
    if (!room) {
      this.#logger?.warn?.("Connection refused; unknown room", {
        roomId,
        playerId: channel.playerId,
      });
      await this.#replyError(channel, new Error(`Room not found: ${roomId}`));
      channel.close();
      return false;
    }

    this.#hub.register(roomId, channel);

    try {
      // JoinRoom also reconnects a member inside their grace window.
      await this.#join(roomId, channel);
      return true;
    } catch (error) {
      await this.#replyError(channel, error);
      if (error instanceof RoomFullError) {
        this.#hub.unregister(roomId, channel);
        channel.close();
        return false;
      }
      return true;
    }
  }

  async onMessage(roomId: RoomId, channel: OutboundChannel, raw: string): Promise<void> {
    try {
      const message = parseInboundMessage(raw);
      if (message.playerId !== undefined && message.playerId !== channel.playerId) {
        throw InboundMessageError.because([
          "Message playerId does not match the connection",
        ]);
      }
      await this.#route(roomId, channel, message);
    } catch (error) {
      this.#logger?.warn?.("Inbound message rejected", {
        roomId,
        playerId: channel.playerId,
        error,
      });
      await this.#replyError(channel, error);
    }
  }

  async onDisconnect(roomId: RoomId, channel: OutboundChannel): Promise<void> {
    const wasRegistered = this.#hub.unregister(roomId, channel);
    if (!wasRegistered && !this.#rooms.findById(roomId)) {
      return;
    }

    if (this.#hub.hasPlayer(roomId, channel.playerId)) {
      this.#logger?.debug?.("Disconnect ignored; player has another connection", {
        roomId,
        playerId: channel.playerId,
      });
      return;
    }

    try {
      await this.#dispatch(
        new PlayerDisconnected(roomId, channel.playerId, this.#now()),
        this.#createContext(),
      );
    } catch (error) {
      this.#logger?.error?.("Failed to handle disconnect", {
        roomId,
        playerId: channel.playerId,
        error,
      });
    }
  }

  async #route(roomId: RoomId, channel: OutboundChannel, message: InboundMessage): Promise<void> {
    const { playerId } = channel;
    const at = this.#now();

    switch (message.type) {
      case "ping":
        return;

      case "join":
        await this.#join(roomId, channel);
        return;

      case "reconnect":
        await this.#dispatch(new ReconnectPlayer(roomId, playerId, at), this.#createContext());
        return;

      case "start_round":
        await this.#dispatch(new StartRound(roomId, at), this.#createContext());
        return;

      case "submit_text":
        await this.#dispatch(
          new SubmitText(roomId, playerId, message.text, message.elapsedSeconds, at),
          this.#createContext(),
        );
        return;

      case "leave":
        await this.#dispatch(new LeaveRoom(roomId, playerId, at), this.#createContext());
        if (this.#hub.unregister(roomId, channel)) {
          channel.close();
        }
        return;
    }
  }

  async #join(roomId: RoomId, channel: OutboundChannel): Promise<void> {
    const profile = await resolveProfile(this.#persistence, channel.playerId, this.#logger);
    await this.#dispatch(new JoinRoom(roomId, profile, this.#now()), this.#createContext());
  }

  async #replyError(channel: OutboundChannel, error: unknown): Promise<void> {
    const message = error instanceof Error ? error.message : "Unknown error";
    const issues =
      error instanceof Error && "issues" in error && Array.isArray(error.issues)
        ? error.issues.filter((issue): issue is string => typeof issue === "string")
        : [];

    try {
      await channel.send({ type: "error", message, issues });
    } catch (sendError) {
      this.#logger?.warn?.("Failed to deliver error reply", {
        playerId: channel.playerId,
        error: sendError,
      });
    }
  }
}
