import { Command, type CommandContext } from "./Command.js";
import { persistInBackground } from "./Persistence.js";
import { validateProfile } from "./validation.js";
import { createPlayer } from "../entities/PlayerRules.js";
import { toPlayerView, toRoomView, type RoomView } from "../entities/RoomSnapshot.js";
import { RoomCommandInputError } from "../errors/RoomCommandInputError.js";
import { RoomFullError } from "../errors/RoomFullError.js";
import { RoomNotFoundError } from "../errors/RoomNotFoundError.js";
import type { PlayerProfile } from "../ports/PersistenceGateway.js";
import { timerKeys } from "../ports/Scheduler.js";
import type { RoomId, TimePoint } from "../typedefs.js";

export class JoinRoom extends Command<RoomView> {
  readonly type = "JoinRoom" as const;
  readonly executionKey: string;

  constructor(
    public readonly roomId: RoomId,
    public readonly player: PlayerProfile,
    public readonly at: TimePoint,
  ) {
    super();
    this.executionKey = roomId;

    const issues = validateProfile(player, "Player");
    if (issues.length > 0) {
      throw RoomCommandInputError.because(issues);
    }
  }

  async execute(ctx: CommandContext): Promise<RoomView> {
    const { rooms, bus, scheduler, persistence, logger } = ctx;

    const room = rooms.findById(this.roomId);
    if (!room) {
      throw new RoomNotFoundError(this.roomId);
    }

    const existing = room.players.find((player) => player.id === this.player.id);
    if (existing) {
      if (!existing.connected) {
        existing.connected = true;
        existing.graceToken += 1;
        await scheduler.cancel(timerKeys.grace(room.id, existing.id));
      }

      logger?.info?.("Join ignored; player already part of the room", {
        type: this.type,
        roomId: this.roomId,
        playerId: this.player.id,
        at: this.at,
      });

      const view = toRoomView(room);
      await bus.publish(room.id, { type: "room_state", room: view });
      return view;
    }

    if (room.players.length >= room.maxPlayers) {
      throw new RoomFullError(room.id, room.maxPlayers);
    }

    const player = createPlayer(this.player);
    room.players.push(player);

    const view = toRoomView(room);
    persistInBackground(ctx, "updateRoom", () => persistence.updateRoom(view), {
      roomId: room.id,
    });

    logger?.info?.("Player joined room", {
      type: this.type,
      roomId: this.roomId,
      playerId: this.player.id,
      at: this.at,
    });

    await bus.publish(room.id, { type: "player_joined", player: toPlayerView(player) });
    await bus.publish(room.id, { type: "room_state", room: view });

    return view;
  }
}
