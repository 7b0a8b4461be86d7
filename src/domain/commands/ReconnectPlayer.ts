import { Command, type CommandContext } from "./Command.js";
import { toRoomView } from "../entities/RoomSnapshot.js";
import { PlayerNotInRoomError } from "../errors/PlayerNotInRoomError.js";
import { RoomNotFoundError } from "../errors/RoomNotFoundError.js";
import { timerKeys } from "../ports/Scheduler.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";

export class ReconnectPlayer extends Command {
  readonly type = "ReconnectPlayer" as const;
  readonly executionKey: string;

  constructor(
    public readonly roomId: RoomId,
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
    this.executionKey = roomId;
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { rooms, bus, scheduler, logger } = ctx;

    const room = rooms.findById(this.roomId);
    if (!room) {
      throw new RoomNotFoundError(this.roomId);
    }

    const player = room.players.find((candidate) => candidate.id === this.playerId);
    if (!player) {
      throw new PlayerNotInRoomError(this.roomId, this.playerId);
    }

    if (player.connected) {
      logger?.info?.("Reconnect ignored; player already connected", {
        type: this.type,
        roomId: room.id,
        playerId: player.id,
        at: this.at,
      });
      return;
    }

    player.connected = true;
    player.graceToken += 1;
    await scheduler.cancel(timerKeys.grace(room.id, player.id));

    logger?.info?.("Player reconnected", {
      type: this.type,
      roomId: room.id,
      playerId: player.id,
      at: this.at,
    });

    await bus.publish(room.id, { type: "room_state", room: toRoomView(room) });
  }
}
