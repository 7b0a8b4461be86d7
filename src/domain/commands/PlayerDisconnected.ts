import { Command, type CommandContext } from "./Command.js";
import { GraceExpired } from "./GraceExpired.js";
import { toRoomView } from "../entities/RoomSnapshot.js";
import { timerKeys } from "../ports/Scheduler.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";

/**
 * Marks a player as temporarily gone. Round status, progress and errors stay
 * untouched; the player is only removed if the grace window runs out.
 */
export class PlayerDisconnected extends Command {
  readonly type = "PlayerDisconnected" as const;
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
    const { rooms, bus, scheduler, config, logger } = ctx;

    const room = rooms.findById(this.roomId);
    const player = room?.players.find((candidate) => candidate.id === this.playerId);
    if (!room || !player || !player.connected) {
      return;
    }

    player.connected = false;
    player.graceToken += 1;

    await scheduler.schedule(
      timerKeys.grace(room.id, player.id),
      new GraceExpired(room.id, player.id, player.graceToken, this.at + config.reconnectGraceMs),
      config.reconnectGraceMs,
    );

    logger?.info?.("Player disconnected; grace window started", {
      type: this.type,
      roomId: room.id,
      playerId: player.id,
      graceMs: config.reconnectGraceMs,
      at: this.at,
    });

    await bus.publish(room.id, { type: "room_state", room: toRoomView(room) });
  }
}
