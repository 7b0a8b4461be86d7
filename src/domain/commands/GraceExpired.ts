import { Command, type CommandContext } from "./Command.js";
import { removePlayer } from "./RoomMembership.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";

export class GraceExpired extends Command {
  readonly type = "GraceExpired" as const;
  readonly executionKey: string;

  constructor(
    public readonly roomId: RoomId,
    public readonly playerId: PlayerId,
    public readonly graceToken: number,
    public readonly at: TimePoint,
  ) {
    super();
    this.executionKey = roomId;
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { rooms, logger } = ctx;

    const room = rooms.findById(this.roomId);
    const player = room?.players.find((candidate) => candidate.id === this.playerId);
    if (!room || !player) {
      return;
    }

    if (player.connected || player.graceToken !== this.graceToken) {
      logger?.info?.("Stale grace expiry ignored", {
        type: this.type,
        roomId: room.id,
        playerId: player.id,
        at: this.at,
      });
      return;
    }

    await removePlayer(room, player.id, this.at, ctx, this.type);
  }
}
