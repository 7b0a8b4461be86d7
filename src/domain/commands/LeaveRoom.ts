import { Command, type CommandContext } from "./Command.js";
import { removePlayer } from "./RoomMembership.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";

export class LeaveRoom extends Command {
  readonly type = "LeaveRoom" as const;
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
    const room = ctx.rooms.findById(this.roomId);
    if (!room) {
      return;
    }

    await removePlayer(room, this.playerId, this.at, ctx, this.type);
  }
}
