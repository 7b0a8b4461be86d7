import { Command, type CommandContext } from "./Command.js";
import { deleteRoom } from "./RoomMembership.js";
import type { RoomId, TimePoint } from "../typedefs.js";

/**
 * Drops a finished room once clients had time to read the results. Tagged with
 * the generation the room had when the round finished; a newer round makes it
 * a no-op.
 */
export class RemoveRoom extends Command {
  readonly type = "RemoveRoom" as const;
  readonly executionKey: string;

  constructor(
    public readonly roomId: RoomId,
    public readonly generation: number,
    public readonly at: TimePoint,
  ) {
    super();
    this.executionKey = roomId;
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { rooms, logger } = ctx;
    const room = rooms.findById(this.roomId);

    if (!room) {
      return;
    }

    if (room.status !== "finished" || room.timerGeneration !== this.generation) {
      logger?.info?.("Room removal skipped; room moved on", {
        type: this.type,
        roomId: this.roomId,
        generation: this.generation,
        current: room.timerGeneration,
        at: this.at,
      });
      return;
    }

    await deleteRoom(room, this.at, ctx, this.type);
  }
}
