import { Command, type CommandContext } from "./Command.js";
import { finishRound } from "./FinishRound.js";
import type { RoomId, TimePoint } from "../typedefs.js";

/**
 * Deadline of one round. Only the round whose generation it carries can be
 * finished by it; anything else is a stale firing and ignored.
 */
export class RoundTimeout extends Command {
  readonly type = "RoundTimeout" as const;
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

    if (room.status !== "playing" || room.timerGeneration !== this.generation) {
      logger?.info?.("Stale round timeout ignored", {
        type: this.type,
        roomId: this.roomId,
        generation: this.generation,
        current: room.timerGeneration,
        at: this.at,
      });
      return;
    }

    logger?.info?.("Round timed out", {
      type: this.type,
      roomId: room.id,
      roundNumber: room.roundNumber,
      at: this.at,
    });

    await finishRound(room, { trigger: "timeout" }, this.at, ctx, this.type);
  }
}
