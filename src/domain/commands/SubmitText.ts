import { Command, type CommandContext } from "./Command.js";
import { finishRoundIfSettled } from "./FinishRound.js";
import { applySubmission } from "../entities/PlayerRules.js";
import { RoomCommandInputError } from "../errors/RoomCommandInputError.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";

export class SubmitText extends Command {
  readonly type = "SubmitText" as const;
  readonly executionKey: string;

  constructor(
    public readonly roomId: RoomId,
    public readonly playerId: PlayerId,
    public readonly text: string,
    public readonly elapsedSeconds: number,
    public readonly at: TimePoint,
  ) {
    super();
    this.executionKey = roomId;

    const issues: string[] = [];
    if (typeof text !== "string") {
      issues.push("Submitted text must be a string");
    }
    if (!Number.isFinite(elapsedSeconds) || elapsedSeconds < 0) {
      issues.push("elapsedSeconds must be a non-negative number");
    }
    if (issues.length > 0) {
      throw RoomCommandInputError.because(issues);
    }
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { rooms, bus, config, logger } = ctx;

    const room = rooms.findById(this.roomId);
    const player = room?.players.find((candidate) => candidate.id === this.playerId);
    const phrase = room?.currentPhrase;

    if (!room || !player || room.status !== "playing" || !phrase) {
      logger?.info?.("Submission ignored; no round for this player", {
        type: this.type,
        roomId: this.roomId,
        playerId: this.playerId,
        at: this.at,
      });
      return;
    }

    const outcome = applySubmission(player, phrase, this.text, this.elapsedSeconds, this.at, config);

    switch (outcome.kind) {
      case "ignored":
        logger?.info?.("Submission ignored; player is not playing", {
          type: this.type,
          roomId: room.id,
          playerId: player.id,
          status: player.status,
          at: this.at,
        });
        return;

      case "completed":
        logger?.info?.("Player completed the phrase", {
          type: this.type,
          roomId: room.id,
          playerId: player.id,
          wpm: outcome.wpm,
          at: this.at,
        });
        await bus.publish(room.id, {
          type: "player_completed",
          playerId: player.id,
          wpm: outcome.wpm,
        });
        break;

      case "error":
        await bus.publish(room.id, {
          type: "player_error",
          playerId: player.id,
          errorCount: outcome.errorCount,
        });
        if (outcome.eliminated) {
          logger?.info?.("Player eliminated by errors", {
            type: this.type,
            roomId: room.id,
            playerId: player.id,
            at: this.at,
          });
          await bus.publish(room.id, {
            type: "player_eliminated",
            playerId: player.id,
            reason: "errors",
          });
        }
        break;
    }

    await finishRoundIfSettled(room, this.at, ctx, this.type);
  }
}
