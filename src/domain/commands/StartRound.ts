import { Command, type CommandContext } from "./Command.js";
import { persistInBackground } from "./Persistence.js";
import { RoundTimeout } from "./RoundTimeout.js";
import { resetForRound } from "../entities/PlayerRules.js";
import { toRoomView } from "../entities/RoomSnapshot.js";
import { RoomCommandInputError } from "../errors/RoomCommandInputError.js";
import { RoomNotFoundError } from "../errors/RoomNotFoundError.js";
import type { Room } from "../ports/RoomRegistry.js";
import { timerKeys } from "../ports/Scheduler.js";
import type { RoomId, TimePoint } from "../typedefs.js";

export interface RoundStarted {
  readonly roomId: RoomId;
  readonly roundNumber: number;
  readonly phrase: string;
  readonly durationSeconds: number;
  readonly startedAt: TimePoint;
}

/**
 * Preconditions are checked before anything is touched, so a rejected start
 * leaves the room exactly as it was.
 */
export class StartRound extends Command<RoundStarted> {
  readonly type = "StartRound" as const;
  readonly executionKey: string;

  constructor(
    public readonly roomId: RoomId,
    public readonly at: TimePoint,
  ) {
    super();
    this.executionKey = roomId;
  }

  async execute(ctx: CommandContext): Promise<RoundStarted> {
    const { rooms, bus, scheduler, phrases, persistence, config, random, logger } = ctx;

    const room = rooms.findById(this.roomId);
    if (!room) {
      throw new RoomNotFoundError(this.roomId);
    }

    const issues = StartRound.validateRoom(room, config.minPlayers);
    if (issues.length > 0) {
      throw RoomCommandInputError.because(issues);
    }

    const phrase = phrases.pick(random);

    room.status = "playing";
    room.roundNumber += 1;
    room.roundStartedAt = this.at;
    room.currentPhrase = phrase;
    for (const player of room.players) {
      resetForRound(player);
    }

    room.timerGeneration += 1;
    const durationMs = room.roundDurationSeconds * 1000;
    await scheduler.cancel(timerKeys.drain(room.id));
    await scheduler.schedule(
      timerKeys.round(room.id),
      new RoundTimeout(room.id, room.timerGeneration, this.at + durationMs),
      durationMs,
    );

    const view = toRoomView(room);
    persistInBackground(ctx, "updateRoom", () => persistence.updateRoom(view), {
      roomId: room.id,
    });

    logger?.info?.("Round started", {
      type: this.type,
      roomId: room.id,
      roundNumber: room.roundNumber,
      phraseId: phrase.id,
      at: this.at,
    });

    await bus.publish(room.id, {
      type: "round_started",
      phrase: phrase.text,
      durationSeconds: room.roundDurationSeconds,
      roundNumber: room.roundNumber,
    });

    return {
      roomId: room.id,
      roundNumber: room.roundNumber,
      phrase: phrase.text,
      durationSeconds: room.roundDurationSeconds,
      startedAt: this.at,
    };
  }

  private static validateRoom(room: Room, minPlayers: number): string[] {
    const issues: string[] = [];

    if (room.status === "playing") {
      issues.push("A round is already in progress");
    }

    if (room.players.length < minPlayers) {
      issues.push(`At least ${minPlayers} players are required to start a round`);
    }

    return issues;
  }
}
