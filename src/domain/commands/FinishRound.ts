import type { CommandContext } from "./Command.js";
import { persistInBackground } from "./Persistence.js";
import { RemoveRoom } from "./RemoveRoom.js";
import { eliminateOnTimeout, isParticipant } from "../entities/PlayerRules.js";
import { toRoomView, toRoundStats } from "../entities/RoomSnapshot.js";
import { evaluateTermination, pickProgressWinner } from "../entities/RoundRules.js";
import type { MatchRecord } from "../ports/PersistenceGateway.js";
import type { Room } from "../ports/RoomRegistry.js";
import { timerKeys } from "../ports/Scheduler.js";
import type { PlayerId, TimePoint } from "../typedefs.js";

export type RoundEnding =
  | { readonly trigger: "timeout" }
  | { readonly trigger: "completion"; readonly winnerId: PlayerId | undefined };

export async function finishRound(
  room: Room,
  ending: RoundEnding,
  at: TimePoint,
  ctx: CommandContext,
  source: string = "FinishRound",
): Promise<void> {
  const { bus, scheduler, persistence, config, logger } = ctx;

  room.timerGeneration += 1;
  await scheduler.cancel(timerKeys.round(room.id));

  if (ending.trigger === "timeout") {
    for (const player of room.players) {
      if (!eliminateOnTimeout(player)) continue;
      await bus.publish(room.id, {
        type: "player_eliminated",
        playerId: player.id,
        reason: "timeout",
      });
    }
  }

  const winnerId =
    ending.trigger === "timeout" ? pickProgressWinner(room.players) : ending.winnerId;

  const startedAt = room.roundStartedAt ?? at;
  const phrase = room.currentPhrase;
  const stats = room.players.filter(isParticipant).map(toRoundStats);

  room.status = "finished";
  room.currentPhrase = undefined;
  room.roundStartedAt = undefined;

  const record: MatchRecord = {
    id: `match-${room.id}-${room.roundNumber}`,
    roomId: room.id,
    roundNumber: room.roundNumber,
    players: stats,
    phrases: phrase ? [phrase] : [],
    winnerId: winnerId ?? null,
    durationSeconds: Math.max(0, Math.round((at - startedAt) / 1000)),
    playedAt: at,
  };

  persistInBackground(ctx, "saveMatch", () => persistence.saveMatch(record), {
    roomId: room.id,
    matchId: record.id,
  });

  const view = toRoomView(room);
  persistInBackground(ctx, "updateRoom", () => persistence.updateRoom(view), {
    roomId: room.id,
  });

  logger?.info?.("Round finished", {
    type: source,
    roomId: room.id,
    roundNumber: room.roundNumber,
    trigger: ending.trigger,
    winnerId: winnerId ?? null,
    at,
  });

  await bus.publish(room.id, {
    type: "round_finished",
    roundNumber: room.roundNumber,
    winnerId: winnerId ?? null,
    stats,
  });

  await scheduler.schedule(
    timerKeys.drain(room.id),
    new RemoveRoom(room.id, room.timerGeneration, at + config.roomDrainDelayMs),
    config.roomDrainDelayMs,
  );
}

/** Finishes the round when the room's players no longer need it running. */
export async function finishRoundIfSettled(
  room: Room,
  at: TimePoint,
  ctx: CommandContext,
  source: string,
): Promise<boolean> {
  if (room.status !== "playing") return false;

  const verdict = evaluateTermination(room.players);
  if (!verdict.finished) return false;

  ctx.logger?.info?.("Round settled", {
    type: source,
    roomId: room.id,
    reason: verdict.reason,
    at,
  });

  await finishRound(room, { trigger: "completion", winnerId: verdict.winnerId }, at, ctx, source);
  return true;
}
