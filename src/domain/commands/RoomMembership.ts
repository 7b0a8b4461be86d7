import type { CommandContext } from "./Command.js";
import { finishRoundIfSettled } from "./FinishRound.js";
import { persistInBackground } from "./Persistence.js";
import { toRoomView } from "../entities/RoomSnapshot.js";
import type { Room } from "../ports/RoomRegistry.js";
import { timerKeys } from "../ports/Scheduler.js";
import type { PlayerId, TimePoint } from "../typedefs.js";

/**
 * Takes a player out of the room for good: hands the host role on, deletes
 * the room once empty and re-checks whether a running round is settled.
 */
export async function removePlayer(
  room: Room,
  playerId: PlayerId,
  at: TimePoint,
  ctx: CommandContext,
  source: string,
): Promise<void> {
  const { bus, scheduler, persistence, logger } = ctx;

  const index = room.players.findIndex((player) => player.id === playerId);
  if (index === -1) return;

  room.players.splice(index, 1);
  await scheduler.cancel(timerKeys.grace(room.id, playerId));

  logger?.info?.("Player removed from room", {
    type: source,
    roomId: room.id,
    playerId,
    remaining: room.players.length,
    at,
  });

  const [nextHost] = room.players;
  if (!nextHost) {
    await deleteRoom(room, at, ctx, source);
    return;
  }

  if (room.hostId === playerId) {
    room.hostId = nextHost.id;
    await bus.publish(room.id, { type: "host_changed", hostId: nextHost.id });
  }

  await bus.publish(room.id, { type: "player_left", playerId });

  const settled = await finishRoundIfSettled(room, at, ctx, source);
  if (settled) return;

  const view = toRoomView(room);
  persistInBackground(ctx, "updateRoom", () => persistence.updateRoom(view), {
    roomId: room.id,
  });
  await bus.publish(room.id, { type: "room_state", room: view });
}

export async function deleteRoom(
  room: Room,
  at: TimePoint,
  ctx: CommandContext,
  source: string,
): Promise<void> {
  const { rooms, bus, scheduler, persistence, logger } = ctx;

  if (!rooms.remove(room.id)) return;

  room.timerGeneration += 1;
  await scheduler.cancel(timerKeys.round(room.id));
  await scheduler.cancel(timerKeys.drain(room.id));
  for (const player of room.players) {
    await scheduler.cancel(timerKeys.grace(room.id, player.id));
  }

  persistInBackground(ctx, "deleteRoom", () => persistence.deleteRoom(room.id), {
    roomId: room.id,
  });

  logger?.info?.("Room removed", { type: source, roomId: room.id, at });

  await bus.publish(room.id, { type: "room_deleted", roomId: room.id });
  await bus.close(room.id);
}
