import type { PlayerId, RoomId } from "../typedefs.js";

export class PlayerNotInRoomError extends Error {
  constructor(
    public readonly roomId: RoomId,
    public readonly playerId: PlayerId,
  ) {
    super(`Player ${playerId} is not part of room ${roomId}`);
    this.name = "PlayerNotInRoomError";
  }
}
