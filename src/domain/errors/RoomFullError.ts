import type { RoomId } from "../typedefs.js";

export class RoomFullError extends Error {
  constructor(
    public readonly roomId: RoomId,
    public readonly maxPlayers: number,
  ) {
    super(`Room ${roomId} is full (${maxPlayers} players)`);
    this.name = "RoomFullError";
  }
}
