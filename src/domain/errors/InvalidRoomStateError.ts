import type { RoomShape } from "../entities/RoundRules.js";

export class InvalidRoomStateError extends Error {
  constructor(
    public readonly reason: string,
    public readonly room: RoomShape,
  ) {
    super(`Invalid room state: ${reason}`);
    this.name = "InvalidRoomStateError";
  }
}
