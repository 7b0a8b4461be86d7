import type { Command } from "../commands/Command.js";
import type { PlayerId, RoomId } from "../typedefs.js";

export type TimerKey = string;

/**
 * Infrastructure abstraction responsible for delivering time-based commands to the domain.
 *
 * Implementations keep at most one pending command per key: scheduling under a key that is
 * already pending replaces the earlier entry. Cancellation only frees resources; the commands
 * themselves carry generation tokens and ignore stale firings.
 */
export interface Scheduler {
  schedule(key: TimerKey, command: Command, delayMs: number): Promise<void>;
  cancel(key: TimerKey): Promise<void>;
}

export const timerKeys = {
  round: (roomId: RoomId): TimerKey => `round:${roomId}`,
  grace: (roomId: RoomId, playerId: PlayerId): TimerKey => `grace:${roomId}:${playerId}`,
  drain: (roomId: RoomId): TimerKey => `drain:${roomId}`,
} as const;
