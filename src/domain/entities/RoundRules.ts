import { isParticipant } from "./PlayerRules.js";
import { InvalidRoomStateError } from "../errors/InvalidRoomStateError.js";
import type { Phrase } from "../ports/PersistenceGateway.js";
import type { Player } from "../ports/RoomRegistry.js";
import type { PlayerId, RoomStatus } from "../typedefs.js";

const JOIN_CODE_PATTERN = /^[A-Z0-9]{6}$/;

export function wordCount(text: string): number {
  const trimmed = text.trim();
  if (trimmed.length === 0) return 0;
  return trimmed.split(/\s+/).length;
}

/** Exact, case-sensitive comparison after trimming both sides. */
export function matchesPhrase(submitted: string, phraseText: string): boolean {
  return submitted.trim() === phraseText.trim();
}

export function computeWpm(words: number, elapsedSeconds: number): number {
  if (!(elapsedSeconds > 0)) return 0;
  return (words / elapsedSeconds) * 60;
}

/**
 * Fastest completed player; ties go to the earliest completion, then to list order.
 */
export function pickCompletionWinner(players: readonly Player[]): PlayerId | undefined {
  let best: Player | undefined;
  for (const player of players) {
    if (player.status !== "completed") continue;
    if (!best) {
      best = player;
      continue;
    }
    if (player.wpm > best.wpm) {
      best = player;
    } else if (
      player.wpm === best.wpm &&
      (player.completedAt ?? Infinity) < (best.completedAt ?? Infinity)
    ) {
      best = player;
    }
  }
  return best?.id;
}

/**
 * Participant maximizing (progress, wpm), ties by list order. A player with
 * neither progress nor speed does not qualify.
 */
export function pickProgressWinner(players: readonly Player[]): PlayerId | undefined {
  let best: Player | undefined;
  for (const player of players) {
    if (!isParticipant(player)) continue;
    if (player.progress <= 0 && player.wpm <= 0) continue;
    if (
      !best ||
      player.progress > best.progress ||
      (player.progress === best.progress && player.wpm > best.wpm)
    ) {
      best = player;
    }
  }
  return best?.id;
}

export type TerminationVerdict =
  | { readonly finished: false }
  | {
      readonly finished: true;
      readonly winnerId: PlayerId | undefined;
      readonly reason: "all_terminal" | "last_standing";
    };

/**
 * Decides whether the round is over after a state change.
 *
 * - every participant completed or eliminated: fastest completed player wins;
 * - a single participant still playing while all others were eliminated
 *   without anyone completing: that player wins by default.
 */
export function evaluateTermination(players: readonly Player[]): TerminationVerdict {
  const participants = players.filter(isParticipant);
  const playing = participants.filter((player) => player.status === "playing");

  if (playing.length === 0) {
    return {
      finished: true,
      winnerId: pickCompletionWinner(participants),
      reason: "all_terminal",
    };
  }

  const [survivor] = playing;
  const someoneCompleted = participants.some((player) => player.status === "completed");
  if (survivor && playing.length === 1 && participants.length > 1 && !someoneCompleted) {
    return { finished: true, winnerId: survivor.id, reason: "last_standing" };
  }

  return { finished: false };
}

/** Structural subset shared by the live room and its serialized view. */
export interface RoomShape {
  readonly code: string;
  readonly players: readonly { readonly id: PlayerId }[];
  readonly hostId: PlayerId;
  readonly maxPlayers: number;
  readonly status: RoomStatus;
  readonly currentPhrase: Phrase | null | undefined;
  readonly roundStartedAt: number | null | undefined;
}

// -----------------------------------------------------------------------------
//  Assertion function: runtime check of the room invariants
// -----------------------------------------------------------------------------
export function assertValidRoom(room: RoomShape): void {
  const fail = (reason: string): never => {
    throw new InvalidRoomStateError(reason, room);
  };

  if (!JOIN_CODE_PATTERN.test(room.code)) fail("invalid join code");

  const ids = room.players.map((player) => player.id);
  if (new Set(ids).size !== ids.length) fail("duplicate player IDs");
  if (ids.length > room.maxPlayers) fail("more players than maxPlayers");
  if (ids.length > 0 && !ids.includes(room.hostId)) fail("host not in player list");

  const roundData = room.currentPhrase != null && room.roundStartedAt != null;
  if (room.status === "playing" && !roundData) fail("playing room without phrase or start time");
  if (room.status !== "playing" && (room.currentPhrase != null || room.roundStartedAt != null))
    fail("phrase or start time set outside a round");
}
