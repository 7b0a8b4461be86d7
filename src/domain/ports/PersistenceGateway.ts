import type { RoomView } from "../entities/RoomSnapshot.js";
import type {
  EliminationReason,
  PlayerId,
  PlayerStatus,
  RoomCode,
  RoomId,
  TimePoint,
} from "../typedefs.js";

export interface Phrase {
  readonly id: string;
  readonly text: string;
  readonly difficulty: string;
  readonly category: string;
}

/** Persisted identity of a player, independent of any room. */
export interface PlayerProfile {
  readonly id: PlayerId;
  readonly name: string;
  readonly avatar: string;
}

/** End-of-round statistics of one player. */
export interface PlayerRoundStats {
  readonly playerId: PlayerId;
  readonly name: string;
  readonly status: PlayerStatus;
  readonly wpm: number;
  readonly errors: number;
  readonly progress: number;
  readonly eliminationReason: EliminationReason | null;
}

/** Write-once record of a finished round. */
export interface MatchRecord {
  readonly id: string;
  readonly roomId: RoomId;
  readonly roundNumber: number;
  readonly players: readonly PlayerRoundStats[];
  readonly phrases: readonly Phrase[];
  readonly winnerId: PlayerId | null;
  readonly durationSeconds: number;
  readonly playedAt: TimePoint;
}

/** Aggregate over every match record a player appears in. */
export interface PlayerStats {
  readonly playerId: PlayerId;
  readonly name: string;
  readonly gamesPlayed: number;
  readonly gamesWon: number;
  readonly avgWpm: number;
  readonly bestWpm: number;
  readonly totalErrors: number;
}

/**
 * Persistence abstraction consumed by the orchestrator.
 *
 * The orchestrator treats every write as a best-effort side effect: calls are not awaited by
 * commands and failures never roll back in-memory state.
 */
export interface PersistenceGateway {
  getPlayer(playerId: PlayerId): Promise<PlayerProfile | undefined>;
  savePlayer(player: PlayerProfile): Promise<void>;

  createRoom(room: RoomView): Promise<RoomId>;
  getRoom(roomId: RoomId): Promise<RoomView | undefined>;
  getRoomByCode(code: RoomCode): Promise<RoomView | undefined>;
  updateRoom(room: RoomView): Promise<void>;
  deleteRoom(roomId: RoomId): Promise<void>;

  saveMatch(record: MatchRecord): Promise<string>;

  getPhrases(limit: number): Promise<Phrase[]>;
  getPlayerStats(playerId: PlayerId): Promise<PlayerStats>;
}
