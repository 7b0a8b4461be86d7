import type { Phrase, PlayerRoundStats } from "../ports/PersistenceGateway.js";
import type { Player, Room } from "../ports/RoomRegistry.js";
import type {
  PlayerId,
  PlayerStatus,
  RoomCode,
  RoomId,
  RoomKind,
  RoomStatus,
  TimePoint,
} from "../typedefs.js";

export interface PlayerView {
  readonly id: PlayerId;
  readonly name: string;
  readonly avatar: string;
  readonly status: PlayerStatus;
  readonly errors: number;
  readonly wpm: number;
  readonly progress: number;
  readonly connected: boolean;
}

/** Serializable copy of a room, shared with clients and with persistence. */
export interface RoomView {
  readonly id: RoomId;
  readonly code: RoomCode;
  readonly kind: RoomKind;
  readonly players: readonly PlayerView[];
  readonly hostId: PlayerId;
  readonly maxPlayers: number;
  readonly status: RoomStatus;
  readonly roundNumber: number;
  readonly currentPhrase: Phrase | null;
  readonly roundStartedAt: TimePoint | null;
  readonly roundDurationSeconds: number;
  readonly createdAt: TimePoint;
}

export function toPlayerView(player: Player): PlayerView {
  return {
    id: player.id,
    name: player.name,
    avatar: player.avatar,
    status: player.status,
    errors: player.errors,
    wpm: player.wpm,
    progress: player.progress,
    connected: player.connected,
  };
}

export function toRoomView(room: Room): RoomView {
  return {
    id: room.id,
    code: room.code,
    kind: room.kind,
    players: room.players.map(toPlayerView),
    hostId: room.hostId,
    maxPlayers: room.maxPlayers,
    status: room.status,
    roundNumber: room.roundNumber,
    currentPhrase: room.currentPhrase ? { ...room.currentPhrase } : null,
    roundStartedAt: room.roundStartedAt ?? null,
    roundDurationSeconds: room.roundDurationSeconds,
    createdAt: room.createdAt,
  };
}

export function toRoundStats(player: Player): PlayerRoundStats {
  return {
    playerId: player.id,
    name: player.name,
    status: player.status,
    wpm: player.wpm,
    errors: player.errors,
    progress: player.progress,
    eliminationReason: player.eliminationReason ?? null,
  };
}
