import type { Phrase, PlayerProfile } from "./PersistenceGateway.js";
import type {
  EliminationReason,
  PlayerId,
  PlayerStatus,
  RoomCode,
  RoomId,
  RoomKind,
  RoomStatus,
  TimePoint,
} from "../typedefs.js";

/** A player as seen by the room it currently sits in. */
export interface Player {
  readonly id: PlayerId;
  readonly name: string;
  readonly avatar: string;
  status: PlayerStatus;
  errors: number;
  wpm: number;
  /** 0–100 */
  progress: number;
  connected: boolean;
  /** When the exact phrase was submitted this round */
  completedAt?: TimePoint;
  eliminationReason?: EliminationReason;
  /** Bumped on every disconnect/reconnect; tags pending grace expiries */
  graceToken: number;
}

/**
 * The in-memory room aggregate. Owned by the registry and mutated in place by
 * commands running on the room's serial executor.
 */
export interface Room {
  readonly id: RoomId;
  readonly code: RoomCode;
  readonly kind: RoomKind;
  players: Player[];
  hostId: PlayerId;
  readonly maxPlayers: number;
  status: RoomStatus;
  roundNumber: number;
  /** Set only while the room is playing */
  currentPhrase: Phrase | undefined;
  /** Set only while the room is playing */
  roundStartedAt: TimePoint | undefined;
  readonly roundDurationSeconds: number;
  /** Bumped whenever a round starts or finishes; tags pending round deadlines */
  timerGeneration: number;
  readonly createdAt: TimePoint;
}

export interface CreateRoomInput {
  readonly host: PlayerProfile;
  readonly kind: RoomKind;
  readonly maxPlayers: number;
  readonly roundDurationSeconds: number;
  readonly at: TimePoint;
}

export interface RoomRegistry {
  /** Creates a room with a join-code unique among active rooms, seeded with the host. */
  create(input: CreateRoomInput): Room;
  findById(roomId: RoomId): Room | undefined;
  findByCode(code: RoomCode): Room | undefined;
  remove(roomId: RoomId): boolean;
  list(): readonly Room[];
}
