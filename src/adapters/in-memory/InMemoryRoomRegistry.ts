/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { generateUniqueJoinCode, normalizeJoinCode } from "../../domain/entities/JoinCode.js";
import { createPlayer } from "../../domain/entities/PlayerRules.js";
import type {
  CreateRoomInput,
  Room,
  RoomRegistry,
} from "../../domain/ports/RoomRegistry.js";
import type { RoomCode, RoomId } from "../../domain/typedefs.js";

interface InMemoryRoomRegistryOptions {
  readonly random?: () => number;
}

/**
 * Owner of the live room aggregates. Unlike the persistence adapters it hands
 * out the stored objects themselves: commands mutate them while running on
 * the room's serial executor.
 */
export class InMemoryRoomRegistry implements RoomRegistry {
  #rooms = new Map<RoomId, Room>();
  #codes = new Map<RoomCode, RoomId>();
  #nextId = 1;
  readonly #random: () => number;

  constructor(options: InMemoryRoomRegistryOptions = {}) {
    this.#random = options.random ?? Math.random;
  }

  create({ host, kind, maxPlayers, roundDurationSeconds, at }: CreateRoomInput): Room {
    const id: RoomId = `room-${this.#nextId++}`;
    const code = generateUniqueJoinCode((candidate) => this.#codes.has(candidate), this.#random);

    const room: Room = {
      id,
      code,
      kind,
      players: [createPlayer(host)],
      hostId: host.id,
      maxPlayers,
      status: "waiting",
      roundNumber: 0,
      currentPhrase: undefined,
      roundStartedAt: undefined,
      roundDurationSeconds,
      timerGeneration: 0,
      createdAt: at,
    };

    this.#rooms.set(id, room);
    this.#codes.set(code, id);
    return room;
  }

  findById(roomId: RoomId): Room | undefined {
    return this.#rooms.get(roomId);
  }

  findByCode(code: RoomCode): Room | undefined {
    const roomId = this.#codes.get(normalizeJoinCode(code));
    return roomId === undefined ? undefined : this.#rooms.get(roomId);
  }

  remove(roomId: RoomId): boolean {
    const room = this.#rooms.get(roomId);
    if (!room) return false;

    this.#rooms.delete(roomId);
    this.#codes.delete(room.code);
    return true;
  }

  list(): readonly Room[] {
    return [...this.#rooms.values()];
  }
}
