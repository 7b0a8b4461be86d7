/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { normalizeJoinCode } from "../../domain/entities/JoinCode.js";
import type { RoomView } from "../../domain/entities/RoomSnapshot.js";
import { assertValidRoom } from "../../domain/entities/RoundRules.js";
import { RoomNotFoundError } from "../../domain/errors/index.js";
import type {
  MatchRecord,
  PersistenceGateway,
  Phrase,
  PlayerProfile,
  PlayerStats,
} from "../../domain/ports/PersistenceGateway.js";
import type { PlayerId, RoomCode, RoomId } from "../../domain/typedefs.js";

interface InMemoryPersistenceGatewayOptions {
  readonly phrases?: readonly Phrase[];
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export class InMemoryPersistenceGateway implements PersistenceGateway {
  #players = new Map<PlayerId, PlayerProfile>();
  #rooms = new Map<RoomId, RoomView>();
  #matches = new Map<string, MatchRecord>();
  #phrases: Phrase[];

  constructor(options: InMemoryPersistenceGatewayOptions = {}) {
    this.#phrases = (options.phrases ?? []).map((phrase) => ({ ...phrase }));
  }

  async getPlayer(playerId: PlayerId): Promise<PlayerProfile | undefined> {
    const player = this.#players.get(playerId);
    return player ? this.#clone(player) : undefined;
  }

  async savePlayer(player: PlayerProfile): Promise<void> {
    this.#players.set(player.id, this.#clone(player));
  }

  async createRoom(room: RoomView): Promise<RoomId> {
    assertValidRoom(room);
    if (this.#rooms.has(room.id)) {
      throw new Error(`Room ${room.id} already exists`);
    }
    if (this.#findByCode(room.code)) {
      throw new Error(`Join code ${room.code} already in use`);
    }
    this.#rooms.set(room.id, this.#clone(room));
    return room.id;
  }

  async getRoom(roomId: RoomId): Promise<RoomView | undefined> {
    const room = this.#rooms.get(roomId);
    return room ? this.#clone(room) : undefined;
  }

  async getRoomByCode(code: RoomCode): Promise<RoomView | undefined> {
    const room = this.#findByCode(normalizeJoinCode(code));
    return room ? this.#clone(room) : undefined;
  }

  async updateRoom(room: RoomView): Promise<void> {
    if (!this.#rooms.has(room.id)) throw new RoomNotFoundError(room.id);
    assertValidRoom(room);
    this.#rooms.set(room.id, this.#clone(room));
  }

  async deleteRoom(roomId: RoomId): Promise<void> {
    this.#rooms.delete(roomId);
  }

  async saveMatch(record: MatchRecord): Promise<string> {
    if (this.#matches.has(record.id)) {
      throw new Error(`Match ${record.id} already recorded`);
    }
    this.#matches.set(record.id, this.#clone(record));
    return record.id;
  }

  async getPhrases(limit: number): Promise<Phrase[]> {
    return this.#phrases.slice(0, Math.max(0, limit)).map((phrase) => ({ ...phrase }));
  }

  async getPlayerStats(playerId: PlayerId): Promise<PlayerStats> {
    const entries = [...this.#matches.values()].flatMap((match) =>
      match.players
        .filter((stats) => stats.playerId === playerId)
        .map((stats) => ({ match, stats })),
    );

    const [first] = entries;
    if (!first) {
      return {
        playerId,
        name: "",
        gamesPlayed: 0,
        gamesWon: 0,
        avgWpm: 0,
        bestWpm: 0,
        totalErrors: 0,
      };
    }

    const wpms = entries.map(({ stats }) => stats.wpm);
    return {
      playerId,
      name: first.stats.name,
      gamesPlayed: entries.length,
      gamesWon: entries.filter(({ match }) => match.winnerId === playerId).length,
      avgWpm: round2(wpms.reduce((sum, wpm) => sum + wpm, 0) / wpms.length),
      bestWpm: round2(Math.max(...wpms)),
      totalErrors: entries.reduce((sum, { stats }) => sum + stats.errors, 0),
    };
  }

  /** Every stored match, oldest first. */
  listMatches(): MatchRecord[] {
    return [...this.#matches.values()].map((match) => this.#clone(match));
  }

  #findByCode(code: RoomCode): RoomView | undefined {
    for (const room of this.#rooms.values()) {
      if (room.code === code) return room;
    }
    return undefined;
  }

  #clone<T>(value: T): T {
    return structuredClone(value);
  }
}
