import { vi, type Mock } from "vitest";

import { InMemoryRoomRegistry } from "../../src/adapters/in-memory/InMemoryRoomRegistry.js";
import type { CommandContext } from "../../src/domain/commands/Command.js";
import { PhrasePool } from "../../src/domain/entities/PhrasePool.js";
import { createGameConfig, type GameConfig } from "../../src/domain/GameConfig.js";
import type { OutboundMessage } from "../../src/domain/messages/OutboundMessage.js";
import type { Logger } from "../../src/domain/ports/Logger.js";
import type { MessageBus } from "../../src/domain/ports/MessageBus.js";
import type {
  PersistenceGateway,
  Phrase,
  PlayerProfile,
} from "../../src/domain/ports/PersistenceGateway.js";
import type { Room } from "../../src/domain/ports/RoomRegistry.js";
import type { Scheduler } from "../../src/domain/ports/Scheduler.js";
import type { RoomId } from "../../src/domain/typedefs.js";

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type Fn<T extends (...args: any[]) => unknown> = Mock<T>;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
function createMock<T extends (...args: any[]) => unknown>(): Fn<T> {
  return vi.fn<T>();
}

/** Five words, so a 10 s completion scores 30 wpm. */
export const TEST_PHRASE: Phrase = {
  id: "phrase-1",
  text: "La sombra avanzaba sin ruido",
  difficulty: "media",
  category: "terror",
};

export const profile = (id: string): PlayerProfile => ({ id, name: id.toUpperCase(), avatar: "default" });

export interface PublishedMessage {
  readonly roomId: RoomId;
  readonly message: OutboundMessage;
}

type MessageOfType<T extends OutboundMessage["type"]> = Extract<OutboundMessage, { type: T }>;

export class RecordingBus implements MessageBus {
  readonly published: PublishedMessage[] = [];
  readonly closed: RoomId[] = [];

  async publish(roomId: RoomId, message: OutboundMessage): Promise<void> {
    this.published.push({ roomId, message });
  }

  async close(roomId: RoomId): Promise<void> {
    this.closed.push(roomId);
  }

  types(): OutboundMessage["type"][] {
    return this.published.map(({ message }) => message.type);
  }

  ofType<T extends OutboundMessage["type"]>(type: T): MessageOfType<T>[] {
    const isType = (message: OutboundMessage): message is MessageOfType<T> =>
      message.type === type;
    return this.published.map(({ message }) => message).filter(isType);
  }

  clear(): void {
    this.published.length = 0;
  }
}

export interface PersistenceGatewayMock extends PersistenceGateway {
  readonly getPlayer: Fn<PersistenceGateway["getPlayer"]>;
  readonly savePlayer: Fn<PersistenceGateway["savePlayer"]>;
  readonly createRoom: Fn<PersistenceGateway["createRoom"]>;
  readonly getRoom: Fn<PersistenceGateway["getRoom"]>;
  readonly getRoomByCode: Fn<PersistenceGateway["getRoomByCode"]>;
  readonly updateRoom: Fn<PersistenceGateway["updateRoom"]>;
  readonly deleteRoom: Fn<PersistenceGateway["deleteRoom"]>;
  readonly saveMatch: Fn<PersistenceGateway["saveMatch"]>;
  readonly getPhrases: Fn<PersistenceGateway["getPhrases"]>;
  readonly getPlayerStats: Fn<PersistenceGateway["getPlayerStats"]>;
}

export interface SchedulerMock extends Scheduler {
  readonly schedule: Fn<Scheduler["schedule"]>;
  readonly cancel: Fn<Scheduler["cancel"]>;
}

export function createPersistenceGatewayMock(): PersistenceGatewayMock {
  const mock: PersistenceGatewayMock = {
    getPlayer: createMock<PersistenceGateway["getPlayer"]>(),
    savePlayer: createMock<PersistenceGateway["savePlayer"]>(),
    createRoom: createMock<PersistenceGateway["createRoom"]>(),
    getRoom: createMock<PersistenceGateway["getRoom"]>(),
    getRoomByCode: createMock<PersistenceGateway["getRoomByCode"]>(),
    updateRoom: createMock<PersistenceGateway["updateRoom"]>(),
    deleteRoom: createMock<PersistenceGateway["deleteRoom"]>(),
    saveMatch: createMock<PersistenceGateway["saveMatch"]>(),
    getPhrases: createMock<PersistenceGateway["getPhrases"]>(),
    getPlayerStats: createMock<PersistenceGateway["getPlayerStats"]>(),
  };

  mock.getPlayer.mockResolvedValue(undefined);
  mock.savePlayer.mockResolvedValue(undefined);
  mock.createRoom.mockImplementation(async (room) => room.id);
  mock.getRoom.mockResolvedValue(undefined);
  mock.getRoomByCode.mockResolvedValue(undefined);
  mock.updateRoom.mockResolvedValue(undefined);
  mock.deleteRoom.mockResolvedValue(undefined);
  mock.saveMatch.mockImplementation(async (record) => record.id);
  mock.getPhrases.mockResolvedValue([]);

  return mock;
}

export function createSchedulerMock(): SchedulerMock {
  const mock: SchedulerMock = {
    schedule: createMock<Scheduler["schedule"]>(),
    cancel: createMock<Scheduler["cancel"]>(),
  };
  mock.schedule.mockResolvedValue(undefined);
  mock.cancel.mockResolvedValue(undefined);
  return mock;
}

export function createLoggerMock(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } satisfies Logger;
}

export interface CommandContextOverrides {
  readonly persistence?: PersistenceGatewayMock;
  readonly bus?: RecordingBus;
  readonly scheduler?: SchedulerMock;
  readonly phrases?: PhrasePool;
  readonly config?: GameConfig;
  readonly logger?: Logger;
}

export interface CommandContextMock extends CommandContext {
  readonly rooms: InMemoryRoomRegistry;
  readonly persistence: PersistenceGatewayMock;
  readonly bus: RecordingBus;
  readonly scheduler: SchedulerMock;
  readonly config: GameConfig;
}

export function createCommandContext(
  overrides: CommandContextOverrides = {},
): CommandContextMock {
  const context = {
    rooms: new InMemoryRoomRegistry(),
    persistence: overrides.persistence ?? createPersistenceGatewayMock(),
    bus: overrides.bus ?? new RecordingBus(),
    scheduler: overrides.scheduler ?? createSchedulerMock(),
    phrases: overrides.phrases ?? new PhrasePool([TEST_PHRASE]),
    config: overrides.config ?? createGameConfig(),
    ...(overrides.logger !== undefined ? { logger: overrides.logger } : {}),
  } satisfies CommandContextMock;

  return context;
}

/**
 * Creates a waiting room hosted by the first id with the others already
 * joined. Players are added directly, without going through JoinRoom.
 */
export function seedRoom(
  context: CommandContextMock,
  playerIds: readonly string[],
  { maxPlayers = 4, at = 0 }: { readonly maxPlayers?: number; readonly at?: number } = {},
): Room {
  const [hostId, ...others] = playerIds;
  if (hostId === undefined) {
    throw new Error("seedRoom needs at least the host");
  }

  const room = context.rooms.create({
    host: profile(hostId),
    kind: "public",
    maxPlayers,
    roundDurationSeconds: context.config.roundDurationSeconds,
    at,
  });

  for (const id of others) {
    room.players.push({
      id,
      name: id.toUpperCase(),
      avatar: "default",
      status: "connected",
      errors: 0,
      wpm: 0,
      progress: 0,
      connected: true,
      graceToken: 0,
    });
  }

  return room;
}

/** Puts a seeded room into a running round without scheduling anything. */
export function startRoundDirectly(room: Room, at = 0, phrase: Phrase = TEST_PHRASE): void {
  room.status = "playing";
  room.roundNumber += 1;
  room.roundStartedAt = at;
  room.currentPhrase = phrase;
  room.timerGeneration += 1;
  for (const player of room.players) {
    player.status = "playing";
  }
}

export function findPlayer(room: Room, playerId: string): Room["players"][number] {
  const player = room.players.find((candidate) => candidate.id === playerId);
  if (!player) {
    throw new Error(`Player ${playerId} not found in ${room.id}`);
  }
  return player;
}

/** Lets background persistence writes settle. */
export async function flushBackground(): Promise<void> {
  await new Promise<void>((resolve) => setImmediate(resolve));
}
