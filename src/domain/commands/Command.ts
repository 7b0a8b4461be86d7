import type { PhrasePool } from "../entities/PhrasePool.js";
import type { GameConfig } from "../GameConfig.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus } from "../ports/MessageBus.js";
import type { PersistenceGateway } from "../ports/PersistenceGateway.js";
import type { RoomExecutor } from "../ports/RoomExecutor.js";
import type { RoomRegistry } from "../ports/RoomRegistry.js";
import type { Scheduler } from "../ports/Scheduler.js";
import type { TimePoint } from "../typedefs.js";

export interface CommandContext {
  readonly rooms: RoomRegistry;
  readonly persistence: PersistenceGateway;
  readonly bus: MessageBus;
  readonly scheduler: Scheduler;
  readonly phrases: PhrasePool;
  readonly config: GameConfig;
  readonly executor?: RoomExecutor;
  readonly random?: () => number;
  readonly logger?: Logger;
}

/** Execution key shared by registry-level commands such as room creation. */
export const REGISTRY_KEY = "registry";

export abstract class Command<TResult = void> {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  /** Commands with the same key are applied one at a time, in dispatch order. */
  abstract readonly executionKey: string;
  abstract execute(ctx: CommandContext): Promise<TResult>;
}
