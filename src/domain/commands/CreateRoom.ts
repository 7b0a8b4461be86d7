import { Command, REGISTRY_KEY, type CommandContext } from "./Command.js";
import { persistInBackground } from "./Persistence.js";
import { validateProfile } from "./validation.js";
import { toRoomView, type RoomView } from "../entities/RoomSnapshot.js";
import { RoomCommandInputError } from "../errors/RoomCommandInputError.js";
import type { PlayerProfile } from "../ports/PersistenceGateway.js";
import type { RoomKind, TimePoint } from "../typedefs.js";

const ROOM_KINDS: readonly RoomKind[] = ["public", "private"];

export class CreateRoom extends Command<RoomView> {
  readonly type = "CreateRoom" as const;
  readonly executionKey = REGISTRY_KEY;

  constructor(
    public readonly host: PlayerProfile,
    public readonly kind: RoomKind,
    public readonly maxPlayers: number | undefined,
    public readonly at: TimePoint,
  ) {
    super();

    const issues = validateProfile(host, "Host");

    if (!ROOM_KINDS.includes(kind)) {
      issues.push(`Room kind must be one of: ${ROOM_KINDS.join(", ")}`);
    }

    if (maxPlayers !== undefined && (!Number.isInteger(maxPlayers) || maxPlayers < 1)) {
      issues.push("maxPlayers must be a positive integer");
    }

    if (issues.length > 0) {
      throw RoomCommandInputError.because(issues);
    }
  }

  async execute(ctx: CommandContext): Promise<RoomView> {
    const { rooms, persistence, config, logger } = ctx;

    const maxPlayers = this.maxPlayers ?? config.defaultMaxPlayers;
    if (maxPlayers < config.minPlayers) {
      throw RoomCommandInputError.because([
        `maxPlayers must be at least ${config.minPlayers}`,
      ]);
    }

    const room = rooms.create({
      host: this.host,
      kind: this.kind,
      maxPlayers,
      roundDurationSeconds: config.roundDurationSeconds,
      at: this.at,
    });

    const view = toRoomView(room);
    persistInBackground(ctx, "createRoom", () => persistence.createRoom(view), {
      roomId: room.id,
    });

    logger?.info?.("Room created", {
      type: this.type,
      roomId: room.id,
      code: room.code,
      host: this.host.id,
      at: this.at,
    });

    return view;
  }
}
