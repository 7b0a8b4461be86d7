import type { PlayerView, RoomView } from "../entities/RoomSnapshot.js";
import type { PlayerRoundStats } from "../ports/PersistenceGateway.js";
import type { EliminationReason, PlayerId, RoomId } from "../typedefs.js";

export type OutboundMessage =
  | { readonly type: "player_joined"; readonly player: PlayerView }
  | { readonly type: "player_left"; readonly playerId: PlayerId }
  | { readonly type: "host_changed"; readonly hostId: PlayerId }
  | {
      readonly type: "round_started";
      readonly phrase: string;
      readonly durationSeconds: number;
      readonly roundNumber: number;
    }
  | { readonly type: "player_completed"; readonly playerId: PlayerId; readonly wpm: number }
  | { readonly type: "player_error"; readonly playerId: PlayerId; readonly errorCount: number }
  | {
      readonly type: "player_eliminated";
      readonly playerId: PlayerId;
      readonly reason: EliminationReason;
    }
  | {
      readonly type: "round_finished";
      readonly roundNumber: number;
      readonly winnerId: PlayerId | null;
      readonly stats: readonly PlayerRoundStats[];
    }
  | { readonly type: "room_state"; readonly room: RoomView }
  | { readonly type: "room_deleted"; readonly roomId: RoomId }
  | { readonly type: "error"; readonly message: string; readonly issues: readonly string[] };
