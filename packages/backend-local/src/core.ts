export type { Command, CommandContext } from "@typerace/core/domain/commands/Command.js";
export { CreateRoom } from "@typerace/core/domain/commands/CreateRoom.js";
export { JoinRoom } from "@typerace/core/domain/commands/JoinRoom.js";
export { LeaveRoom } from "@typerace/core/domain/commands/LeaveRoom.js";
export { PlayerDisconnected } from "@typerace/core/domain/commands/PlayerDisconnected.js";
export { ReconnectPlayer } from "@typerace/core/domain/commands/ReconnectPlayer.js";
export { RoundTimeout } from "@typerace/core/domain/commands/RoundTimeout.js";
export { StartRound } from "@typerace/core/domain/commands/StartRound.js";
export { SubmitText } from "@typerace/core/domain/commands/SubmitText.js";
export { dispatchCommand } from "@typerace/core/domain/commands/dispatchCommand.js";
export { validateProfile } from "@typerace/core/domain/commands/validation.js";
export { createGameConfig } from "@typerace/core/domain/GameConfig.js";
export { PhrasePool } from "@typerace/core/domain/entities/PhrasePool.js";
export { toRoomView } from "@typerace/core/domain/entities/RoomSnapshot.js";
export {
  InboundMessageError,
  PlayerNotInRoomError,
  RoomCommandInputError,
  RoomFullError,
  RoomNotFoundError,
} from "@typerace/core/domain/errors/index.js";
export type { InboundMessage } from "@typerace/core/domain/messages/InboundMessage.js";
export { parseInboundMessage } from "@typerace/core/domain/messages/InboundMessage.js";
export type { OutboundMessage } from "@typerace/core/domain/messages/OutboundMessage.js";
export type { Logger } from "@typerace/core/domain/ports/Logger.js";
export type { OutboundChannel } from "@typerace/core/domain/ports/MessageBus.js";
export type {
  PersistenceGateway,
  Phrase,
  PlayerProfile,
} from "@typerace/core/domain/ports/PersistenceGateway.js";
export type { RoomRegistry } from "@typerace/core/domain/ports/RoomRegistry.js";
export type { Scheduler, TimerKey } from "@typerace/core/domain/ports/Scheduler.js";
export type {
  PlayerId,
  RoomId,
  RoomKind,
} from "@typerace/core/domain/typedefs.js";
export { BroadcastHub } from "@typerace/core/adapters/in-memory/BroadcastHub.js";
export { InMemoryPersistenceGateway } from "@typerace/core/adapters/in-memory/InMemoryPersistenceGateway.js";
export { InMemoryRoomRegistry } from "@typerace/core/adapters/in-memory/InMemoryRoomRegistry.js";
export { SerialRoomExecutor } from "@typerace/core/adapters/in-memory/SerialRoomExecutor.js";
