import type { OutboundMessage } from "../messages/OutboundMessage.js";
import type { PlayerId, RoomId } from "../typedefs.js";

/**
 * One live outbound connection of a player.
 *
 * `send` resolves to `false` (or throws) when the message could not be
 * delivered; the caller then treats the channel as dead.
 */
export interface OutboundChannel {
  readonly playerId: PlayerId;
  send(message: OutboundMessage): Promise<boolean> | boolean;
  close(): void;
}

/**
 * Per-room fan-out of outbound messages.
 *
 * Messages published for the same room reach each channel in publish order.
 * `publish` resolves once the message is queued, never waiting on a socket.
 */
export interface MessageBus {
  publish(roomId: RoomId, message: OutboundMessage): Promise<void>;
  /** Drops all channels of the room once what is already queued reaches them. */
  close(roomId: RoomId): Promise<void>;
}
