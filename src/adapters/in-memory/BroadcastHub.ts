/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { OutboundMessage } from "../../domain/messages/OutboundMessage.js";
import type { Logger } from "../../domain/ports/Logger.js";
import type { MessageBus, OutboundChannel } from "../../domain/ports/MessageBus.js";
import type { PlayerId, RoomId } from "../../domain/typedefs.js";

/**
 * Per-room set of live channels with ordered, best-effort fan-out.
 *
 * Each channel has its own delivery queue, so it sees messages in publish
 * order while a slow or stalled socket only holds up itself. Publishing
 * returns as soon as the message is queued. A channel whose send fails is
 * closed and dropped; the publisher is never told.
 */
export class BroadcastHub implements MessageBus {
  #channels: Map<RoomId, Set<OutboundChannel>> = new Map();
  #queues: Map<RoomId, Map<OutboundChannel, Promise<void>>> = new Map();
  readonly #dropped = new WeakSet<OutboundChannel>();
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  register(roomId: RoomId, channel: OutboundChannel): void {
    let channels = this.#channels.get(roomId);
    if (!channels) {
      channels = new Set<OutboundChannel>();
      this.#channels.set(roomId, channels);
    }
    channels.add(channel);

    this.#logger?.info?.("Channel registered", {
      roomId,
      playerId: channel.playerId,
      size: channels.size,
    });
  }

  unregister(roomId: RoomId, channel: OutboundChannel): boolean {
    const channels = this.#channels.get(roomId);
    if (!channels?.delete(channel)) {
      return false;
    }
    if (channels.size === 0) {
      this.#channels.delete(roomId);
    }

    this.#logger?.info?.("Channel unregistered", {
      roomId,
      playerId: channel.playerId,
      size: channels.size,
    });
    return true;
  }

  channels(roomId: RoomId): readonly OutboundChannel[] {
    return [...(this.#channels.get(roomId) ?? [])];
  }

  hasPlayer(roomId: RoomId, playerId: PlayerId): boolean {
    return this.channels(roomId).some((channel) => channel.playerId === playerId);
  }

  async publish(roomId: RoomId, message: OutboundMessage): Promise<void> {
    for (const channel of this.channels(roomId)) {
      this.#enqueue(roomId, channel, () => this.#send(roomId, channel, message));
    }
    this.#logger?.debug?.("Message queued", { roomId, type: message.type });
  }

  async close(roomId: RoomId): Promise<void> {
    const channels = this.channels(roomId);
    this.#channels.delete(roomId);
    for (const channel of channels) {
      this.#enqueue(roomId, channel, async () => this.#closeQuietly(roomId, channel));
    }
  }

  /** Resolves once everything queued so far for the room has been delivered. */
  async flush(roomId: RoomId): Promise<void> {
    await Promise.all([...(this.#queues.get(roomId)?.values() ?? [])]);
  }

  #enqueue(roomId: RoomId, channel: OutboundChannel, job: () => Promise<void>): void {
    let queues = this.#queues.get(roomId);
    if (!queues) {
      queues = new Map();
      this.#queues.set(roomId, queues);
    }

    const previous = queues.get(channel) ?? Promise.resolve();
    const next = previous.then(job).catch((error: unknown) => {
      this.#logger?.error?.("Broadcast job failed", { roomId, playerId: channel.playerId, error });
    });
    queues.set(channel, next);

    void next.then(() => {
      const current = this.#queues.get(roomId);
      if (current?.get(channel) !== next) return;
      current.delete(channel);
      if (current.size === 0) this.#queues.delete(roomId);
    });
  }

  async #send(roomId: RoomId, channel: OutboundChannel, message: OutboundMessage): Promise<void> {
    if (this.#dropped.has(channel)) return;

    let delivered: boolean;
    try {
      delivered = await channel.send(message);
    } catch (error) {
      this.#logger?.warn?.("Failed to deliver message", {
        roomId,
        playerId: channel.playerId,
        type: message.type,
        error,
      });
      delivered = false;
    }
    if (delivered) return;

    this.#dropped.add(channel);
    this.unregister(roomId, channel);
    this.#closeQuietly(roomId, channel);
    this.#logger?.warn?.("Dropped dead channel", {
      roomId,
      playerId: channel.playerId,
      type: message.type,
    });
  }

  #closeQuietly(roomId: RoomId, channel: OutboundChannel): void {
    try {
      channel.close();
    } catch (error) {
      this.#logger?.debug?.("Channel close failed", { roomId, playerId: channel.playerId, error });
    }
  }
}
