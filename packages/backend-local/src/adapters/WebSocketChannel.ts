import type { WebSocket } from "ws";

import type { OutboundChannel, OutboundMessage, PlayerId } from "../core.js";

/** ws.WebSocket.OPEN */
const OPEN = 1;

/** Outbound channel backed by one `ws` socket; messages go out as JSON text frames. */
export class WebSocketChannel implements OutboundChannel {
  readonly #socket: WebSocket;

  constructor(
    public readonly playerId: PlayerId,
    socket: WebSocket,
  ) {
    this.#socket = socket;
  }

  send(message: OutboundMessage): Promise<boolean> {
    if (this.#socket.readyState !== OPEN) {
      return Promise.resolve(false);
    }

    return new Promise<boolean>((resolve) => {
      try {
        this.#socket.send(JSON.stringify(message), (error?: Error) => {
          resolve(!error);
        });
      } catch {
        resolve(false);
      }
    });
  }

  close(): void {
    this.#socket.close();
  }
}
