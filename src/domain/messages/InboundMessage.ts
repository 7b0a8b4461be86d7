import { InboundMessageError } from "../errors/InboundMessageError.js";
import type { PlayerId } from "../typedefs.js";

/**
 * Messages a connected client may send. The connection is already bound to a
 * room and a player, so `playerId` is optional and only checked for consistency.
 */
export type InboundMessage =
  | { readonly type: "join"; readonly playerId?: PlayerId }
  | { readonly type: "reconnect"; readonly playerId?: PlayerId }
  | { readonly type: "start_round"; readonly playerId?: PlayerId }
  | {
      readonly type: "submit_text";
      readonly playerId?: PlayerId;
      readonly text: string;
      readonly elapsedSeconds: number;
    }
  | { readonly type: "leave"; readonly playerId?: PlayerId }
  | { readonly type: "ping"; readonly playerId?: PlayerId };

const SIMPLE_TYPES = ["join", "reconnect", "start_round", "leave", "ping"] as const;
type SimpleType = (typeof SIMPLE_TYPES)[number];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSimpleType(value: string): value is SimpleType {
  return (SIMPLE_TYPES as readonly string[]).includes(value);
}

/**
 * Parses a raw frame into an {@link InboundMessage}.
 * Accepts `{ type, playerId?, payload? }`; `submit_text` reads `text` and
 * `elapsedSeconds` from `payload`.
 */
export function parseInboundMessage(raw: string): InboundMessage {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    throw InboundMessageError.because(["Message must be valid JSON"]);
  }

  if (!isRecord(decoded)) {
    throw InboundMessageError.because(["Message must be a JSON object"]);
  }

  const { type, playerId, payload } = decoded;

  if (typeof type !== "string") {
    throw InboundMessageError.because(["Message type must be a string"]);
  }

  if (playerId !== undefined && (typeof playerId !== "string" || playerId.length === 0)) {
    throw InboundMessageError.because(["playerId must be a non-empty string when present"]);
  }

  const base = playerId === undefined ? {} : { playerId };

  if (isSimpleType(type)) {
    return { type, ...base };
  }

  if (type === "submit_text") {
    const issues: string[] = [];
    const body = isRecord(payload) ? payload : {};
    const { text, elapsedSeconds } = body;

    if (typeof text !== "string") {
      issues.push("payload.text must be a string");
    }
    if (
      typeof elapsedSeconds !== "number" ||
      !Number.isFinite(elapsedSeconds) ||
      elapsedSeconds < 0
    ) {
      issues.push("payload.elapsedSeconds must be a non-negative number");
    }

    if (issues.length > 0 || typeof text !== "string" || typeof elapsedSeconds !== "number") {
      throw InboundMessageError.because(issues);
    }

    return { type, ...base, text, elapsedSeconds };
  }

  throw InboundMessageError.because([`Unknown message type: ${type}`]);
}
