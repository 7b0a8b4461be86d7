import { computeWpm, matchesPhrase, wordCount } from "./RoundRules.js";
import type { GameConfig } from "../GameConfig.js";
import type { Phrase, PlayerProfile } from "../ports/PersistenceGateway.js";
import type { Player } from "../ports/RoomRegistry.js";
import type { TimePoint } from "../typedefs.js";

export type SubmissionOutcome =
  | { readonly kind: "ignored" }
  | { readonly kind: "completed"; readonly wpm: number }
  | { readonly kind: "error"; readonly errorCount: number; readonly eliminated: boolean };

export function createPlayer(profile: PlayerProfile): Player {
  return {
    id: profile.id,
    name: profile.name,
    avatar: profile.avatar,
    status: "connected",
    errors: 0,
    wpm: 0,
    progress: 0,
    connected: true,
    graceToken: 0,
  };
}

export function resetForRound(player: Player): void {
  player.status = "playing";
  player.errors = 0;
  player.progress = 0;
  player.wpm = 0;
  delete player.completedAt;
  delete player.eliminationReason;
}

/** Players who joined mid-round keep `connected` and take no part in it. */
export function isParticipant(player: Player): boolean {
  return player.status !== "connected";
}

export function isTerminal(player: Player): boolean {
  return player.status === "completed" || player.status === "eliminated";
}

/**
 * Applies one submission to a player that is still playing.
 * Anything submitted outside `playing` is ignored.
 */
export function applySubmission(
  player: Player,
  phrase: Phrase,
  text: string,
  elapsedSeconds: number,
  at: TimePoint,
  config: Pick<GameConfig, "maxErrors" | "errorProgressPenalty">,
): SubmissionOutcome {
  if (player.status !== "playing") {
    return { kind: "ignored" };
  }

  if (matchesPhrase(text, phrase.text)) {
    player.wpm = computeWpm(wordCount(phrase.text), elapsedSeconds);
    player.progress = 100;
    player.status = "completed";
    player.completedAt = at;
    return { kind: "completed", wpm: player.wpm };
  }

  player.errors += 1;
  player.progress = Math.max(0, player.progress - config.errorProgressPenalty);

  const eliminated = player.errors >= config.maxErrors;
  if (eliminated) {
    player.status = "eliminated";
    player.eliminationReason = "errors";
  }

  return { kind: "error", errorCount: player.errors, eliminated };
}

/** Returns whether the player was still playing and has now been eliminated. */
export function eliminateOnTimeout(player: Player): boolean {
  if (player.status !== "playing") {
    return false;
  }
  player.status = "eliminated";
  player.eliminationReason = "timeout";
  return true;
}
