import type { Logger, PersistenceGateway, PlayerId, PlayerProfile } from "./core.js";

export const DEFAULT_AVATAR = "default";

/** Stored profile of the player, or one named after the id when none is stored. */
export async function resolveProfile(
  persistence: Pick<PersistenceGateway, "getPlayer">,
  playerId: PlayerId,
  logger?: Logger,
): Promise<PlayerProfile> {
  try {
    const stored = await persistence.getPlayer(playerId);
    if (stored) {
      return stored;
    }
  } catch (error) {
    logger?.warn?.("Failed to load player profile; using defaults", { playerId, error });
  }
  return { id: playerId, name: playerId, avatar: DEFAULT_AVATAR };
}
