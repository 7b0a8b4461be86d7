import type { PlayerProfile } from "../ports/PersistenceGateway.js";
import type { PlayerId } from "../typedefs.js";

const WHITESPACE_PATTERN = /\s/;

export function isValidPlayerId(id: unknown): id is PlayerId {
  return typeof id === "string" && id.length > 0 && !WHITESPACE_PATTERN.test(id);
}

export function validateProfile(profile: PlayerProfile, role: string): string[] {
  const issues: string[] = [];

  if (!isValidPlayerId(profile.id)) {
    issues.push(`${role} identifier must be a non-empty string without whitespace`);
  }

  if (typeof profile.name !== "string" || profile.name.trim().length === 0) {
    issues.push(`${role} name must be a non-empty string`);
  }

  return issues;
}
