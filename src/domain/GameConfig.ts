export interface GameConfig {
  readonly minPlayers: number;
  readonly defaultMaxPlayers: number;
  readonly roundDurationSeconds: number;
  readonly maxErrors: number;
  readonly errorProgressPenalty: number;
  readonly reconnectGraceMs: number;
  readonly roomDrainDelayMs: number;
  readonly phraseLoadLimit: number;
}

export type GameConfigOverrides = Partial<GameConfig>;

export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  return {
    minPlayers: overrides.minPlayers ?? 2,
    defaultMaxPlayers: overrides.defaultMaxPlayers ?? 10,
    roundDurationSeconds: overrides.roundDurationSeconds ?? 45,
    maxErrors: overrides.maxErrors ?? 3,
    errorProgressPenalty: overrides.errorProgressPenalty ?? 10,
    reconnectGraceMs: overrides.reconnectGraceMs ?? 25_000,
    roomDrainDelayMs: overrides.roomDrainDelayMs ?? 30_000,
    phraseLoadLimit: overrides.phraseLoadLimit ?? 100,
  };
}
