import { describe, expect, it } from "vitest";

import { createPlayer } from "../../src/domain/entities/PlayerRules.js";
import {
  assertValidRoom,
  computeWpm,
  evaluateTermination,
  matchesPhrase,
  pickCompletionWinner,
  pickProgressWinner,
  wordCount,
  type RoomShape,
} from "../../src/domain/entities/RoundRules.js";
import { InvalidRoomStateError } from "../../src/domain/errors/InvalidRoomStateError.js";
import type { Player } from "../../src/domain/ports/RoomRegistry.js";
import type { PlayerStatus } from "../../src/domain/typedefs.js";
import { TEST_PHRASE, profile } from "../support/mocks.js";

function player(id: string, status: PlayerStatus, fields: Partial<Player> = {}): Player {
  return { ...createPlayer(profile(id)), status, ...fields };
}

describe("phrase matching", () => {
  it("counts whitespace separated words", () => {
    expect(wordCount("La sombra avanzaba sin ruido")).toBe(5);
    expect(wordCount("  uno   dos\tTres\n")).toBe(3);
    expect(wordCount("   ")).toBe(0);
  });

  it("compares trimmed text case-sensitively", () => {
    expect(matchesPhrase("  La sombra avanzaba sin ruido ", TEST_PHRASE.text)).toBe(true);
    expect(matchesPhrase("la sombra avanzaba sin ruido", TEST_PHRASE.text)).toBe(false);
    expect(matchesPhrase("La sombra  avanzaba sin ruido", TEST_PHRASE.text)).toBe(false);
  });

  it("computes words per minute from elapsed seconds", () => {
    expect(computeWpm(5, 10)).toBe(30);
    expect(computeWpm(6, 12)).toBe(30);
    expect(computeWpm(5, 0)).toBe(0);
  });
});

describe("pickCompletionWinner", () => {
  it("prefers the highest wpm", () => {
    const players = [
      player("a", "completed", { wpm: 40, completedAt: 5 }),
      player("b", "completed", { wpm: 55, completedAt: 9 }),
      player("c", "eliminated"),
    ];
    expect(pickCompletionWinner(players)).toBe("b");
  });

  it("breaks wpm ties by earlier completion", () => {
    const players = [
      player("a", "completed", { wpm: 40, completedAt: 9 }),
      player("b", "completed", { wpm: 40, completedAt: 5 }),
    ];
    expect(pickCompletionWinner(players)).toBe("b");
  });

  it("returns undefined when nobody completed", () => {
    expect(pickCompletionWinner([player("a", "eliminated")])).toBeUndefined();
  });
});

describe("pickProgressWinner", () => {
  it("picks the participant with most progress, then speed", () => {
    const players = [
      player("a", "eliminated", { progress: 40 }),
      player("b", "eliminated", { progress: 60, wpm: 10 }),
      player("c", "eliminated", { progress: 60, wpm: 20 }),
    ];
    expect(pickProgressWinner(players)).toBe("c");
  });

  it("skips spectators and players without progress", () => {
    const players = [
      player("a", "connected", { progress: 90 }),
      player("b", "eliminated"),
    ];
    expect(pickProgressWinner(players)).toBeUndefined();
  });
});

describe("evaluateTermination", () => {
  it("keeps the round running while several players are playing", () => {
    expect(evaluateTermination([player("a", "playing"), player("b", "playing")])).toEqual({
      finished: false,
    });
  });

  it("finishes once every participant is terminal", () => {
    const verdict = evaluateTermination([
      player("a", "completed", { wpm: 30, completedAt: 10 }),
      player("b", "eliminated"),
      player("c", "connected"),
    ]);
    expect(verdict).toEqual({ finished: true, winnerId: "a", reason: "all_terminal" });
  });

  it("finishes without a winner when everyone was eliminated", () => {
    const verdict = evaluateTermination([player("a", "eliminated"), player("b", "eliminated")]);
    expect(verdict).toEqual({ finished: true, winnerId: undefined, reason: "all_terminal" });
  });

  it("awards the last player standing when nobody completed", () => {
    const verdict = evaluateTermination([player("a", "eliminated"), player("b", "playing")]);
    expect(verdict).toEqual({ finished: true, winnerId: "b", reason: "last_standing" });
  });

  it("lets the last player keep going once someone completed", () => {
    const verdict = evaluateTermination([
      player("a", "completed", { wpm: 30 }),
      player("b", "eliminated"),
      player("c", "playing"),
    ]);
    expect(verdict).toEqual({ finished: false });
  });

  it("does not end a solo round early", () => {
    expect(evaluateTermination([player("a", "playing")])).toEqual({ finished: false });
  });
});

describe("assertValidRoom", () => {
  const base: RoomShape = {
    code: "ABC123",
    players: [{ id: "a" }, { id: "b" }],
    hostId: "a",
    maxPlayers: 4,
    status: "waiting",
    currentPhrase: null,
    roundStartedAt: null,
  };

  function reasonFor(room: RoomShape): string | undefined {
    try {
      assertValidRoom(room);
      return undefined;
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidRoomStateError);
      return error instanceof InvalidRoomStateError ? error.reason : undefined;
    }
  }

  it("accepts a consistent waiting room", () => {
    expect(() => assertValidRoom(base)).not.toThrow();
  });

  it("accepts a playing room with phrase and start time", () => {
    expect(() =>
      assertValidRoom({ ...base, status: "playing", currentPhrase: TEST_PHRASE, roundStartedAt: 1 }),
    ).not.toThrow();
  });

  it("reports the broken invariant", () => {
    expect(reasonFor({ ...base, code: "abc123" })).toBe("invalid join code");
    expect(reasonFor({ ...base, players: [{ id: "a" }, { id: "a" }] })).toBe("duplicate player IDs");
    expect(reasonFor({ ...base, maxPlayers: 1 })).toBe("more players than maxPlayers");
    expect(reasonFor({ ...base, hostId: "z" })).toBe("host not in player list");
    expect(reasonFor({ ...base, status: "playing" })).toBe(
      "playing room without phrase or start time",
    );
    expect(reasonFor({ ...base, status: "finished", roundStartedAt: 5 })).toBe(
      "phrase or start time set outside a round",
    );
  });
});
