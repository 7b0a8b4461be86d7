import { describe, expect, it } from "vitest";

import { GraceExpired } from "../src/domain/commands/GraceExpired.js";
import { PlayerDisconnected } from "../src/domain/commands/PlayerDisconnected.js";
import { ReconnectPlayer } from "../src/domain/commands/ReconnectPlayer.js";
import { PlayerNotInRoomError, RoomNotFoundError } from "../src/domain/errors/index.js";
import {
  createCommandContext,
  findPlayer,
  seedRoom,
  startRoundDirectly,
} from "./support/mocks.js";

describe("PlayerDisconnected command", () => {
  it("marks the player as gone and opens the grace window", async () => {
    const context = createCommandContext();
    const room = seedRoom(context, ["ana", "bea"]);
    startRoundDirectly(room, 0);
    const bea = findPlayer(room, "bea");
    bea.progress = 40;

    await new PlayerDisconnected(room.id, "bea", 1_000).execute(context);

    expect(bea).toMatchObject({ connected: false, status: "playing", progress: 40, graceToken: 1 });
    const [key, command, delayMs] = context.scheduler.schedule.mock.calls[0] ?? [];
    expect(key).toBe("grace:room-1:bea");
    expect(delayMs).toBe(25_000);
    expect(command).toBeInstanceOf(GraceExpired);
    expect(command).toMatchObject({ playerId: "bea", graceToken: 1, at: 26_000 });
    expect(context.bus.types()).toEqual(["room_state"]);
  });

  it("ignores players that are already disconnected", async () => {
    const context = createCommandContext();
    const room = seedRoom(context, ["ana", "bea"]);
    findPlayer(room, "bea").connected = false;

    await new PlayerDisconnected(room.id, "bea", 1_000).execute(context);

    expect(context.scheduler.schedule).not.toHaveBeenCalled();
    expect(context.bus.published).toEqual([]);
  });
});

describe("ReconnectPlayer command", () => {
  it("restores the connection and cancels the grace timer", async () => {
    const context = createCommandContext();
    const room = seedRoom(context, ["ana", "bea"]);
    startRoundDirectly(room, 0);
    await new PlayerDisconnected(room.id, "bea", 1_000).execute(context);
    context.bus.clear();

    await new ReconnectPlayer(room.id, "bea", 5_000).execute(context);

    const bea = findPlayer(room, "bea");
    expect(bea).toMatchObject({ connected: true, status: "playing", graceToken: 2 });
    expect(context.scheduler.cancel).toHaveBeenCalledWith("grace:room-1:bea");
    expect(context.bus.types()).toEqual(["room_state"]);
  });

  it("does nothing for a player who never left", async () => {
    const context = createCommandContext();
    const room = seedRoom(context, ["ana", "bea"]);

    await new ReconnectPlayer(room.id, "bea", 5_000).execute(context);

    expect(findPlayer(room, "bea").graceToken).toBe(0);
    expect(context.bus.published).toEqual([]);
  });

  it("rejects unknown rooms and players", async () => {
    const context = createCommandContext();
    const room = seedRoom(context, ["ana", "bea"]);

    await expect(new ReconnectPlayer("room-404", "ana", 0).execute(context)).rejects.toBeInstanceOf(
      RoomNotFoundError,
    );
    await expect(new ReconnectPlayer(room.id, "zoe", 0).execute(context)).rejects.toBeInstanceOf(
      PlayerNotInRoomError,
    );
  });
});

describe("GraceExpired command", () => {
  it("removes the player and hands the host role to the next one", async () => {
    const context = createCommandContext();
    const room = seedRoom(context, ["ana", "bea", "cid"]);
    await new PlayerDisconnected(room.id, "ana", 0).execute(context);
    context.bus.clear();

    await new GraceExpired(room.id, "ana", 1, 25_000).execute(context);

    expect(room.players.map((player) => player.id)).toEqual(["bea", "cid"]);
    expect(room.hostId).toBe("bea");
    expect(context.bus.published.map(({ message }) => message.type)).toEqual([
      "host_changed",
      "player_left",
      "room_state",
    ]);
    expect(context.bus.ofType("host_changed")[0]?.hostId).toBe("bea");
    expect(context.bus.ofType("player_left")[0]?.playerId).toBe("ana");
  });

  it("is stale once the player came back", async () => {
    const context = createCommandContext();
    const room = seedRoom(context, ["ana", "bea"]);
    await new PlayerDisconnected(room.id, "bea", 0).execute(context);
    await new ReconnectPlayer(room.id, "bea", 1_000).execute(context);
    context.bus.clear();

    await new GraceExpired(room.id, "bea", 1, 25_000).execute(context);

    expect(room.players).toHaveLength(2);
    expect(context.bus.published).toEqual([]);
  });

  it("is stale after a newer disconnect", async () => {
    const context = createCommandContext();
    const room = seedRoom(context, ["ana", "bea"]);
    await new PlayerDisconnected(room.id, "bea", 0).execute(context);
    await new ReconnectPlayer(room.id, "bea", 1_000).execute(context);
    await new PlayerDisconnected(room.id, "bea", 2_000).execute(context);

    await new GraceExpired(room.id, "bea", 1, 25_000).execute(context);
    expect(room.players).toHaveLength(2);

    await new GraceExpired(room.id, "bea", 3, 27_000).execute(context);
    expect(room.players.map((player) => player.id)).toEqual(["ana"]);
  });

  it("deletes the room when the last player is gone", async () => {
    const context = createCommandContext();
    const room = seedRoom(context, ["ana"]);
    await new PlayerDisconnected(room.id, "ana", 0).execute(context);
    context.bus.clear();

    await new GraceExpired(room.id, "ana", 1, 25_000).execute(context);

    expect(context.rooms.findById(room.id)).toBeUndefined();
    expect(context.bus.published.map(({ message }) => message)).toEqual([
      { type: "room_deleted", roomId: room.id },
    ]);
    expect(context.bus.closed).toEqual([room.id]);
    expect(context.persistence.deleteRoom).toHaveBeenCalledWith(room.id);
    expect(room.timerGeneration).toBe(1);
  });

  it("settles the round when the removed player was the last one typing", async () => {
    const context = createCommandContext();
    const room = seedRoom(context, ["ana", "bea"]);
    startRoundDirectly(room, 0);
    const ana = findPlayer(room, "ana");
    ana.status = "completed";
    ana.wpm = 42;
    await new PlayerDisconnected(room.id, "bea", 1_000).execute(context);
    context.bus.clear();

    await new GraceExpired(room.id, "bea", 1, 26_000).execute(context);

    expect(room.status).toBe("finished");
    expect(context.bus.types()).toEqual(["player_left", "round_finished"]);
    expect(context.bus.ofType("round_finished")[0]?.winnerId).toBe("ana");
  });
});
