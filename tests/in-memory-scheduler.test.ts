import { describe, it, expect } from "vitest";

import { InMemoryScheduler } from "../src/adapters/in-memory/InMemoryScheduler.js";
import type { Command } from "../src/domain/commands/Command.js";
import { RoundTimeout } from "../src/domain/commands/RoundTimeout.js";
import { timerKeys } from "../src/domain/ports/Scheduler.js";

describe("InMemoryScheduler", () => {
  it("dispatches commands once their delay elapses", async () => {
    const dispatched: Command[] = [];
    const scheduler = new InMemoryScheduler((command) => {
      dispatched.push(command);
    });

    await scheduler.schedule(timerKeys.round("room-1"), new RoundTimeout("room-1", 1, 2_000), 2_000);

    await scheduler.runFor(1_000);
    expect(dispatched).toEqual([]);
    expect(scheduler.isPending("round:room-1")).toBe(true);

    await scheduler.runFor(1_000);
    expect(dispatched).toHaveLength(1);
    expect(dispatched[0]?.type).toBe("RoundTimeout");
    expect(dispatched[0]?.at).toBe(2_000);
    expect(scheduler.now).toBe(2_000);
    expect(scheduler.pendingKeys()).toEqual([]);
  });

  it("delivers commands in the order they are due", async () => {
    const dispatched: number[] = [];
    const scheduler = new InMemoryScheduler((command) => {
      dispatched.push(command.at);
    });

    await scheduler.schedule(timerKeys.round("room-2"), new RoundTimeout("room-2", 1, 1_500), 1_500);
    await scheduler.schedule(timerKeys.round("room-1"), new RoundTimeout("room-1", 1, 500), 500);

    await scheduler.runFor(1_500);
    expect(dispatched).toEqual([500, 1_500]);
  });

  it("replaces a pending command scheduled under the same key", async () => {
    const dispatched: number[] = [];
    const scheduler = new InMemoryScheduler((command) => {
      dispatched.push(command.at);
    });

    await scheduler.schedule(timerKeys.drain("room-1"), new RoundTimeout("room-1", 1, 500), 500);
    await scheduler.schedule(timerKeys.drain("room-1"), new RoundTimeout("room-1", 2, 900), 900);

    expect(scheduler.pendingKeys()).toEqual(["drain:room-1"]);
    await scheduler.runFor(1_000);
    expect(dispatched).toEqual([900]);
  });

  it("forgets cancelled commands", async () => {
    const dispatched: Command[] = [];
    const scheduler = new InMemoryScheduler((command) => {
      dispatched.push(command);
    });

    await scheduler.schedule(timerKeys.grace("room-1", "ana"), new RoundTimeout("room-1", 1, 100), 100);
    await scheduler.cancel(timerKeys.grace("room-1", "ana"));

    await scheduler.runFor(500);
    expect(dispatched).toEqual([]);
  });

  it("processes follow-up commands scheduled during dispatch", async () => {
    const dispatched: string[] = [];
    const scheduler = new InMemoryScheduler(async (command) => {
      dispatched.push(`${command.type}-${command.at}`);
      await scheduler.schedule(
        timerKeys.round("room-1"),
        new RoundTimeout("room-1", 1, command.at + 500),
        500,
      );
    });

    await scheduler.schedule(timerKeys.round("room-1"), new RoundTimeout("room-1", 1, 1_000), 1_000);

    await scheduler.runFor(2_000);
    expect(dispatched).toEqual(["RoundTimeout-1000", "RoundTimeout-1500", "RoundTimeout-2000"]);
  });

  it("rejects negative delays", async () => {
    const scheduler = new InMemoryScheduler(() => undefined);
    await expect(
      scheduler.schedule("round:room-1", new RoundTimeout("room-1", 1, 0), -1),
    ).rejects.toThrow("Timeout delay must be non-negative");
  });
});
