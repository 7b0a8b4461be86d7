/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { Command } from "../../domain/commands/Command.js";
import type { Scheduler, TimerKey } from "../../domain/ports/Scheduler.js";
import type { TimePoint } from "../../domain/typedefs.js";

/**
 * Deterministic in-memory scheduler used exclusively in tests.
 *
 * Instead of relying on {@link setTimeout}, the scheduler records queued commands and exposes a
 * {@link runFor} helper that advances the virtual clock (in milliseconds). This makes it possible
 * for tests to control timer progression without depending on real time or fake timers.
 */
interface QueuedCommand {
  readonly key: TimerKey;
  readonly fireAt: TimePoint;
  readonly command: Command;
}

interface SchedulerState {
  readonly now: TimePoint;
  readonly queue: readonly QueuedCommand[];
}

export class InMemoryScheduler implements Scheduler {
  readonly #dispatch: (command: Command) => Promise<void> | void;
  #state: SchedulerState = { now: 0, queue: [] };

  constructor(dispatch: (command: Command) => Promise<void> | void) {
    this.#dispatch = dispatch;
  }

  get now(): TimePoint {
    return this.#state.now;
  }

  async schedule(key: TimerKey, command: Command, delayMs: number): Promise<void> {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    const entry: QueuedCommand = { key, fireAt: this.#state.now + delayMs, command };
    const remaining = this.#state.queue.filter((existing) => existing.key !== key);
    const insertAt = remaining.findIndex((existing) => existing.fireAt > entry.fireAt);
    const queue =
      insertAt === -1
        ? [...remaining, entry]
        : [...remaining.slice(0, insertAt), entry, ...remaining.slice(insertAt)];

    this.#state = { ...this.#state, queue };
  }

  async cancel(key: TimerKey): Promise<void> {
    const queue = this.#state.queue.filter((existing) => existing.key !== key);
    this.#state = { ...this.#state, queue };
  }

  isPending(key: TimerKey): boolean {
    return this.#state.queue.some((existing) => existing.key === key);
  }

  pendingKeys(): TimerKey[] {
    return this.#state.queue.map((existing) => existing.key);
  }

  async runFor(milliseconds: number): Promise<void> {
    if (milliseconds < 0) {
      throw new Error("Cannot run scheduler backwards in time");
    }

    const targetTime = this.#state.now + milliseconds;
    let state = this.#state;

    while (state.queue.length > 0) {
      const [next, ...remaining] = state.queue;
      if (!next) {
        break;
      }
      if (next.fireAt > targetTime) {
        break;
      }

      state = { now: next.fireAt, queue: remaining };
      this.#state = state;
      await this.#dispatch(next.command);
      state = this.#state;
    }

    this.#state = { now: targetTime, queue: state.queue };
  }
}
