/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { Command, CommandContext, Logger, Scheduler, TimerKey } from "../core.js";
import { dispatchCommand } from "../core.js";

type DispatchScheduled = (command: Command, context: CommandContext) => Promise<void>;

interface RealSchedulerOptions {
  readonly dispatch?: DispatchScheduled;
  readonly contextFactory: () => Promise<CommandContext>;
  readonly logger?: Logger;
  readonly now?: () => number;
}

interface Entry {
  readonly key: TimerKey;
  readonly command: Command;
  readonly fireAt: number;
  readonly seq: number;
}

function before(a: Entry, b: Entry): boolean {
  return a.fireAt < b.fireAt || (a.fireAt === b.fireAt && a.seq < b.seq);
}

/**
 * Wall-clock scheduler shared by every room. Pending commands sit in a binary
 * min-heap ordered by fire time and a single Node timer is armed for the
 * earliest one. Cancelled or replaced entries stay in the heap and are skipped
 * when they reach the top.
 */
export class RealScheduler implements Scheduler {
  #heap: Entry[] = [];
  #live: Map<TimerKey, Entry> = new Map();
  #timer: ReturnType<typeof setTimeout> | undefined;
  #armedFor: number | undefined;
  #seq = 0;
  readonly #dispatch: DispatchScheduled;
  readonly #contextFactory: RealSchedulerOptions["contextFactory"];
  readonly #logger: Logger | undefined;
  readonly #now: () => number;

  constructor(options: RealSchedulerOptions) {
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#contextFactory = options.contextFactory;
    this.#logger = options.logger;
    this.#now = options.now ?? Date.now;
  }

  get pending(): number {
    return this.#live.size;
  }

  async schedule(key: TimerKey, command: Command, delayMs: number): Promise<void> {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    if (this.#live.has(key)) {
      this.#logger?.debug?.("Rescheduling timer", { key, delayMs });
    }

    const entry: Entry = { key, command, fireAt: this.#now() + delayMs, seq: this.#seq++ };
    this.#live.set(key, entry);
    this.#push(entry);
    this.#arm();

    this.#logger?.debug?.("Timer scheduled", { key, type: command.type, delayMs });
  }

  async cancel(key: TimerKey): Promise<void> {
    if (this.#live.delete(key)) {
      this.#arm();
    }
  }

  /** Stops the shared timer and forgets every pending command. */
  stop(): void {
    if (this.#timer !== undefined) clearTimeout(this.#timer);
    this.#timer = undefined;
    this.#armedFor = undefined;
    this.#heap = [];
    this.#live.clear();
  }

  #arm(): void {
    this.#discardStaleTop();
    const head = this.#heap[0];

    if (!head) {
      if (this.#timer !== undefined) clearTimeout(this.#timer);
      this.#timer = undefined;
      this.#armedFor = undefined;
      return;
    }

    if (this.#timer !== undefined && this.#armedFor === head.fireAt) {
      return;
    }

    if (this.#timer !== undefined) clearTimeout(this.#timer);
    this.#armedFor = head.fireAt;
    this.#timer = setTimeout(() => {
      this.#fire();
    }, Math.max(0, head.fireAt - this.#now()));
  }

  #fire(): void {
    this.#timer = undefined;
    this.#armedFor = undefined;

    const now = this.#now();
    const due: Entry[] = [];
    for (let head = this.#heap[0]; head && head.fireAt <= now; head = this.#heap[0]) {
      this.#pop();
      if (this.#live.get(head.key) === head) {
        this.#live.delete(head.key);
        due.push(head);
      }
    }

    this.#arm();

    // Rooms due at the same instant must not wait on one another.
    for (const entry of due) {
      void this.#run(entry);
    }
  }

  async #run(entry: Entry): Promise<void> {
    try {
      const context = await this.#contextFactory();
      await this.#dispatch(entry.command, context);
    } catch (error) {
      this.#logger?.error?.("Failed to dispatch scheduled command", {
        key: entry.key,
        type: entry.command.type,
        error,
      });
    }
  }

  #discardStaleTop(): void {
    for (let head = this.#heap[0]; head && this.#live.get(head.key) !== head; head = this.#heap[0]) {
      this.#pop();
    }
  }

  #push(entry: Entry): void {
    const heap = this.#heap;
    heap.push(entry);
    let index = heap.length - 1;
    while (index > 0) {
      const parentIndex = (index - 1) >> 1;
      const parent = heap[parentIndex];
      if (!parent || !before(entry, parent)) break;
      heap[index] = parent;
      index = parentIndex;
    }
    heap[index] = entry;
  }

  #pop(): Entry | undefined {
    const heap = this.#heap;
    const top = heap[0];
    const last = heap.pop();
    if (!top || !last || heap.length === 0) return top;

    let index = 0;
    for (;;) {
      const leftIndex = index * 2 + 1;
      const rightIndex = leftIndex + 1;
      const left = heap[leftIndex];
      const right = heap[rightIndex];
      let smallest = last;
      let smallestIndex = -1;

      if (left && before(left, smallest)) {
        smallest = left;
        smallestIndex = leftIndex;
      }
      if (right && before(right, smallest)) {
        smallest = right;
        smallestIndex = rightIndex;
      }
      if (smallestIndex === -1) break;

      heap[index] = smallest;
      index = smallestIndex;
    }
    heap[index] = last;
    return top;
  }
}
