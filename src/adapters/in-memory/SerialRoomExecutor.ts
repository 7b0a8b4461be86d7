/* eslint-disable functional/immutable-data */
import type { RoomExecutor } from "../../domain/ports/RoomExecutor.js";

/**
 * Promise-chain executor: each key keeps the tail of its queue, and a task
 * starts once the previous one for the same key has settled (whether it
 * succeeded or failed). Idle keys are forgotten.
 */
export class SerialRoomExecutor implements RoomExecutor {
  readonly #tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.#tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );

    this.#tails.set(key, tail);
    void tail.then(() => {
      if (this.#tails.get(key) === tail) {
        this.#tails.delete(key);
      }
    });

    return result;
  }

  /** Number of keys with queued or running work. */
  get activeKeys(): number {
    return this.#tails.size;
  }
}
