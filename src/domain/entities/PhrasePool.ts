import { FALLBACK_PHRASES } from "./fallbackPhrases.js";
import type { Logger } from "../ports/Logger.js";
import type { PersistenceGateway, Phrase } from "../ports/PersistenceGateway.js";

/** Immutable set of candidate phrases with uniform random selection. */
export class PhrasePool {
  readonly #phrases: readonly Phrase[];

  constructor(phrases: readonly Phrase[]) {
    if (phrases.length === 0) {
      throw new Error("Phrase pool needs at least one phrase");
    }
    this.#phrases = [...phrases];
  }

  /**
   * Stored phrases first, then the fallback ones. Texts are trimmed, empty
   * texts dropped and duplicates (by trimmed text) kept only once.
   */
  static merge(
    stored: readonly Phrase[],
    fallback: readonly Phrase[] = FALLBACK_PHRASES,
  ): PhrasePool {
    const seen = new Set<string>();
    const merged: Phrase[] = [];

    for (const phrase of [...stored, ...fallback]) {
      const text = phrase.text.trim();
      if (text.length === 0 || seen.has(text)) continue;
      seen.add(text);
      merged.push({ ...phrase, text });
    }

    return new PhrasePool(merged);
  }

  static async load(
    persistence: Pick<PersistenceGateway, "getPhrases">,
    limit: number,
    logger?: Logger,
  ): Promise<PhrasePool> {
    let stored: Phrase[] = [];
    try {
      stored = await persistence.getPhrases(limit);
    } catch (error) {
      logger?.warn?.("Failed to load stored phrases; using fallback list", { error });
    }

    const pool = PhrasePool.merge(stored);
    logger?.info?.("Phrase pool loaded", { stored: stored.length, total: pool.size });
    return pool;
  }

  get size(): number {
    return this.#phrases.length;
  }

  all(): readonly Phrase[] {
    return this.#phrases;
  }

  pick(random: () => number = Math.random): Phrase {
    const index = Math.min(Math.floor(random() * this.#phrases.length), this.#phrases.length - 1);
    const phrase = this.#phrases[index];
    if (!phrase) {
      throw new Error("Phrase pool is empty");
    }
    return phrase;
  }
}
