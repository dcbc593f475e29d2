/**
 * Sequencers
 *
 * A sequencer takes ownership of a card collection and produces its cards one
 * at a time under a named strategy. Sequencers are single-use: once `next()`
 * returns undefined the sequence is exhausted for good. Exhaustion is the normal
 * end of a sequence, not an error.
 */

// =============================================================================
// Types
// =============================================================================

export const STRATEGY_NAMES = ["linear", "shuffle", "reverse"] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

/**
 * Lazy, finite, single-use production of cards.
 */
export interface Sequencer<T> {
  readonly strategy: StrategyName;
  /** Cards not yet produced */
  readonly remaining: number;
  readonly exhausted: boolean;
  /** Produces the next card, or undefined once every card has been produced. */
  next(): T | undefined;
}

/**
 * Creates a fresh sequencer over a card collection.
 * The session holds one of these so it can start over without knowing the strategy.
 */
export type SequencerFactory<T> = (cards: readonly T[]) => Sequencer<T>;

export interface SequencerOptions {
  /** Random source in [0, 1) for the shuffle strategy (default: Math.random) */
  random?: () => number;
}

// =============================================================================
// Strategies
// =============================================================================

/**
 * Yields cards in their original order.
 */
export class LinearSequencer<T> implements Sequencer<T> {
  readonly strategy: StrategyName = "linear";
  private readonly cards: readonly T[];
  private position = 0;

  constructor(cards: readonly T[]) {
    this.cards = [...cards];
  }

  get remaining(): number {
    return this.cards.length - this.position;
  }

  get exhausted(): boolean {
    return this.remaining === 0;
  }

  next(): T | undefined {
    if (this.exhausted) {
      return undefined;
    }
    const card = this.cards[this.position];
    this.position++;
    return card;
  }
}

/**
 * Yields cards last to first.
 */
export class ReverseSequencer<T> implements Sequencer<T> {
  readonly strategy: StrategyName = "reverse";
  private readonly cards: readonly T[];
  private position: number;

  constructor(cards: readonly T[]) {
    this.cards = [...cards];
    this.position = this.cards.length;
  }

  get remaining(): number {
    return this.position;
  }

  get exhausted(): boolean {
    return this.position === 0;
  }

  next(): T | undefined {
    if (this.exhausted) {
      return undefined;
    }
    this.position--;
    return this.cards[this.position];
  }
}

/**
 * Each call picks uniformly among the cards not yet produced.
 */
export class ShuffleSequencer<T> implements Sequencer<T> {
  readonly strategy: StrategyName = "shuffle";
  private readonly pool: T[];
  private readonly random: () => number;

  constructor(cards: readonly T[], random: () => number = Math.random) {
    this.pool = [...cards];
    this.random = random;
  }

  get remaining(): number {
    return this.pool.length;
  }

  get exhausted(): boolean {
    return this.pool.length === 0;
  }

  next(): T | undefined {
    if (this.exhausted) {
      return undefined;
    }
    // Clamp so a random source returning exactly 1 still lands on the last card
    const index = Math.min(Math.floor(this.random() * this.pool.length), this.pool.length - 1);
    const [card] = this.pool.splice(index, 1);
    return card;
  }
}

// =============================================================================
// Registry
// =============================================================================

export function isStrategyName(value: string): value is StrategyName {
  return (STRATEGY_NAMES as readonly string[]).includes(value);
}

/**
 * Creates a sequencer for the named strategy.
 */
export function createSequencer<T>(
  strategy: StrategyName,
  cards: readonly T[],
  options: SequencerOptions = {}
): Sequencer<T> {
  switch (strategy) {
    case "linear":
      return new LinearSequencer(cards);
    case "reverse":
      return new ReverseSequencer(cards);
    case "shuffle":
      return new ShuffleSequencer(cards, options.random);
  }
}

/**
 * Binds a strategy into a factory the session can call on every (re)start.
 */
export function sequencerFactory<T>(
  strategy: StrategyName,
  options: SequencerOptions = {}
): SequencerFactory<T> {
  return (cards) => createSequencer(strategy, cards, options);
}
