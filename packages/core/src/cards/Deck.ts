import { Card, RANKS, SUITS, cardKeys } from './Card.js';
import { InvalidInputError } from '../errors.js';
import { type Rng, createRng } from '../random/rng.js';

/**
 * A deck of distinct cards with shuffle and deal operations.
 * Each simulation trial builds and exclusively owns one.
 */
export class Deck {
  private cards: Card[];
  private position: number = 0;
  private rng: Rng;

  private constructor(cards: Card[], rng: Rng) {
    this.cards = cards;
    this.rng = rng;
  }

  /** Create a new standard 52-card deck */
  static standard(rng: Rng = Math.random): Deck {
    return new Deck(standardCards(), rng);
  }

  /** Create a standard deck driven by an optional seed */
  static seeded(seed?: number): Deck {
    return Deck.standard(createRng(seed));
  }

  /** Create deck from specific cards (for testing) */
  static fromCards(cards: readonly Card[], rng: Rng = Math.random): Deck {
    return new Deck([...cards], rng);
  }

  /** Number of cards remaining in the deck */
  get remaining(): number {
    return this.cards.length - this.position;
  }

  /** Total cards in deck (including dealt) */
  get size(): number {
    return this.cards.length;
  }

  /** Shuffle the deck using Fisher-Yates algorithm */
  shuffle(): this {
    this.position = 0;
    const arr = this.cards;
    for (let i = arr.length - 1; i > 0; i--) {
      const j = Math.floor(this.rng() * (i + 1));
      [arr[i], arr[j]] = [arr[j], arr[i]];
    }
    return this;
  }

  /** Deal one card from the deck */
  deal(): Card {
    if (this.position >= this.cards.length) {
      throw new InvalidInputError('No cards remaining in deck');
    }
    return this.cards[this.position++];
  }

  /** Deal multiple cards */
  dealMany(count: number): Card[] {
    if (count > this.remaining) {
      throw new InvalidInputError(`Cannot deal ${count} cards, ${this.remaining} remaining`);
    }
    const dealt = this.cards.slice(this.position, this.position + count);
    this.position += count;
    return dealt;
  }

  /** Remove specific cards from deck (for simulating known hands) */
  remove(cards: readonly Card[]): this {
    this.cards = removeKnown(this.cards, cards);
    this.position = 0;
    return this;
  }

  /** Get all remaining cards without dealing them */
  peekRemaining(): Card[] {
    return this.cards.slice(this.position);
  }
}

const STANDARD_CARDS: readonly Card[] = SUITS.flatMap(suit => RANKS.map(rank => Card.create(rank, suit)));

/** The 52 distinct cards in suit-major order (instances are shared) */
export function standardCards(): Card[] {
  return [...STANDARD_CARDS];
}

/** Cards of `deck` that are not in `known`, compared by rank and suit */
export function removeKnown(deck: readonly Card[], known: readonly Card[]): Card[] {
  const exclude = cardKeys(known);
  return deck.filter(c => !exclude.has(c.key));
}

/** A fresh 52-card deck minus `known`, shuffled with `rng` */
export function freshShuffledDeck(rng: Rng, known: readonly Card[] = []): Deck {
  return Deck.standard(rng).remove(known).shuffle();
}
