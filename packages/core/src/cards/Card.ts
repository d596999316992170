import { InvalidInputError } from '../errors.js';

/**
 * Card ranks: 2-14 where 11=Jack, 12=Queen, 13=King, 14=Ace
 */
export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14;

/**
 * Card suits
 */
export type Suit = 'h' | 'd' | 'c' | 's';

/**
 * String notation for a card, e.g., "Ah", "Kd", "7c"
 */
export type CardNotation = string;

export const RANKS: readonly Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14] as const;
export const SUITS: readonly Suit[] = ['h', 'd', 'c', 's'] as const;

const RANK_CHARS: Record<Rank, string> = {
  2: '2', 3: '3', 4: '4', 5: '5', 6: '6', 7: '7', 8: '8', 9: '9', 10: 'T',
  11: 'J', 12: 'Q', 13: 'K', 14: 'A'
};

const CHAR_TO_RANK: Record<string, Rank> = {
  '2': 2, '3': 3, '4': 4, '5': 5, '6': 6, '7': 7, '8': 8, '9': 9, 'T': 10, '10': 10,
  'J': 11, 'Q': 12, 'K': 13, 'A': 14,
  'j': 11, 'q': 12, 'k': 13, 'a': 14, 't': 10
};

const SUIT_NAMES: Record<Suit, string> = {
  'h': 'hearts', 'd': 'diamonds', 'c': 'clubs', 's': 'spades'
};

const SUIT_SYMBOLS: Record<Suit, string> = {
  'h': '♥', 'd': '♦', 'c': '♣', 's': '♠'
};

const RANK_NAMES: Record<Rank, string> = {
  2: 'Two', 3: 'Three', 4: 'Four', 5: 'Five', 6: 'Six', 7: 'Seven', 8: 'Eight',
  9: 'Nine', 10: 'Ten', 11: 'Jack', 12: 'Queen', 13: 'King', 14: 'Ace'
};

export function isSuit(value: string): value is Suit {
  return value === 'h' || value === 'd' || value === 'c' || value === 's';
}

export function isRank(value: number): value is Rank {
  return Number.isInteger(value) && value >= 2 && value <= 14;
}

/** Parse a single rank character ("A", "T", "10", "7") */
export function parseRank(value: string): Rank | undefined {
  return CHAR_TO_RANK[value];
}

export function rankName(rank: Rank): string {
  return RANK_NAMES[rank];
}

/**
 * Immutable representation of a playing card.
 * Equality is by rank and suit, carried by a compact integer key.
 */
export class Card {
  /** Compact encoding: rank in low bits, suit index in high bits */
  readonly key: number;

  private constructor(readonly rank: Rank, readonly suit: Suit) {
    this.key = (SUITS.indexOf(suit) << 4) | rank;
  }

  /** Create a card from rank and suit */
  static create(rank: Rank, suit: Suit): Card {
    return new Card(rank, suit);
  }

  /** Parse card from string notation like "Ah", "Kd", "7c" */
  static parse(notation: CardNotation): Card {
    if (notation.length < 2 || notation.length > 3) {
      throw new InvalidInputError(`Invalid card notation: ${notation}`);
    }

    const suitChar = notation.slice(-1).toLowerCase();
    const rank = parseRank(notation.slice(0, -1));
    if (rank === undefined) {
      throw new InvalidInputError(`Invalid rank in notation: ${notation}`);
    }

    if (!isSuit(suitChar)) {
      throw new InvalidInputError(`Invalid suit in notation: ${notation}`);
    }

    return Card.create(rank, suitChar);
  }

  /** Parse multiple cards from space or comma separated string */
  static parseMany(notation: string): Card[] {
    return notation
      .split(/[\s,]+/)
      .filter(s => s.length > 0)
      .map(s => Card.parse(s));
  }

  /** String representation like "Ah", "Kd" */
  toString(): CardNotation {
    return `${RANK_CHARS[this.rank]}${this.suit}`;
  }

  /** Display form with a suit symbol, like "A♠" */
  toSymbolString(): string {
    return `${RANK_CHARS[this.rank]}${SUIT_SYMBOLS[this.suit]}`;
  }

  /** Human-readable format like "Ace of hearts" */
  toFullString(): string {
    return `${RANK_NAMES[this.rank]} of ${SUIT_NAMES[this.suit]}`;
  }

  /** Check if same card (rank and suit) */
  equals(other: Card): boolean {
    return this.key === other.key;
  }
}

/** Sort cards by rank (descending) */
export function sortByRankDesc(cards: readonly Card[]): Card[] {
  return [...cards].sort((a, b) => b.rank - a.rank);
}

/** Group cards by suit */
export function groupBySuit(cards: readonly Card[]): Map<Suit, Card[]> {
  const groups = new Map<Suit, Card[]>();
  for (const card of cards) {
    const existing = groups.get(card.suit) || [];
    existing.push(card);
    groups.set(card.suit, existing);
  }
  return groups;
}

/** Set of card keys, for membership tests that ignore object identity */
export function cardKeys(cards: readonly Card[]): Set<number> {
  return new Set(cards.map(c => c.key));
}

/** Throw if the same rank and suit appears twice */
export function assertDistinct(cards: readonly Card[], label: string = 'cards'): void {
  const keys = cardKeys(cards);
  if (keys.size !== cards.length) {
    throw new InvalidInputError(`Duplicate card in ${label}: ${cards.map(c => c.toString()).join(' ')}`);
  }
}

export function formatCards(cards: readonly Card[], separator: string = ' '): string {
  return cards.map(c => c.toString()).join(separator);
}
