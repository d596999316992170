import { type Card, type Rank, type Suit, groupBySuit, isRank, rankName } from '../cards/Card.js';
import { InvalidInputError, InvariantViolationError } from '../errors.js';
import { HandCategory, type EvaluatedHand } from './HandRank.js';

const ROYAL_RANKS: readonly Rank[] = [10, 11, 12, 13, 14];
const WHEEL_RANKS: readonly Rank[] = [14, 2, 3, 4, 5];

/**
 * Everything the category checks need, computed once per evaluation.
 * Rank lists are sorted descending.
 */
export interface HandAnalysis {
  /** Distinct ranks present */
  ranks: Rank[];
  /** Suit holding five or more cards, if any. Seven cards allow at most one. */
  flushSuit: Suit | null;
  /** Every rank of the flush suit */
  flushRanks: Rank[];
  /** Highest straight over all ranks, ignoring suits */
  straightHigh: Rank | null;
  quads: Rank[];
  triples: Rank[];
  pairs: Rank[];
  singles: Rank[];
}

export function analyzeCards(cards: readonly Card[]): HandAnalysis {
  let flushSuit: Suit | null = null;
  let flushRanks: Rank[] = [];
  for (const [suit, suited] of groupBySuit(cards)) {
    if (suited.length >= 5) {
      flushSuit = suit;
      flushRanks = suited.map(c => c.rank).sort(descending);
    }
  }

  const counts = new Map<Rank, number>();
  for (const card of cards) {
    counts.set(card.rank, (counts.get(card.rank) ?? 0) + 1);
  }

  const ranks = [...counts.keys()].sort(descending);
  const withCount = (n: number) => ranks.filter(r => counts.get(r) === n);

  return {
    ranks,
    flushSuit,
    flushRanks,
    straightHigh: findStraightHigh(ranks),
    quads: withCount(4),
    triples: withCount(3),
    pairs: withCount(2),
    singles: withCount(1)
  };
}

/**
 * Evaluate the best poker hand available in 5-7 cards.
 *
 * Categories are checked strongest first and the first match wins. Card
 * uniqueness is the caller's responsibility.
 *
 * @example
 * evaluateHand(Card.parseMany('Kh Kd Ks 2c 2d 2h 7s'))
 * // { category: HandCategory.FULL_HOUSE, tiebreakers: [13, 2] }
 */
export function evaluateHand(cards: readonly Card[]): EvaluatedHand {
  if (cards.length < 5 || cards.length > 7) {
    throw new InvalidInputError(`Hand must contain 5 to 7 cards, got ${cards.length}`);
  }

  const a = analyzeCards(cards);
  const hasFlush = a.flushSuit !== null;

  if (hasFlush && a.straightHigh === 14 && ROYAL_RANKS.every(r => a.flushRanks.includes(r))) {
    return { category: HandCategory.ROYAL_FLUSH, tiebreakers: [14] };
  }

  if (hasFlush) {
    // The straight and the flush must share a suit
    const straightFlushHigh = findStraightHigh(a.flushRanks);
    if (straightFlushHigh !== null) {
      return { category: HandCategory.STRAIGHT_FLUSH, tiebreakers: [straightFlushHigh] };
    }
  }

  if (a.quads.length > 0) {
    const quad = a.quads[0];
    const kicker = a.ranks.filter(r => r !== quad)[0];
    return { category: HandCategory.FOUR_OF_A_KIND, tiebreakers: [quad, kicker] };
  }

  if (a.triples.length > 0 && a.pairs.length > 0) {
    return { category: HandCategory.FULL_HOUSE, tiebreakers: [a.triples[0], a.pairs[0]] };
  }
  if (a.triples.length >= 2) {
    // The lower triple plays as the pair
    return { category: HandCategory.FULL_HOUSE, tiebreakers: [a.triples[0], a.triples[1]] };
  }

  if (hasFlush) {
    return { category: HandCategory.FLUSH, tiebreakers: a.flushRanks.slice(0, 5) };
  }

  if (a.straightHigh !== null) {
    return { category: HandCategory.STRAIGHT, tiebreakers: [a.straightHigh] };
  }

  if (a.triples.length > 0) {
    return { category: HandCategory.THREE_OF_A_KIND, tiebreakers: [a.triples[0], ...a.singles.slice(0, 2)] };
  }

  if (a.pairs.length >= 2) {
    // A third pair competes with the singles for the kicker
    const kicker = [...a.pairs.slice(2), ...a.singles].sort(descending)[0];
    return { category: HandCategory.TWO_PAIR, tiebreakers: [a.pairs[0], a.pairs[1], kicker] };
  }

  if (a.pairs.length === 1) {
    return { category: HandCategory.PAIR, tiebreakers: [a.pairs[0], ...a.singles.slice(0, 3)] };
  }

  return { category: HandCategory.HIGH_CARD, tiebreakers: a.singles.slice(0, 5) };
}

/**
 * Highest straight among the given ranks, or null.
 * Handles the wheel (A-2-3-4-5) where Ace is low and 5 is the high card.
 */
export function findStraightHigh(ranks: readonly Rank[]): Rank | null {
  const unique = [...new Set(ranks)].sort(descending);
  if (unique.length < 5) {
    return null;
  }

  for (let i = 0; i + 4 < unique.length; i++) {
    if (unique[i] - unique[i + 4] === 4) {
      return unique[i];
    }
  }

  if (WHEEL_RANKS.every(r => unique.includes(r))) {
    return 5;
  }

  return null;
}

/** Ranks a straight with the given high card is made of, highest first */
export function straightRanks(high: Rank): Rank[] {
  if (high === 5) {
    return [5, 4, 3, 2, 14];
  }
  return ROYAL_RANKS.map(r => r - 14 + high).filter(isRank).reverse();
}

/**
 * Short description such as "Full House, Kings full of Twos".
 */
export function describeHand(hand: EvaluatedHand): string {
  const [first, second] = hand.tiebreakers;
  switch (hand.category) {
    case HandCategory.ROYAL_FLUSH:
      return 'Royal Flush';
    case HandCategory.STRAIGHT_FLUSH:
      return `Straight Flush, ${rankName(first)} high`;
    case HandCategory.FOUR_OF_A_KIND:
      return `Four of a Kind, ${pluralRank(first)}`;
    case HandCategory.FULL_HOUSE:
      return `Full House, ${pluralRank(first)} full of ${pluralRank(second)}`;
    case HandCategory.FLUSH:
      return `Flush, ${rankName(first)} high`;
    case HandCategory.STRAIGHT:
      return `Straight, ${rankName(first)} high`;
    case HandCategory.THREE_OF_A_KIND:
      return `Three of a Kind, ${pluralRank(first)}`;
    case HandCategory.TWO_PAIR:
      return `Two Pair, ${pluralRank(first)} and ${pluralRank(second)}`;
    case HandCategory.PAIR:
      return `Pair of ${pluralRank(first)}`;
    case HandCategory.HIGH_CARD:
      return `High Card, ${rankName(first)}`;
    default: {
      const unknown: never = hand.category;
      throw new InvariantViolationError(`Unhandled hand category: ${String(unknown)}`);
    }
  }
}

function pluralRank(rank: Rank): string {
  return rank === 6 ? 'Sixes' : `${rankName(rank)}s`;
}

function descending(a: Rank, b: Rank): number {
  return b - a;
}
