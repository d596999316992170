import type { Rank } from '../cards/Card.js';

/**
 * Hand ranking categories in poker (ordered worst to best)
 */
export enum HandCategory {
  HIGH_CARD = 0,
  PAIR = 1,
  TWO_PAIR = 2,
  THREE_OF_A_KIND = 3,  // "Set" or "Trips"
  STRAIGHT = 4,
  FLUSH = 5,
  FULL_HOUSE = 6,
  FOUR_OF_A_KIND = 7,   // "Quads"
  STRAIGHT_FLUSH = 8,
  ROYAL_FLUSH = 9       // Ace-high straight flush, ranked on its own
}

/**
 * Short codes for hand categories
 */
export const HAND_CATEGORY_CODES: Record<HandCategory, string> = {
  [HandCategory.HIGH_CARD]: 'HC',
  [HandCategory.PAIR]: '1P',
  [HandCategory.TWO_PAIR]: '2P',
  [HandCategory.THREE_OF_A_KIND]: '3K',
  [HandCategory.STRAIGHT]: 'ST',
  [HandCategory.FLUSH]: 'FL',
  [HandCategory.FULL_HOUSE]: 'FH',
  [HandCategory.FOUR_OF_A_KIND]: '4K',
  [HandCategory.STRAIGHT_FLUSH]: 'SF',
  [HandCategory.ROYAL_FLUSH]: 'RF'
};

/**
 * Human-readable names for hand categories
 */
export const HAND_CATEGORY_NAMES: Record<HandCategory, string> = {
  [HandCategory.HIGH_CARD]: 'High Card',
  [HandCategory.PAIR]: 'Pair',
  [HandCategory.TWO_PAIR]: 'Two Pair',
  [HandCategory.THREE_OF_A_KIND]: 'Three of a Kind',
  [HandCategory.STRAIGHT]: 'Straight',
  [HandCategory.FLUSH]: 'Flush',
  [HandCategory.FULL_HOUSE]: 'Full House',
  [HandCategory.FOUR_OF_A_KIND]: 'Four of a Kind',
  [HandCategory.STRAIGHT_FLUSH]: 'Straight Flush',
  [HandCategory.ROYAL_FLUSH]: 'Royal Flush'
};

/**
 * The evaluated strength of a 5-7 card holding.
 *
 * Hands compare by category first, then by `tiebreakers` left to right.
 * The tiebreaker shape depends on the category:
 *
 * | Category        | Tiebreakers                         |
 * |-----------------|-------------------------------------|
 * | ROYAL_FLUSH     | [14]                                |
 * | STRAIGHT_FLUSH  | [high card]                         |
 * | FOUR_OF_A_KIND  | [quad, kicker]                      |
 * | FULL_HOUSE      | [triple, pair]                      |
 * | FLUSH           | five flush ranks, descending        |
 * | STRAIGHT        | [high card] (5 for the wheel)       |
 * | THREE_OF_A_KIND | [triple, kicker, kicker]            |
 * | TWO_PAIR        | [high pair, low pair, kicker]       |
 * | PAIR            | [pair, kicker, kicker, kicker]      |
 * | HIGH_CARD       | five ranks, descending              |
 */
export interface EvaluatedHand {
  category: HandCategory;
  tiebreakers: Rank[];
}

export type Comparison = -1 | 0 | 1;

/**
 * Compare two evaluated hands.
 * Returns 1 if a wins, -1 if b wins, 0 on a tie. When one tiebreaker list
 * runs out before a difference is found the hands are equal.
 */
export function compareHands(a: EvaluatedHand, b: EvaluatedHand): Comparison {
  if (a.category !== b.category) {
    return a.category > b.category ? 1 : -1;
  }

  const length = Math.min(a.tiebreakers.length, b.tiebreakers.length);
  for (let i = 0; i < length; i++) {
    if (a.tiebreakers[i] !== b.tiebreakers[i]) {
      return a.tiebreakers[i] > b.tiebreakers[i] ? 1 : -1;
    }
  }

  return 0;
}
