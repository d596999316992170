import { type Card, type Rank, sortByRankDesc } from '../cards/Card.js';
import { InvariantViolationError } from '../errors.js';
import { HandCategory, type EvaluatedHand, HAND_CATEGORY_NAMES } from './HandRank.js';
import { analyzeCards, evaluateHand, straightRanks } from './HandEvaluator.js';

/**
 * Reconstruct the literal five cards that make up an evaluated hand.
 *
 * Works from the tiebreakers alone: one card per needed rank, the first
 * matching card in input order when a rank has spare suits. Evaluating the
 * returned cards gives back the same category and tiebreakers.
 *
 * Throws InvariantViolationError if the evaluation does not describe `cards`.
 */
export function getBestFiveCards(
  cards: readonly Card[],
  evaluated: EvaluatedHand = evaluateHand(cards)
): Card[] {
  const t = evaluated.tiebreakers;
  let hand: Card[];

  switch (evaluated.category) {
    case HandCategory.ROYAL_FLUSH:
    case HandCategory.STRAIGHT_FLUSH:
      hand = pickStraight(flushCards(cards), t[0]);
      break;

    case HandCategory.FOUR_OF_A_KIND:
      hand = [...takeRank(cards, t[0], 4), ...takeRank(cards, t[1], 1)];
      break;

    case HandCategory.FULL_HOUSE:
      hand = [...takeRank(cards, t[0], 3), ...takeRank(cards, t[1], 2)];
      break;

    case HandCategory.FLUSH:
      hand = sortByRankDesc(flushCards(cards)).slice(0, 5);
      break;

    case HandCategory.STRAIGHT:
      hand = pickStraight(cards, t[0]);
      break;

    case HandCategory.THREE_OF_A_KIND:
      hand = [...takeRank(cards, t[0], 3), ...takeRank(cards, t[1], 1), ...takeRank(cards, t[2], 1)];
      break;

    case HandCategory.TWO_PAIR:
      hand = [...takeRank(cards, t[0], 2), ...takeRank(cards, t[1], 2), ...takeRank(cards, t[2], 1)];
      break;

    case HandCategory.PAIR:
      hand = [
        ...takeRank(cards, t[0], 2),
        ...t.slice(1, 4).flatMap(kicker => takeRank(cards, kicker, 1))
      ];
      break;

    case HandCategory.HIGH_CARD:
      hand = sortByRankDesc(cards).slice(0, 5);
      break;

    default: {
      const unknown: never = evaluated.category;
      throw new InvariantViolationError(`No best-hand rule for category ${String(unknown)}`);
    }
  }

  if (hand.length !== 5) {
    throw new InvariantViolationError(
      `${HAND_CATEGORY_NAMES[evaluated.category]} rebuilt from [${t.join(', ')}] has ${hand.length} cards`
    );
  }
  return hand;
}

function flushCards(cards: readonly Card[]): Card[] {
  const { flushSuit } = analyzeCards(cards);
  if (flushSuit === null) {
    throw new InvariantViolationError('Flush hand without a flush suit');
  }
  return cards.filter(c => c.suit === flushSuit);
}

/** One card per rank of the straight; the wheel takes A-2-3-4-5, not 10-A */
function pickStraight(cards: readonly Card[], high: Rank): Card[] {
  return straightRanks(high).flatMap(rank => takeRank(cards, rank, 1));
}

function takeRank(cards: readonly Card[], rank: Rank, count: number): Card[] {
  const matching = cards.filter(c => c.rank === rank).slice(0, count);
  if (matching.length < count) {
    throw new InvariantViolationError(`Expected ${count} cards of rank ${rank}, found ${matching.length}`);
  }
  return matching;
}
