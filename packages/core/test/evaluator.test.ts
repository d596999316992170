import { describe, it, expect } from 'vitest';
import {
  Card,
  Deck,
  HandCategory,
  InvalidInputError,
  InvariantViolationError,
  combinations,
  compareHands,
  describeHand,
  evaluateHand,
  getBestFiveCards,
  type EvaluatedHand
} from '../src/index.js';

function evalOf(notation: string): EvaluatedHand {
  return evaluateHand(Card.parseMany(notation));
}

function bestOf(notation: string): string[] {
  return getBestFiveCards(Card.parseMany(notation)).map(c => c.toString());
}

describe('evaluateHand', () => {
  it.each([
    ['royal flush', 'As Ks Qs Js Ts 2d 3c', HandCategory.ROYAL_FLUSH, [14]],
    ['straight flush', '9h 8h 7h 6h 5h Ad Kc', HandCategory.STRAIGHT_FLUSH, [9]],
    ['steel wheel', 'Ah 2h 3h 4h 5h Kd Qc', HandCategory.STRAIGHT_FLUSH, [5]],
    ['four of a kind', 'Ad Ac Ah As Ks 2d 3c', HandCategory.FOUR_OF_A_KIND, [14, 13]],
    ['quads with a paired kicker', '9s 9h 9d 9c Kh Kd 2s', HandCategory.FOUR_OF_A_KIND, [9, 13]],
    ['full house', 'As Ah Ad Ks Kh 2c 3d', HandCategory.FULL_HOUSE, [14, 13]],
    ['full house from two triples', 'Kh Kd Ks 2c 2d 2h 7s', HandCategory.FULL_HOUSE, [13, 2]],
    ['full house with two pairs', 'Qs Qh Qd 9c 9d 5h 5s', HandCategory.FULL_HOUSE, [12, 9]],
    ['flush', 'As 9s 7s 4s 2s Kd Qc', HandCategory.FLUSH, [14, 9, 7, 4, 2]],
    ['six card flush', 'As Js 9s 7s 4s 2s Kd', HandCategory.FLUSH, [14, 11, 9, 7, 4]],
    ['straight', '9s 8h 7d 6c 5s 2h 2d', HandCategory.STRAIGHT, [9]],
    ['wheel', 'As 2d 3c 4h 5s Kd 9c', HandCategory.STRAIGHT, [5]],
    ['six in a row', '4s 5d 6c 7h 8s 9d Kc', HandCategory.STRAIGHT, [9]],
    ['three of a kind', '7s 7h 7d Ac Ks 4d 2c', HandCategory.THREE_OF_A_KIND, [7, 14, 13]],
    ['two pair', 'Ks Kh 9d 9c As 5h 2d', HandCategory.TWO_PAIR, [13, 9, 14]],
    ['two pair with a third pair', 'Ks Kh 9d 9c 5s 5h 2d', HandCategory.TWO_PAIR, [13, 9, 5]],
    ['pair', 'Qs Qh 9d 7c 5s 3h 2d', HandCategory.PAIR, [12, 9, 7, 5]],
    ['high card', 'As Jh 9d 7c 5s 3h 2d', HandCategory.HIGH_CARD, [14, 11, 9, 7, 5]],
    ['five card high card', 'Ah Kd 8c 5s 2h', HandCategory.HIGH_CARD, [14, 13, 8, 5, 2]]
  ])('identifies %s', (_name, notation, category, tiebreakers) => {
    expect(evalOf(notation)).toEqual({ category, tiebreakers });
  });

  it('treats a straight and a flush in different suits as a flush', () => {
    expect(evalOf('2h 3h 4h 5h 9h 6d Kc')).toEqual({
      category: HandCategory.FLUSH,
      tiebreakers: [9, 5, 4, 3, 2]
    });
  });

  it('does not call a mixed-suit ace-high straight with a flush a royal', () => {
    expect(evalOf('Ah Kh Qh Jh 9h Td 2c')).toEqual({
      category: HandCategory.FLUSH,
      tiebreakers: [14, 13, 12, 11, 9]
    });
  });

  it('requires 5 to 7 cards', () => {
    expect(() => evalOf('Ah Kd 8c 5s')).toThrow(InvalidInputError);
    expect(() => evalOf('Ah Kd 8c 5s 2h 3h 4h 6h')).toThrow('Hand must contain 5 to 7 cards, got 8');
  });
});

describe('compareHands', () => {
  it('orders by category first', () => {
    expect(compareHands(evalOf('2h 3h 4h 5h 9h'), evalOf('Ac Ad Ah Kc Ks'))).toBe(-1);
    expect(compareHands(evalOf('As Ks Qs Js Ts'), evalOf('9s 8s 7s 6s 5s'))).toBe(1);
  });

  it('ranks the wheel below a six-high straight', () => {
    expect(compareHands(evalOf('As 2d 3c 4h 5s'), evalOf('2d 3c 4h 5s 6d'))).toBe(-1);
  });

  it('falls through to kickers', () => {
    expect(compareHands(evalOf('As Ah Kd 7c 5s 3h 2d'), evalOf('Ac Ad Qd 7h 5c 3s 2c'))).toBe(1);
  });

  it('ties when the board plays', () => {
    const a = evaluateHand(Card.parseMany('2c 3d 9s 9h 9d 9c Ah'));
    const b = evaluateHand(Card.parseMany('4c 5d 9s 9h 9d 9c Ah'));
    expect(compareHands(a, b)).toBe(0);
  });

  it('is antisymmetric', () => {
    const deck = Deck.seeded(11).shuffle();
    for (let i = 0; i < 7; i++) {
      const a = evaluateHand(deck.dealMany(7));
      deck.shuffle();
      const b = evaluateHand(deck.dealMany(7));
      deck.shuffle();
      expect(compareHands(a, b)).toBe(-compareHands(b, a) || 0);
    }
  });

  it('agrees with the best five-card subset', () => {
    for (let seed = 1; seed <= 150; seed++) {
      const cards = Deck.seeded(seed).shuffle().dealMany(7);
      const best = combinations(cards, 5)
        .map(five => evaluateHand(five))
        .reduce((top, hand) => (compareHands(hand, top) > 0 ? hand : top));
      expect(evaluateHand(cards)).toEqual(best);
    }
  });
});

describe('describeHand', () => {
  it.each([
    ['Kh Kd Ks 2c 2d 2h 7s', 'Full House, Kings full of Twos'],
    ['6s 6h 9d 7c 2s', 'Pair of Sixes'],
    ['As 2d 3c 4h 5s', 'Straight, Five high'],
    ['As Jh 9d 7c 5s', 'High Card, Ace'],
    ['As Ks Qs Js Ts', 'Royal Flush'],
    ['Ks Kh 9d 9c As', 'Two Pair, Kings and Nines'],
    ['9h 8h 7h 6h 5h', 'Straight Flush, Nine high']
  ])('%s is "%s"', (notation, description) => {
    expect(describeHand(evalOf(notation))).toBe(description);
  });
});

describe('getBestFiveCards', () => {
  it('picks the royal flush', () => {
    expect(bestOf('As Ks Qs Js Ts 2d 3c')).toEqual(['As', 'Ks', 'Qs', 'Js', 'Ts']);
  });

  it('plays the ace low in a wheel', () => {
    expect(bestOf('As 2d 3c 4h 5s Kd 9c')).toEqual(['5s', '4h', '3c', '2d', 'As']);
  });

  it('takes a pair from the lower triple', () => {
    expect(bestOf('Kh Kd Ks 2c 2d 2h 7s')).toEqual(['Kh', 'Kd', 'Ks', '2c', '2d']);
  });

  it('takes the top five of a six card flush', () => {
    expect(bestOf('As Js 9s 7s 4s 2s Kd')).toEqual(['As', 'Js', '9s', '7s', '4s']);
  });

  it('takes the pair and three kickers', () => {
    expect(bestOf('Qs Qh 9d 7c 5s 3h 2d')).toEqual(['Qs', 'Qh', '9d', '7c', '5s']);
  });

  it('evaluates back to the same hand', () => {
    for (let seed = 1; seed <= 200; seed++) {
      const cards = Deck.seeded(seed).shuffle().dealMany(7);
      const evaluated = evaluateHand(cards);
      expect(evaluateHand(getBestFiveCards(cards, evaluated))).toEqual(evaluated);
    }
  });

  it('rejects an evaluation that does not fit the cards', () => {
    const cards = Card.parseMany('As Kd 8c 5s 2h');
    expect(() => getBestFiveCards(cards, { category: HandCategory.FOUR_OF_A_KIND, tiebreakers: [14, 13] }))
      .toThrow(InvariantViolationError);
  });
});

describe('combinations', () => {
  it('lists k-subsets in order', () => {
    expect(combinations([1, 2, 3, 4], 2)).toEqual([[1, 2], [1, 3], [1, 4], [2, 3], [2, 4], [3, 4]]);
    expect(combinations([1, 2, 3, 4, 5, 6, 7], 5)).toHaveLength(21);
  });

  it('returns nothing for impossible sizes', () => {
    expect(combinations([1, 2], 0)).toEqual([]);
    expect(combinations([1, 2], 3)).toEqual([]);
  });
});
