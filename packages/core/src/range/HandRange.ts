import { Card, type Rank, SUITS, isRank, parseRank } from '../cards/Card.js';
import { InvalidInputError } from '../errors.js';
import type { HoleCards } from '../simulator/types.js';
import { combinations } from '../utils/combinations.js';

/**
 * Hold'em range notation:
 *
 * - `AA`        the 6 combos of a pair
 * - `TT+`       TT, JJ, QQ, KK, AA
 * - `AKs`       the 4 suited combos
 * - `AKo`       the 12 offsuit combos
 * - `AK`        all 16 combos
 * - `ATs+`      ATs, AJs, AQs, AKs (also `ATo+` and `AT+`)
 * - `AhKh`      one exact hand
 *
 * Tokens are separated by commas or whitespace.
 */
const PAIR_PATTERN = /^([2-9TJQKA])\1(\+?)$/i;
const RANKS_PATTERN = /^([2-9TJQKA])([2-9TJQKA])([so]?)(\+?)$/i;
const EXACT_PATTERN = /^([2-9TJQKA][hdcs])([2-9TJQKA][hdcs])$/i;

type Suitedness = 's' | 'o' | '';

/**
 * Expand range notation into concrete two-card hands, in the order written,
 * without duplicates.
 *
 * @example
 * parseRange('QQ+, AKs').length // 18 + 4 = 22
 */
export function parseRange(notation: string): HoleCards[] {
  const tokens = notation.split(/[\s,]+/).filter(t => t.length > 0);
  if (tokens.length === 0) {
    throw new InvalidInputError('Range is empty');
  }

  const seen = new Set<string>();
  const hands: HoleCards[] = [];
  for (const token of tokens) {
    for (const hand of expandToken(token)) {
      const id = handId(hand);
      if (!seen.has(id)) {
        seen.add(id);
        hands.push(hand);
      }
    }
  }
  return hands;
}

/** Range notation for a single hand, e.g. "AhKh" */
export function formatHoleCards(hand: HoleCards): string {
  return `${hand[0].toString()}${hand[1].toString()}`;
}

function expandToken(token: string): HoleCards[] {
  const exact = EXACT_PATTERN.exec(token);
  if (exact) {
    const first = Card.parse(exact[1]);
    const second = Card.parse(exact[2]);
    if (first.equals(second)) {
      throw new InvalidInputError(`Range entry repeats a card: ${token}`);
    }
    return [[first, second]];
  }

  const pair = PAIR_PATTERN.exec(token);
  if (pair) {
    const rank = requireRank(pair[1], token);
    const ranks = pair[2] === '+' ? ranksBetween(rank, 14) : [rank];
    return ranks.flatMap(pairCombos);
  }

  const twoRanks = RANKS_PATTERN.exec(token);
  if (twoRanks) {
    const a = requireRank(twoRanks[1], token);
    const b = requireRank(twoRanks[2], token);
    if (a === b) {
      throw new InvalidInputError(`Pairs take no suitedness: ${token}`);
    }
    const [high, low] = a > b ? [a, b] : [b, a];
    const kind = suitedness(twoRanks[3]);
    const kickers = twoRanks[4] === '+' ? ranksBetween(low, high - 1) : [low];
    return kickers.flatMap(kicker => unpairedCombos(high, kicker, kind));
  }

  throw new InvalidInputError(`Invalid range token: ${token}`);
}

function pairCombos(rank: Rank): HoleCards[] {
  return combinations(SUITS, 2).map(([s1, s2]): HoleCards => [Card.create(rank, s1), Card.create(rank, s2)]);
}

function unpairedCombos(high: Rank, low: Rank, kind: Suitedness): HoleCards[] {
  const hands: HoleCards[] = [];
  for (const s1 of SUITS) {
    for (const s2 of SUITS) {
      const suited = s1 === s2;
      if ((kind === 's' && !suited) || (kind === 'o' && suited)) {
        continue;
      }
      hands.push([Card.create(high, s1), Card.create(low, s2)]);
    }
  }
  return hands;
}

/** Ranks from `from` to `to` inclusive */
function ranksBetween(from: number, to: number): Rank[] {
  const ranks: Rank[] = [];
  for (let r = from; r <= to; r++) {
    if (isRank(r)) {
      ranks.push(r);
    }
  }
  return ranks;
}

function requireRank(value: string, token: string): Rank {
  const rank = parseRank(value.toUpperCase());
  if (rank === undefined) {
    throw new InvalidInputError(`Invalid rank in range token: ${token}`);
  }
  return rank;
}

function suitedness(value: string): Suitedness {
  const lower = value.toLowerCase();
  return lower === 's' || lower === 'o' ? lower : '';
}

function handId(hand: HoleCards): string {
  const [a, b] = [hand[0].key, hand[1].key].sort((x, y) => x - y);
  return `${a}-${b}`;
}
