import { performance } from 'node:perf_hooks';
import { type Card, assertDistinct, cardKeys } from '../cards/Card.js';
import { freshShuffledDeck } from '../cards/Deck.js';
import { InvalidInputError } from '../errors.js';
import { evaluateHand } from '../evaluator/HandEvaluator.js';
import { compareHands } from '../evaluator/HandRank.js';
import { type Rng, createRng } from '../random/rng.js';
import type {
  EquityOptions,
  EquityResult,
  EquityTally,
  EquityTiming,
  HoleCards,
  TrialOutcome
} from './types.js';

const BOARD_SIZE = 5;
const DECK_SIZE = 52;
const PROGRESS_INTERVAL = 1000;

/**
 * Monte Carlo equity estimator.
 *
 * Every trial builds a fresh deck, removes the known cards, shuffles, and
 * deals opponents and the rest of the board by fixed offsets. Trials share
 * nothing but the generator owned by this instance, so one simulator must
 * not be driven from two threads at once; run one per worker instead.
 */
export class EquitySimulator {
  private readonly rng: Rng;
  private readonly options: EquityOptions;

  constructor(options: EquityOptions = {}) {
    this.options = options;
    this.rng = options.rng ?? createRng(options.seed);
  }

  /**
   * Equity of `playerCards` against `opponents` random hands.
   *
   * The player wins a trial only by beating every opponent; losing to any
   * one opponent is a loss; otherwise a tie with at least one is a tie.
   */
  estimateEquity(
    playerCards: readonly Card[],
    community: readonly Card[],
    opponents: number,
    trials: number
  ): EquityResult {
    return this.measure(() => this.tallyEquity(playerCards, community, opponents, trials));
  }

  /**
   * Equity against a fixed list of opponent hands, `trialsPerHand` trials each.
   *
   * Entries sharing a card with the player or the board are skipped. If
   * every entry is skipped the result is all zero.
   */
  estimateRangeEquity(
    playerCards: readonly Card[],
    range: readonly HoleCards[],
    community: readonly Card[],
    trialsPerHand: number
  ): EquityResult {
    return this.measure(() => this.tallyRangeEquity(playerCards, range, community, trialsPerHand));
  }

  /** Counters for a uniform-opponent run */
  tallyEquity(
    playerCards: readonly Card[],
    community: readonly Card[],
    opponents: number,
    trials: number
  ): EquityTally {
    const known = validateEquityInputs(playerCards, community, opponents, trials);

    const tally = emptyTally();
    for (let i = 0; i < trials; i++) {
      record(tally, this.playUniformTrial(playerCards, community, known, opponents));
      this.reportProgress(i + 1, trials);
    }
    return tally;
  }

  /** Counters for a fixed-range run */
  tallyRangeEquity(
    playerCards: readonly Card[],
    range: readonly HoleCards[],
    community: readonly Card[],
    trialsPerHand: number
  ): EquityTally {
    const known = validateKnown(playerCards, community);
    assertPositiveInteger(trialsPerHand, 'trialsPerHand');

    const knownKeys = cardKeys(known);
    const eligible = range.filter(hand => {
      if (hand[0].equals(hand[1])) {
        throw new InvalidInputError(`Range entry repeats a card: ${hand[0].toString()}${hand[1].toString()}`);
      }
      return !hand.some(c => knownKeys.has(c.key));
    });

    const total = eligible.length * trialsPerHand;
    const tally = emptyTally();
    for (const hand of eligible) {
      const excluded = [...known, ...hand];
      for (let i = 0; i < trialsPerHand; i++) {
        record(tally, this.playHeadsUpTrial(playerCards, hand, community, excluded));
        this.reportProgress(tally.trials, total);
      }
    }
    return tally;
  }

  private playUniformTrial(
    playerCards: readonly Card[],
    community: readonly Card[],
    known: readonly Card[],
    opponents: number
  ): TrialOutcome {
    const deck = freshShuffledDeck(this.rng, known);
    const opponentHands: Card[][] = [];
    for (let o = 0; o < opponents; o++) {
      opponentHands.push(deck.dealMany(2));
    }
    const board = [...community, ...deck.dealMany(BOARD_SIZE - community.length)];

    const player = evaluateHand([...playerCards, ...board]);
    let tied = false;
    for (const hole of opponentHands) {
      const result = compareHands(player, evaluateHand([...hole, ...board]));
      if (result < 0) {
        return 'loss';
      }
      if (result === 0) {
        tied = true;
      }
    }
    return tied ? 'tie' : 'win';
  }

  private playHeadsUpTrial(
    playerCards: readonly Card[],
    opponent: HoleCards,
    community: readonly Card[],
    excluded: readonly Card[]
  ): TrialOutcome {
    const deck = freshShuffledDeck(this.rng, excluded);
    const board = [...community, ...deck.dealMany(BOARD_SIZE - community.length)];
    const result = compareHands(
      evaluateHand([...playerCards, ...board]),
      evaluateHand([...opponent, ...board])
    );
    return result > 0 ? 'win' : result === 0 ? 'tie' : 'loss';
  }

  private reportProgress(completed: number, total: number): void {
    const { onProgress } = this.options;
    if (onProgress && (completed % PROGRESS_INTERVAL === 0 || completed === total)) {
      onProgress(completed, total);
    }
  }

  private measure(run: () => EquityTally): EquityResult {
    if (!this.options.instrument) {
      return tallyToResult(run());
    }
    const start = performance.now();
    const tally = run();
    return tallyToResult(tally, timingFor(tally.trials, performance.now() - start));
  }
}

/**
 * Convenience function: uniform-opponent equity with a throwaway simulator
 */
export function estimateEquity(
  playerCards: readonly Card[],
  community: readonly Card[] = [],
  opponents: number = 1,
  trials: number = 10000,
  options: EquityOptions = {}
): EquityResult {
  return new EquitySimulator(options).estimateEquity(playerCards, community, opponents, trials);
}

/**
 * Convenience function: fixed-range equity with a throwaway simulator
 */
export function estimateRangeEquity(
  playerCards: readonly Card[],
  range: readonly HoleCards[],
  community: readonly Card[] = [],
  trialsPerHand: number = 1000,
  options: EquityOptions = {}
): EquityResult {
  return new EquitySimulator(options).estimateRangeEquity(playerCards, range, community, trialsPerHand);
}

export function emptyTally(): EquityTally {
  return { wins: 0, ties: 0, losses: 0, trials: 0 };
}

/** Convert counters to fractions; an empty tally gives all zeros */
export function tallyToResult(tally: EquityTally, timing?: EquityTiming): EquityResult {
  const { wins, ties, losses, trials } = tally;
  const result: EquityResult = trials === 0
    ? { win: 0, tie: 0, loss: 0, trials: 0 }
    : { win: wins / trials, tie: ties / trials, loss: losses / trials, trials };
  if (timing) {
    result.timing = timing;
  }
  return result;
}

export function timingFor(trials: number, elapsedMs: number): EquityTiming {
  const timeSeconds = elapsedMs / 1000;
  return {
    timeSeconds,
    trialsPerSecond: timeSeconds > 0 ? trials / timeSeconds : 0
  };
}

/**
 * Check a uniform-opponent run before any trial is dealt and return the
 * known cards. Callers that shard work across threads run this first so
 * bad input fails on the calling thread.
 */
export function validateEquityInputs(
  playerCards: readonly Card[],
  community: readonly Card[],
  opponents: number,
  trials: number
): Card[] {
  const known = validateKnown(playerCards, community);
  assertPositiveInteger(trials, 'trials');
  assertPositiveInteger(opponents, 'opponents');

  const needed = opponents * 2 + (BOARD_SIZE - community.length);
  if (needed > DECK_SIZE - known.length) {
    throw new InvalidInputError(`Not enough cards left to deal ${opponents} opponents`);
  }
  return known;
}

function record(tally: EquityTally, outcome: TrialOutcome): void {
  tally.trials++;
  switch (outcome) {
    case 'win':
      tally.wins++;
      break;
    case 'tie':
      tally.ties++;
      break;
    case 'loss':
      tally.losses++;
      break;
  }
}

function validateKnown(playerCards: readonly Card[], community: readonly Card[]): Card[] {
  if (playerCards.length !== 2) {
    throw new InvalidInputError(`Player must hold 2 cards, got ${playerCards.length}`);
  }
  if (community.length > BOARD_SIZE) {
    throw new InvalidInputError(`Board holds at most ${BOARD_SIZE} cards, got ${community.length}`);
  }
  const known = [...playerCards, ...community];
  assertDistinct(known, 'known cards');
  return known;
}

function assertPositiveInteger(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidInputError(`${label} must be a positive integer, got ${value}`);
  }
}
