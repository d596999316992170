import type { Card } from '../cards/Card.js';
import { InvalidInputError } from '../errors.js';
import { estimateEquity } from '../simulator/EquitySimulator.js';
import type { EquityOptions, EquityResult } from '../simulator/types.js';

export type Action = 'call' | 'fold' | 'check';

/**
 * A call/fold/check recommendation and the numbers behind it
 */
export interface Decision {
  action: Action;

  /** Win probability plus half the tie probability */
  equity: number;

  /** Share of the final pot the call represents; the break-even equity */
  potOdds: number;

  /** Expected value of calling, in pot units */
  ev: number;

  profitable: boolean;
}

/**
 * Pot odds as a fraction: call / (pot + call).
 *
 * Pot 100, call 25 gives 0.2.
 */
export function potOdds(potSize: number, callAmount: number): number {
  assertAmounts(potSize, callAmount);
  const total = potSize + callAmount;
  return total === 0 ? 0 : callAmount / total;
}

/**
 * Expected value of a call: equity * (pot + call) - (1 - equity) * call.
 *
 * 55% equity, pot 100, call 25 gives 57.5.
 */
export function expectedValue(equity: number, potSize: number, callAmount: number): number {
  assertAmounts(potSize, callAmount);
  return equity * (potSize + callAmount) - (1 - equity) * callAmount;
}

/** Minimum equity needed to break even on a call */
export function breakevenEquity(potSize: number, callAmount: number): number {
  return potOdds(potSize, callAmount);
}

/** Equity that counts ties as half a win */
export function effectiveEquity(result: EquityResult): number {
  return result.win + result.tie / 2;
}

/**
 * Turn simulator output into a recommendation. Nothing to call is a check;
 * otherwise call when the call is profitable and fold when it is not.
 */
export function decide(result: EquityResult, potSize: number, callAmount: number): Decision {
  const equity = effectiveEquity(result);
  const ev = expectedValue(equity, potSize, callAmount);

  let action: Action;
  if (callAmount === 0) {
    action = 'check';
  } else if (ev > 0) {
    action = 'call';
  } else {
    action = 'fold';
  }

  return {
    action,
    equity,
    potOdds: potOdds(potSize, callAmount),
    ev,
    profitable: ev > 0
  };
}

/**
 * Run a uniform-opponent simulation and decide on it
 */
export function recommendAction(
  playerCards: readonly Card[],
  community: readonly Card[],
  potSize: number,
  callAmount: number,
  opponents: number = 1,
  trials: number = 10000,
  options: EquityOptions = {}
): Decision {
  assertAmounts(potSize, callAmount);
  const result = estimateEquity(playerCards, community, opponents, trials, options);
  return decide(result, potSize, callAmount);
}

function assertAmounts(potSize: number, callAmount: number): void {
  if (!(potSize >= 0) || !(callAmount >= 0)) {
    throw new InvalidInputError(`Pot and call must be non-negative, got pot ${potSize}, call ${callAmount}`);
  }
}
