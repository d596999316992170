import { performance } from 'node:perf_hooks';
import { ZodError } from 'zod';
import {
  Card,
  type EquityResult,
  type HandReport,
  InvalidInputError,
  assertDistinct,
  breakevenEquity,
  buildHandReport,
  decide,
  effectiveEquity,
  estimateEquity,
  estimateRangeEquity,
  formatEquity,
  parseRange
} from '@holdem-equity/core';
import type { ServerConfig } from './config.js';
import { AdviseBody, EquityBody, EvaluateBody, RangeEquityBody, formatIssues } from './schemas.js';

export interface ApiResponse {
  status: number;
  body: unknown;
}

/**
 * Run a handler and map input errors to 400. Anything else is rethrown for
 * the route to report as a 500.
 */
export function respond(run: () => unknown): ApiResponse {
  try {
    return { status: 200, body: run() };
  } catch (error) {
    if (error instanceof ZodError) {
      return { status: 400, body: { error: formatIssues(error) } };
    }
    if (error instanceof InvalidInputError) {
      return { status: 400, body: { error: error.message } };
    }
    throw error;
  }
}

export function evaluate(body: unknown): HandReport {
  const { cards } = EvaluateBody.parse(body);
  assertDistinct(cards, 'cards');
  return buildHandReport(cards);
}

export function equity(body: unknown, config: ServerConfig) {
  const start = performance.now();
  const input = EquityBody.parse(body);
  const trials = capTrials(input.trials ?? config.defaultTrials, config.maxTrials);

  const result = estimateEquity(input.holeCards, input.board, input.opponents, trials, {
    seed: input.seed,
    instrument: true
  });

  return {
    input: {
      holeCards: notation(input.holeCards),
      board: notation(input.board),
      opponents: input.opponents,
      trials
    },
    equity: equityView(result),
    timing: result.timing,
    latencyMs: performance.now() - start
  };
}

export function rangeEquity(body: unknown, config: ServerConfig) {
  const start = performance.now();
  const input = RangeEquityBody.parse(body);
  const range = parseRange(input.range);

  // Total work is combos x trials per combo
  const perHandCap = Math.max(1, Math.floor(config.maxTrials / range.length));
  const trialsPerHand = capTrials(input.trialsPerHand ?? config.defaultTrialsPerHand, perHandCap);

  const result = estimateRangeEquity(input.holeCards, range, input.board, trialsPerHand, {
    seed: input.seed,
    instrument: true
  });

  return {
    input: {
      holeCards: notation(input.holeCards),
      board: notation(input.board),
      range: input.range,
      trialsPerHand
    },
    combos: range.length,
    equity: equityView(result),
    timing: result.timing,
    latencyMs: performance.now() - start
  };
}

export function advise(body: unknown, config: ServerConfig) {
  const start = performance.now();
  const input = AdviseBody.parse(body);
  const trials = capTrials(input.trials ?? config.defaultTrials, config.maxTrials);

  const result = estimateEquity(input.holeCards, input.board, input.opponents, trials, { seed: input.seed });
  const decision = decide(result, input.potSize, input.toCall);
  const known = [...input.holeCards, ...input.board];

  return {
    input: {
      holeCards: notation(input.holeCards),
      board: notation(input.board),
      potSize: input.potSize,
      toCall: input.toCall,
      opponents: input.opponents,
      trials
    },
    analysis: {
      currentHand: known.length >= 5 ? buildHandReport(known) : null,
      equity: equityView(result),
      potOdds: {
        potSize: input.potSize,
        toCall: input.toCall,
        odds: decision.potOdds,
        breakevenEquity: breakevenEquity(input.potSize, input.toCall)
      },
      decision
    },
    latencyMs: performance.now() - start
  };
}

export function capTrials(requested: number, max: number): number {
  return Math.min(requested, max);
}

function equityView(result: EquityResult) {
  return {
    win: result.win,
    tie: result.tie,
    loss: result.loss,
    effective: effectiveEquity(result),
    trials: result.trials,
    formatted: formatEquity(result)
  };
}

function notation(cards: readonly Card[]): string[] {
  return cards.map(c => c.toString());
}
