import type { Card, CardNotation } from '../cards/Card.js';
import type { Rng } from '../random/rng.js';

/** Two hole cards */
export type HoleCards = readonly [Card, Card];

export type TrialOutcome = 'win' | 'tie' | 'loss';

/**
 * Options shared by both equity modes
 */
export interface EquityOptions {
  /** Random seed for reproducibility (optional) */
  seed?: number;

  /** Explicit generator; takes precedence over `seed` */
  rng?: Rng;

  /** Measure wall-clock time and throughput. Does not change the counts. */
  instrument?: boolean;

  /** Called every 1000 trials and once at the end */
  onProgress?: (completed: number, total: number) => void;
}

/**
 * Raw win/tie/loss counters. Shards produce these and are reduced by summing.
 */
export interface EquityTally {
  wins: number;
  ties: number;
  losses: number;
  trials: number;
}

export interface EquityTiming {
  /** Wall-clock duration of the run */
  timeSeconds: number;

  /** Trials completed per second */
  trialsPerSecond: number;
}

/**
 * Win/tie/loss fractions. They sum to 1 within floating rounding, or are
 * all zero when no trial could be run.
 */
export interface EquityResult {
  win: number;
  tie: number;
  loss: number;

  /** Trials actually run */
  trials: number;

  /** Present when instrumentation was requested */
  timing?: EquityTiming;
}

/**
 * A uniform-opponent equity run in serialisable form, so it can cross a
 * worker-thread boundary.
 */
export interface EquityRequest {
  playerCards: CardNotation[];
  community: CardNotation[];
  opponents: number;
  trials: number;
}

/**
 * One independent slice of an equity run, with its own seed.
 */
export interface EquityShardTask extends EquityRequest {
  shardIndex: number;
  seed: number;
}
