import type { Card } from '../cards/Card.js';
import { getBestFiveCards } from '../evaluator/BestHand.js';
import { describeHand, evaluateHand } from '../evaluator/HandEvaluator.js';
import { HAND_CATEGORY_CODES, HAND_CATEGORY_NAMES, type HandCategory } from '../evaluator/HandRank.js';
import type { EquityResult, EquityTiming } from '../simulator/types.js';

/**
 * Equity fractions as display percentages
 */
export interface FormattedEquity {
  win: string;
  tie: string;
  loss: string;
}

/**
 * Everything needed to show an evaluated hand
 */
export interface HandReport {
  category: HandCategory;
  name: string;
  code: string;
  tiebreakers: number[];
  description: string;
  bestFive: string[];
}

/** Format a fraction as a percentage with one decimal, e.g. 0.8523 -> "85.2%" */
export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

export function formatEquity(result: EquityResult): FormattedEquity {
  return {
    win: formatPercent(result.win),
    tie: formatPercent(result.tie),
    loss: formatPercent(result.loss)
  };
}

/** One-line summary, e.g. "10,000 trials in 0.42s (23,810 trials/sec)" */
export function formatTiming(trials: number, timing: EquityTiming): string {
  const rate = Math.round(timing.trialsPerSecond);
  return `${trials.toLocaleString('en-US')} trials in ${timing.timeSeconds.toFixed(2)}s ` +
    `(${rate.toLocaleString('en-US')} trials/sec)`;
}

/**
 * Rows for a plain-text equity table
 */
export function formatEquityTable(result: EquityResult): string[] {
  const formatted = formatEquity(result);
  return [
    `  Win  | ${formatted.win.padStart(6)}`,
    `  Tie  | ${formatted.tie.padStart(6)}`,
    `  Loss | ${formatted.loss.padStart(6)}`
  ];
}

/**
 * Evaluate a holding and describe it for display
 */
export function buildHandReport(cards: readonly Card[]): HandReport {
  const evaluated = evaluateHand(cards);
  return {
    category: evaluated.category,
    name: HAND_CATEGORY_NAMES[evaluated.category],
    code: HAND_CATEGORY_CODES[evaluated.category],
    tiebreakers: [...evaluated.tiebreakers],
    description: describeHand(evaluated),
    bestFive: getBestFiveCards(cards, evaluated).map(c => c.toString())
  };
}
