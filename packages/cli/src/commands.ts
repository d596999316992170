import {
  Card,
  type EquityResult,
  InvalidInputError,
  assertDistinct,
  buildHandReport,
  decide,
  estimateEquity,
  estimateRangeEquity,
  formatCards,
  formatEquityTable,
  formatPercent,
  formatTiming,
  parseRange
} from '@holdem-equity/core';
import { type CLIOptions, DEFAULT_EQUITY_TRIALS, DEFAULT_TRIALS_PER_HAND } from './args.js';
import { EquityPool, randomSeed } from './pool.js';

export const VERSION = '1.0.0';

export function printHelp(): void {
  console.log(`
Hold'em Equity CLI v${VERSION}

USAGE:
  equity <command> [options]

COMMANDS:
  equity, eq       Win/tie/loss against random opponents
  range            Win/tie/loss against a fixed opponent range
  evaluate, eval   Classify a 5-7 card hand
  decide           Call, fold or check from equity and pot odds
  help             Show this help message

OPTIONS:
  -c, --cards <cards>      Hole cards, e.g. "Ah As" (evaluate: any cards)
  -b, --board <cards>      Community cards, 0-5
  -r, --range <range>      Opponent range, e.g. "QQ+, AKs, AhKh"
  -o, --opponents <n>      Random opponents (default: 1)
  -t, --trials <n>         Trials (default: ${DEFAULT_EQUITY_TRIALS}; range: per hand, default ${DEFAULT_TRIALS_PER_HAND})
  -s, --seed <n>           Random seed for reproducibility
  -w, --workers <n>        Worker threads for equity (default: 1)
  --pot <amount>           Pot size for decide
  --call <amount>          Amount to call for decide
  --time                   Report duration and trials per second

EXAMPLES:
  # Pocket aces against two random hands
  equity equity -c "Ah As" -o 2 -t 50000

  # Ace-king on a flop against a range
  equity range -c "Ah Kd" -b "Ac 7s 2d" -r "QQ+, AKs, 77"

  # Should I call 25 into 100?
  equity decide -c "9h 8h" -b "7h 6c 2h" --pot 100 --call 25
`);
}

export function printVersion(): void {
  console.log(`Hold'em Equity CLI v${VERSION}`);
}

export async function runEquity(options: CLIOptions): Promise<EquityResult> {
  const playerCards = requireCards(options.cards, '--cards');
  const community = parseBoard(options.board);
  const trials = options.trials ?? DEFAULT_EQUITY_TRIALS;

  console.log(`\nEquity: ${formatCards(playerCards)} ${boardLabel(community)}vs ${options.opponents} opponent(s)`);
  console.log(`Trials: ${trials.toLocaleString('en-US')}${options.workers > 1 ? ` on ${options.workers} workers` : ''}`);

  let result: EquityResult;
  if (options.workers > 1) {
    const pool = new EquityPool(options.workers);
    try {
      result = await pool.estimateEquity(
        {
          playerCards: playerCards.map(c => c.toString()),
          community: community.map(c => c.toString()),
          opponents: options.opponents,
          trials
        },
        options.seed ?? randomSeed(),
        options.time
      );
    } finally {
      await pool.destroy();
    }
  } else {
    result = estimateEquity(playerCards, community, options.opponents, trials, {
      seed: options.seed,
      instrument: options.time,
      onProgress: trials >= 10000 ? printProgress : undefined
    });
  }

  printResult(result);
  return result;
}

export function runRange(options: CLIOptions): EquityResult {
  const playerCards = requireCards(options.cards, '--cards');
  const community = parseBoard(options.board);
  if (options.range === undefined) {
    throw new InvalidInputError('--range is required for range command');
  }
  const range = parseRange(options.range);
  const trialsPerHand = options.trials ?? DEFAULT_TRIALS_PER_HAND;

  console.log(`\nRange equity: ${formatCards(playerCards)} ${boardLabel(community)}vs ${options.range}`);
  console.log(`Combos: ${range.length}, trials per combo: ${trialsPerHand.toLocaleString('en-US')}`);

  const result = estimateRangeEquity(playerCards, range, community, trialsPerHand, {
    seed: options.seed,
    instrument: options.time
  });

  if (result.trials === 0) {
    console.log('\n  Every combo in the range conflicts with the known cards.');
  }
  printResult(result);
  return result;
}

export function runEvaluate(options: CLIOptions): void {
  const cards = [...requireCards(options.cards, '--cards'), ...parseBoard(options.board)];
  assertDistinct(cards, 'cards');
  const report = buildHandReport(cards);

  console.log(`\n${formatCards(cards)}`);
  console.log(`  Hand:        ${report.description}`);
  console.log(`  Category:    ${report.name} (${report.code})`);
  console.log(`  Tiebreakers: [${report.tiebreakers.join(', ')}]`);
  console.log(`  Best five:   ${report.bestFive.join(' ')}`);
}

export function runDecide(options: CLIOptions): void {
  const playerCards = requireCards(options.cards, '--cards');
  const community = parseBoard(options.board);
  if (options.pot === undefined || options.call === undefined) {
    throw new InvalidInputError('--pot and --call are required for decide command');
  }

  const result = estimateEquity(playerCards, community, options.opponents, options.trials ?? DEFAULT_EQUITY_TRIALS, {
    seed: options.seed
  });
  const decision = decide(result, options.pot, options.call);

  console.log(`\nDecision: ${formatCards(playerCards)} ${boardLabel(community)}pot ${options.pot}, to call ${options.call}`);
  console.log(`  Equity:   ${formatPercent(decision.equity)}`);
  console.log(`  Pot odds: ${formatPercent(decision.potOdds)}`);
  console.log(`  EV:       ${decision.ev.toFixed(2)}`);
  console.log(`  Action:   ${decision.action.toUpperCase()}`);
}

function printResult(result: EquityResult): void {
  console.log('');
  for (const line of formatEquityTable(result)) {
    console.log(line);
  }
  if (result.timing) {
    console.log(`\n  ${formatTiming(result.trials, result.timing)}`);
  }
}

function printProgress(completed: number, total: number): void {
  const pct = ((completed / total) * 100).toFixed(1);
  process.stdout.write(`\r  Progress: ${pct}% (${completed.toLocaleString('en-US')}/${total.toLocaleString('en-US')})`);
  if (completed === total) {
    process.stdout.write('\n');
  }
}

function requireCards(notation: string | undefined, flag: string): Card[] {
  if (notation === undefined) {
    throw new InvalidInputError(`${flag} is required`);
  }
  return Card.parseMany(notation);
}

function parseBoard(notation: string | undefined): Card[] {
  return notation === undefined ? [] : Card.parseMany(notation);
}

function boardLabel(community: readonly Card[]): string {
  return community.length > 0 ? `on ${formatCards(community)} ` : '';
}
