import { Card } from '../cards/Card.js';
import { InvalidInputError } from '../errors.js';
import { EquitySimulator, emptyTally } from './EquitySimulator.js';
import type { EquityRequest, EquityShardTask, EquityTally } from './types.js';

/**
 * Split `total` trials into at most `shards` non-empty parts whose sizes
 * differ by at most one.
 */
export function partitionTrials(total: number, shards: number): number[] {
  if (!Number.isInteger(total) || total < 1) {
    throw new InvalidInputError(`trials must be a positive integer, got ${total}`);
  }
  if (!Number.isInteger(shards) || shards < 1) {
    throw new InvalidInputError(`shards must be a positive integer, got ${shards}`);
  }

  const count = Math.min(shards, total);
  const base = Math.floor(total / count);
  const extra = total % count;
  return Array.from({ length: count }, (_, i) => base + (i < extra ? 1 : 0));
}

/**
 * Plan an equity run as independent shards. Shard `i` is seeded with
 * `seed + i`, so every shard owns a distinct random stream.
 */
export function planEquityShards(request: EquityRequest, shards: number, seed: number): EquityShardTask[] {
  return partitionTrials(request.trials, shards).map((trials, shardIndex) => ({
    ...request,
    trials,
    shardIndex,
    seed: seed + shardIndex
  }));
}

/**
 * Run one shard on a private simulator. Safe to call from any worker thread.
 */
export function runEquityShard(task: EquityShardTask): EquityTally {
  const simulator = new EquitySimulator({ seed: task.seed });
  return simulator.tallyEquity(
    task.playerCards.map(c => Card.parse(c)),
    task.community.map(c => Card.parse(c)),
    task.opponents,
    task.trials
  );
}

/** Reduce shard counters into one tally */
export function mergeTallies(tallies: readonly EquityTally[]): EquityTally {
  return tallies.reduce((sum, t) => ({
    wins: sum.wins + t.wins,
    ties: sum.ties + t.ties,
    losses: sum.losses + t.losses,
    trials: sum.trials + t.trials
  }), emptyTally());
}
