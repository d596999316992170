import { describe, it, expect } from 'vitest';
import { InvalidInputError, planEquityShards, runEquityShard } from '@holdem-equity/core';
import { EquityPool, isEquityTally } from '../src/pool.js';
import equityShardWorker from '../src/worker.js';

describe('equityShardWorker', () => {
  it('runs a shard like the in-process runner', () => {
    const [task] = planEquityShards(
      { playerCards: ['Ah', 'Ad'], community: [], opponents: 1, trials: 300 },
      1,
      12
    );
    const tally = equityShardWorker(task);
    expect(tally).toEqual(runEquityShard(task));
    expect(tally.trials).toBe(300);
  });
});

describe('isEquityTally', () => {
  it('accepts complete counters', () => {
    expect(isEquityTally({ wins: 1, ties: 0, losses: 2, trials: 3 })).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isEquityTally(null)).toBe(false);
    expect(isEquityTally({ wins: 1 })).toBe(false);
    expect(isEquityTally({ wins: '1', ties: 0, losses: 0, trials: 1 })).toBe(false);
  });
});

describe('EquityPool', () => {
  it('rejects bad input on the calling thread', async () => {
    const pool = new EquityPool(2);
    try {
      const run = pool.estimateEquity({ playerCards: ['Ah', 'As'], community: [], opponents: 30, trials: 2000 }, 1);
      await expect(run).rejects.toThrow(InvalidInputError);
      await expect(pool.estimateEquity({ playerCards: ['Ah'], community: [], opponents: 1, trials: 10 }, 1))
        .rejects.toThrow('Player must hold 2 cards, got 1');
    } finally {
      await pool.destroy();
    }
  });
});
