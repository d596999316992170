import { Piscina } from 'piscina';
import path from 'node:path';
import { performance } from 'node:perf_hooks';
import { fileURLToPath } from 'node:url';
import {
  Card,
  type EquityRequest,
  type EquityResult,
  type EquityTally,
  InvariantViolationError,
  mergeTallies,
  planEquityShards,
  tallyToResult,
  timingFor,
  validateEquityInputs
} from '@holdem-equity/core';

const __filename = fileURLToPath(import.meta.url);

// worker.ts when running from source under tsx, worker.js once built
const WORKER_FILE = path.join(path.dirname(__filename), `worker${path.extname(__filename)}`);

/**
 * Runs uniform-opponent equity across worker threads. The trials are split
 * into one shard per thread, each with its own seed, and only the final
 * counters come back to be summed.
 */
export class EquityPool {
  private pool?: Piscina;
  private readonly threads: number;

  constructor(threads: number) {
    this.threads = threads;
  }

  async estimateEquity(request: EquityRequest, seed: number, instrument: boolean = false): Promise<EquityResult> {
    const start = performance.now();
    validateEquityInputs(
      request.playerCards.map(c => Card.parse(c)),
      request.community.map(c => Card.parse(c)),
      request.opponents,
      request.trials
    );
    const tasks = planEquityShards(request, this.threads, seed);
    const pool = this.getPool();

    const tallies = await Promise.all(tasks.map(async task => {
      const result: unknown = await pool.run(task);
      if (!isEquityTally(result)) {
        throw new InvariantViolationError(`Shard ${task.shardIndex} returned no tally`);
      }
      return result;
    }));

    const tally = mergeTallies(tallies);
    return instrument
      ? tallyToResult(tally, timingFor(tally.trials, performance.now() - start))
      : tallyToResult(tally);
  }

  async destroy(): Promise<void> {
    if (this.pool) {
      await this.pool.destroy();
      this.pool = undefined;
    }
  }

  private getPool(): Piscina {
    if (!this.pool) {
      this.pool = new Piscina({
        filename: WORKER_FILE,
        maxThreads: this.threads,
        minThreads: 1,
        idleTimeout: 30000
      });
    }
    return this.pool;
  }
}

export function isEquityTally(value: unknown): value is EquityTally {
  return typeof value === 'object' && value !== null &&
    'wins' in value && typeof value.wins === 'number' &&
    'ties' in value && typeof value.ties === 'number' &&
    'losses' in value && typeof value.losses === 'number' &&
    'trials' in value && typeof value.trials === 'number';
}

/** A seed for runs where the caller gave none */
export function randomSeed(): number {
  return Math.floor(Math.random() * 0x7FFFFFFF);
}
