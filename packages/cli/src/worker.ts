import { type EquityShardTask, type EquityTally, runEquityShard } from '@holdem-equity/core';

/**
 * Worker-thread entry: runs one equity shard on the thread's own deck and
 * generator and returns its counters.
 */
export default function equityShardWorker(task: EquityShardTask): EquityTally {
  return runEquityShard(task);
}
