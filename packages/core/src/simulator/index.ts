export * from './types.js';
export * from './EquitySimulator.js';
export * from './shards.js';
