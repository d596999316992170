export * from './HandRank.js';
export * from './HandEvaluator.js';
export * from './BestHand.js';
