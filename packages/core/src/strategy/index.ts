export * from './StrategyCalculator.js';
