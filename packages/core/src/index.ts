// Hold'em hand evaluation and equity simulation

// Errors
export * from './errors.js';

// Cards
export * from './cards/index.js';

// Random number generation
export * from './random/index.js';

// Hand evaluation
export * from './evaluator/index.js';

// Monte Carlo equity simulation
export * from './simulator/index.js';

// Hand ranges
export * from './range/index.js';

// Pot odds and decisions
export * from './strategy/index.js';

// Reporting
export * from './analyzer/index.js';

// Utilities
export * from './utils/index.js';
