export * from './HandRange.js';
