export * from './EquityReport.js';
